import { SlashCommandBuilder } from "discord.js";
import { trendEmbed } from "../utils/embeds";
import { Command } from "./types";

export const trend: Command = {
    data: new SlashCommandBuilder()
        .setName("trend")
        .setDescription("Top gainers and losers over a recent window")
        .addIntegerOption((o) => o.setName("hours").setDescription("Window length in hours (default 24)").setMinValue(1).setMaxValue(24 * 30)),
    async execute(interaction, ctx) {
        await interaction.deferReply();
        const hours = interaction.options.getInteger("hours") ?? 24;
        const result = await ctx.trends.computeTrend({ hours });
        await interaction.editReply({ embeds: [trendEmbed(result, hours)] });
    },
};
