import { SlashCommandBuilder } from "discord.js";
import { standingsEmbed } from "../utils/embeds";
import { Command } from "./types";

export const standings: Command = {
    data: new SlashCommandBuilder().setName("standings").setDescription("Show the latest vote counts"),
    async execute(interaction, ctx) {
        await interaction.deferReply();
        const state = await ctx.stateStore.get();
        await interaction.editReply({ embeds: [standingsEmbed(state)] });
    },
};
