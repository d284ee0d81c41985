import { SlashCommandBuilder } from "discord.js";
import { statusEmbed } from "../utils/embeds";
import { trackerStatus } from "../utils/trend";
import { Command } from "./types";

export const trackerStatusCommand: Command = {
    data: new SlashCommandBuilder().setName("tracker-status").setDescription("Is the tracker still collecting data?"),
    async execute(interaction, ctx) {
        const state = await ctx.stateStore.get();
        const status = trackerStatus(state, Date.now(), ctx.staleAfterMs);
        await interaction.reply({ embeds: [statusEmbed(status)], ephemeral: true });
    },
};
