import { Interaction } from "discord.js";
import { Command, TrackerContext } from "../commands";

export async function onInteraction(interaction: Interaction, registry: Map<string, Command>, ctx: TrackerContext) {
    if (!interaction.isChatInputCommand()) return;

    const command = registry.get(interaction.commandName);
    if (!command) {
        await interaction.reply({ content: "Command not found.", ephemeral: true });
        return;
    }
    try {
        await command.execute(interaction, ctx);
    } catch (err) {
        console.error(`[Bot] /${interaction.commandName} failed:`, err);
        const content = "There was an error executing that command.";
        if (interaction.deferred || interaction.replied) await interaction.editReply({ content });
        else await interaction.reply({ content, ephemeral: true });
    }
}
