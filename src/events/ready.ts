import { Client, REST, Routes } from "discord.js";
import { commands } from "../commands";

export async function onReady(client: Client<true>, clientId?: string) {
    console.log(`[Bot] Logged in as ${client.user.tag}`);
    // register commands only if CLIENT_ID is set; otherwise warn but continue
    if (!clientId) {
        console.warn("[Bot] CLIENT_ID not set, skipping global command registration.");
        return;
    }
    const rest = new REST({ version: "10" }).setToken(client.token);
    try {
        console.log("[Bot] Registering application commands...");
        await rest.put(Routes.applicationCommands(clientId), { body: commands.map((c) => c.data.toJSON()) });
        console.log("[Bot] Commands registered.");
    } catch (err) {
        console.error("[Bot] Failed to register commands:", err);
    }
}
