import { Client, Events, GatewayIntentBits } from "discord.js";
import { commands, Command, TrackerContext } from "./commands";
import { onInteraction } from "./events/interactionCreate";
import { onReady } from "./events/ready";

/** Read-only Discord front end: standings, trends and tracker status. */
export async function startBot(token: string, clientId: string | undefined, ctx: TrackerContext) {
    const client = new Client({ intents: [GatewayIntentBits.Guilds] });
    const registry = new Map<string, Command>(commands.map((c) => [c.data.name, c]));

    client.once(Events.ClientReady, (ready) => {
        onReady(ready, clientId).catch((err) => console.error("[Bot] Ready handler failed:", err));
    });
    client.on(Events.InteractionCreate, (interaction) => {
        onInteraction(interaction, registry, ctx).catch((err) => console.error("[Bot] Interaction handler failed:", err));
    });

    await client.login(token);
    return client;
}
