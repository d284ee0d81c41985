import { ChatInputCommandInteraction } from "discord.js";
import { StateStore } from "../utils/stateStore";
import { TrendEngine } from "../utils/trend";

export interface TrackerContext {
    stateStore: StateStore;
    trends: TrendEngine;
    staleAfterMs: number;
}

export interface Command {
    data: { name: string; toJSON(): unknown };
    execute(interaction: ChatInputCommandInteraction, ctx: TrackerContext): Promise<void>;
}
