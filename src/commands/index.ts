import { standings } from "./standings";
import { trackerStatusCommand } from "./tracker-status";
import { trend } from "./trend";
import { Command } from "./types";

export const commands: Command[] = [standings, trend, trackerStatusCommand];

export type { Command, TrackerContext } from "./types";
