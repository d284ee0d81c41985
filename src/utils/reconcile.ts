import { describeError } from "./errors";
import { LogStore } from "./logStore";
import { StateStore } from "./stateStore";
import { CurrentState, Logger } from "../types";

/**
 * Bring the state in line with the log's latest Reading. Safe to run any
 * number of times: a state that already matches is left alone.
 */
export async function reconcileState(logStore: LogStore, stateStore: StateStore, logger: Logger = console): Promise<CurrentState | undefined> {
    const readings = await logStore.readAll();
    const latest = readings.at(-1);
    const state = await stateStore.get();
    if (!latest) return state;
    if (state && state.lastUpdate >= latest.timestamp) return state;

    logger.log(`[Reconcile] Rebuilding state from the reading at ${new Date(latest.timestamp).toISOString()}`);
    return stateStore.replace(latest);
}

export interface StartupOptions {
    retentionHours?: number;
    now?: number;
}

/**
 * Start-up housekeeping: prune old history, then reconcile. Store errors are
 * logged and never rethrown; the first successful cycle rewrites the state.
 * Returns the state to seed the poller's timestamp floor with.
 */
export async function prepareStores(
    logStore: LogStore,
    stateStore: StateStore,
    options: StartupOptions = {},
    logger: Logger = console,
): Promise<CurrentState | undefined> {
    if (options.retentionHours) {
        const since = (options.now ?? Date.now()) - options.retentionHours * 60 * 60 * 1000;
        try {
            await logStore.retain(since);
        } catch (err) {
            logger.warn(`[Tracker] Log retention failed (${describeError(err)}); keeping the full history`);
        }
    }
    try {
        return await reconcileState(logStore, stateStore, logger);
    } catch (err) {
        logger.warn(`[Tracker] Start-up reconciliation failed (${describeError(err)}); polling anyway`);
        return undefined;
    }
}
