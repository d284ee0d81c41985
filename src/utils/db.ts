import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { CorruptRecord, WriteError } from "./errors";
import { flattenReading, groupEntries, parseLogRow } from "./logEntries";
import { CsvLogStore, LogStore, inRange } from "./logStore";
import { JsonStateStore, StateStore, fromDocument, projectState, stateDocumentSchema, toDocument } from "./stateStore";
import { TrackerConfig } from "../config";
import { LogEntry, Logger, Reading } from "../types";

const PAGE_SIZE = 1000;

/* ---------- Supabase backend (server-side) ---------- */

/**
 * Log rows in a `vote_log` table with the same columns as the CSV artifact.
 * Each Reading is one insert statement, so it lands whole or not at all.
 */
export class SupabaseLogStore implements LogStore {
    constructor(private readonly supabase: SupabaseClient, private readonly logger: Logger = console) {}

    async append(reading: Reading) {
        const rows = flattenReading(reading).map((e) => ({ ...e, timestamp: new Date(e.timestamp).toISOString() }));
        if (rows.length === 0) return;
        const { error } = await this.supabase.from("vote_log").insert(rows);
        if (error) throw new WriteError("log", `vote_log insert failed: ${error.message}`, { cause: error });
    }

    async readAll() {
        return groupEntries(await this.readEntries());
    }

    async readRange(from: number, to: number) {
        return inRange(groupEntries(await this.readEntries(from, to)), from, to);
    }

    async retain(since: number) {
        const before = (await this.readAll()).length;
        const { error } = await this.supabase.from("vote_log").delete().lt("timestamp", new Date(since).toISOString());
        if (error) throw new WriteError("log", `vote_log delete failed: ${error.message}`, { cause: error });
        const dropped = before - (await this.readAll()).length;
        this.logger.log(`[LogStore] Archived ${dropped} reading(s) older than ${new Date(since).toISOString()}`);
        return dropped;
    }

    private async readEntries(from?: number, to?: number): Promise<LogEntry[]> {
        const entries: LogEntry[] = [];
        for (let offset = 0; ; offset += PAGE_SIZE) {
            let query = this.supabase.from("vote_log").select("id,timestamp,total,rank,name,percent,votes");
            if (from !== undefined) query = query.gte("timestamp", new Date(from).toISOString());
            if (to !== undefined) query = query.lte("timestamp", new Date(to).toISOString());
            // insertion id keeps duplicate appends at one instant apart
            const { data, error } = await query.order("id", { ascending: true }).range(offset, offset + PAGE_SIZE - 1);
            if (error) throw error;
            const rows: unknown[] = data ?? [];
            rows.forEach((row, i) => {
                const parsed = parseLogRow(row, offset + i + 1);
                if (parsed instanceof CorruptRecord) this.logger.warn(`[LogStore] Skipping ${parsed.message}`);
                else entries.push(parsed);
            });
            if (rows.length < PAGE_SIZE) return entries;
        }
    }
}

/** Single row (`id = 1`) in `tracker_state`; an upsert swaps it as a whole. */
export class SupabaseStateStore implements StateStore {
    constructor(private readonly supabase: SupabaseClient, private readonly logger: Logger = console) {}

    async get() {
        const { data, error } = await this.supabase
            .from("tracker_state")
            .select("current_total,candidate_votes,last_update")
            .eq("id", 1)
            .maybeSingle();
        if (error) throw error;
        if (!data) return undefined;
        const parsed = stateDocumentSchema.safeParse(data);
        if (!parsed.success) {
            this.logger.warn(`[StateStore] Ignoring invalid tracker_state row: ${parsed.error.issues[0]?.message}`);
            return undefined;
        }
        return fromDocument(parsed.data);
    }

    async replace(reading: Reading) {
        const state = projectState(reading);
        const { error } = await this.supabase.from("tracker_state").upsert({ id: 1, ...toDocument(state) });
        if (error) throw new WriteError("state", `tracker_state upsert failed: ${error.message}`, { cause: error });
        return state;
    }
}

/* ---------- Store selection ---------- */

export interface Stores {
    logStore: LogStore;
    stateStore: StateStore;
    backend: "supabase" | "file";
}

export function createStores(config: TrackerConfig, logger: Logger = console): Stores {
    if (config.supabase) {
        const supabase = createClient(config.supabase.url, config.supabase.serviceKey, {
            auth: { persistSession: false },
            global: { headers: { "x-client-info": "vote-trend-tracker" } },
        });
        return {
            logStore: new SupabaseLogStore(supabase, logger),
            stateStore: new SupabaseStateStore(supabase, logger),
            backend: "supabase",
        };
    }

    // fallback to local files
    return {
        logStore: new CsvLogStore(config.logPath, logger),
        stateStore: new JsonStateStore(config.statePath, logger),
        backend: "file",
    };
}
