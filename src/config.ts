import path from "path";
import { ConfigError } from "./utils/errors";
import { SourceMode } from "./types";

export interface TrackerConfig {
    sourceUrl: string;
    sourceFallbackUrl?: string;
    sourceMode: SourceMode;
    sourceTimeoutMs: number;
    pollIntervalMs: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    degradedAfter: number;
    writeRetries: number;
    initialTotalEstimate: number;
    logPath: string;
    statePath: string;
    rawDumpPath: string;
    staleAfterMs: number;
    retentionHours?: number;
    supabase?: { url: string; serviceKey: string };
    discord?: { token: string; clientId?: string };
    port: number;
    shutdownGraceMs: number;
}

type Env = Record<string, string | undefined>;

function positive(value: string | undefined, fallback: number) {
    const n = Number(value);
    return Number.isFinite(n) && n > 0 ? n : fallback;
}

function nonNegative(value: string | undefined, fallback: number) {
    const n = Number(value);
    return value !== undefined && value !== "" && Number.isFinite(n) && n >= 0 ? n : fallback;
}

export function loadConfig(env: Env = process.env): TrackerConfig {
    const sourceUrl = env.SOURCE_URL?.trim();
    if (!sourceUrl) throw new ConfigError("SOURCE_URL is required");

    const mode = env.SOURCE_MODE?.trim() || "counts";
    if (mode !== "counts" && mode !== "ratios") {
        throw new ConfigError(`SOURCE_MODE must be "counts" or "ratios", got "${mode}"`);
    }

    const dataDir = env.DATA_DIR || "data";
    const pollIntervalMs = positive(env.POLL_INTERVAL_MS, 300_000);
    const retention = positive(env.RETENTION_HOURS, 0);

    const config: TrackerConfig = {
        sourceUrl,
        sourceFallbackUrl: env.SOURCE_FALLBACK_URL?.trim() || undefined,
        sourceMode: mode,
        sourceTimeoutMs: positive(env.SOURCE_TIMEOUT_MS, 20_000),
        pollIntervalMs,
        backoffBaseMs: positive(env.BACKOFF_BASE_MS, 5_000),
        backoffMaxMs: positive(env.BACKOFF_MAX_MS, 300_000),
        degradedAfter: positive(env.DEGRADED_AFTER, 3),
        writeRetries: nonNegative(env.WRITE_RETRIES, 3),
        initialTotalEstimate: nonNegative(env.INITIAL_TOTAL_ESTIMATE, 0),
        logPath: env.LOG_PATH || path.join(dataDir, "vote_log.csv"),
        statePath: env.STATE_PATH || path.join(dataDir, "state.json"),
        rawDumpPath: env.RAW_DUMP_PATH || path.join(dataDir, "dumps", "raw_latest.txt"),
        staleAfterMs: positive(env.STALE_AFTER_MS, pollIntervalMs * 2),
        retentionHours: retention > 0 ? retention : undefined,
        port: positive(env.PORT, 3000),
        shutdownGraceMs: nonNegative(env.SHUTDOWN_GRACE_MS, 10_000),
    };

    if (config.sourceMode === "ratios" && config.initialTotalEstimate <= 0) {
        throw new ConfigError("SOURCE_MODE=ratios needs a positive INITIAL_TOTAL_ESTIMATE");
    }

    // Supabase replaces the local files only when both settings are present
    if (env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY) {
        config.supabase = { url: env.SUPABASE_URL, serviceKey: env.SUPABASE_SERVICE_KEY };
    }
    if (env.DISCORD_TOKEN) {
        config.discord = { token: env.DISCORD_TOKEN, clientId: env.CLIENT_ID || undefined };
    }
    return config;
}
