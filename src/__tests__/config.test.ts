import path from "path";
import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";
import { ConfigError } from "../utils/errors";

describe("loadConfig", () => {
    it("fills defaults around the feed URL", () => {
        const config = loadConfig({ SOURCE_URL: "https://feed.test" });
        expect(config).toMatchObject({
            sourceUrl: "https://feed.test",
            sourceMode: "counts",
            sourceTimeoutMs: 20_000,
            pollIntervalMs: 300_000,
            backoffBaseMs: 5_000,
            backoffMaxMs: 300_000,
            degradedAfter: 3,
            writeRetries: 3,
            staleAfterMs: 600_000,
            logPath: path.join("data", "vote_log.csv"),
            statePath: path.join("data", "state.json"),
            rawDumpPath: path.join("data", "dumps", "raw_latest.txt"),
            port: 3000,
        });
        expect(config.supabase).toBeUndefined();
        expect(config.discord).toBeUndefined();
        expect(config.retentionHours).toBeUndefined();
    });

    it("reads overrides and optional integrations", () => {
        const config = loadConfig({
            SOURCE_URL: "https://feed.test",
            POLL_INTERVAL_MS: "60000",
            WRITE_RETRIES: "0",
            DATA_DIR: "/var/lib/tracker",
            RETENTION_HOURS: "48",
            SUPABASE_URL: "https://db.test",
            SUPABASE_SERVICE_KEY: "test-secret",
            DISCORD_TOKEN: "test-token",
        });
        expect(config.pollIntervalMs).toBe(60_000);
        expect(config.staleAfterMs).toBe(120_000);
        expect(config.writeRetries).toBe(0);
        expect(config.logPath).toBe(path.join("/var/lib/tracker", "vote_log.csv"));
        expect(config.retentionHours).toBe(48);
        expect(config.supabase).toEqual({ url: "https://db.test", serviceKey: "test-secret" });
        expect(config.discord).toEqual({ token: "test-token", clientId: undefined });
    });

    it("falls back to defaults for unusable numbers", () => {
        const config = loadConfig({ SOURCE_URL: "https://feed.test", POLL_INTERVAL_MS: "soon", DEGRADED_AFTER: "-1" });
        expect(config.pollIntervalMs).toBe(300_000);
        expect(config.degradedAfter).toBe(3);
    });

    it("requires a feed URL", () => {
        expect(() => loadConfig({})).toThrow(ConfigError);
    });

    it("rejects an unknown source mode", () => {
        expect(() => loadConfig({ SOURCE_URL: "https://feed.test", SOURCE_MODE: "guess" })).toThrow('SOURCE_MODE must be "counts" or "ratios", got "guess"');
    });

    it("needs a starting estimate in ratios mode", () => {
        expect(() => loadConfig({ SOURCE_URL: "https://feed.test", SOURCE_MODE: "ratios" })).toThrow(ConfigError);
        expect(loadConfig({ SOURCE_URL: "https://feed.test", SOURCE_MODE: "ratios", INITIAL_TOTAL_ESTIMATE: "1000000" }).initialTotalEstimate).toBe(1_000_000);
    });
});
