import dotenv from "dotenv";
import { Client } from "discord.js";
import { startBot } from "./bot";
import { loadConfig } from "./config";
import { createHealthServer } from "./health";
import { createStores } from "./utils/db";
import { prepareStores } from "./utils/reconcile";
import { Poller } from "./utils/scheduler";
import { SourceClient } from "./utils/source";
import { TrendEngine } from "./utils/trend";
dotenv.config();

async function main() {
    const config = loadConfig();
    const { logStore, stateStore, backend } = createStores(config);
    console.log(`[Tracker] Storage: ${backend}; polling ${config.sourceUrl} every ${config.pollIntervalMs / 1000}s (${config.sourceMode})`);

    const restored = await prepareStores(logStore, stateStore, { retentionHours: config.retentionHours });

    const source = new SourceClient({
        url: config.sourceUrl,
        fallbackUrl: config.sourceFallbackUrl,
        timeoutMs: config.sourceTimeoutMs,
        mode: config.sourceMode,
        initialTotalEstimate: config.initialTotalEstimate,
        rawDumpPath: backend === "file" ? config.rawDumpPath : undefined,
    });
    const poller = new Poller(source, logStore, stateStore, {
        intervalMs: config.pollIntervalMs,
        backoffBaseMs: config.backoffBaseMs,
        backoffMaxMs: config.backoffMaxMs,
        degradedAfter: config.degradedAfter,
        writeRetries: config.writeRetries,
        lastTimestamp: restored?.lastUpdate,
    });
    const trends = new TrendEngine(logStore);

    let shuttingDown = false;
    const server = createHealthServer({ stateStore, poller, staleAfterMs: config.staleAfterMs, isShuttingDown: () => shuttingDown });
    server.listen(config.port, () => {
        console.log(`[Tracker] HTTP health server listening on port ${config.port}`);
    });

    let bot: Client | undefined;
    if (config.discord) {
        try {
            bot = await startBot(config.discord.token, config.discord.clientId, { stateStore, trends, staleAfterMs: config.staleAfterMs });
        } catch (err) {
            console.error("[Tracker] Discord bot failed to start; continuing without it:", err);
        }
    }

    poller.start();

    // graceful shutdown: stop polling between cycles, then close the surfaces
    const shutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log("[Tracker] Shutting down...");

        const grace = setTimeout(() => {
            console.error(`[Tracker] In-flight cycle still running after ${config.shutdownGraceMs}ms, exiting`);
            process.exit(1);
        }, config.shutdownGraceMs);
        await poller.stop();
        clearTimeout(grace);

        server.close(() => console.log("[Tracker] HTTP server closed"));
        if (bot) {
            await bot.destroy();
            console.log("[Tracker] Discord client destroyed");
        }
        process.exitCode = 0;
    };

    const onSignal = () => {
        shutdown().catch((err) => {
            console.error("[Tracker] Shutdown failed:", err);
            process.exit(1);
        });
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
}

// log unhandled errors so host logs show cause
process.on("unhandledRejection", (reason) => {
    console.error("unhandledRejection:", reason);
});

main().catch((err) => {
    console.error("[Tracker] Failed to start:", err);
    process.exit(1);
});
