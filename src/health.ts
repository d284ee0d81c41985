import http from "http";
import { PollerSnapshot } from "./utils/scheduler";
import { StateStore } from "./utils/stateStore";
import { trackerStatus } from "./utils/trend";

export interface HealthDeps {
    stateStore: StateStore;
    poller: { snapshot(): PollerSnapshot };
    staleAfterMs: number;
    isShuttingDown: () => boolean;
}

export async function healthReport(deps: HealthDeps, now = Date.now()) {
    const status = trackerStatus(await deps.stateStore.get(), now, deps.staleAfterMs);
    const poller = deps.poller.snapshot();
    const ready = status.health === "running" && !deps.isShuttingDown();
    return {
        code: ready ? 200 : 503,
        body: {
            status: deps.isShuttingDown() ? "shutting-down" : status.health,
            lastUpdate: status.lastUpdate === undefined ? null : new Date(status.lastUpdate).toISOString(),
            ageSeconds: status.ageMs === undefined ? null : Math.round(status.ageMs / 1000),
            phase: poller.phase,
            consecutiveFailures: poller.consecutiveFailures,
            degraded: poller.degraded,
            ts: new Date(now).toISOString(),
        },
    };
}

// Staleness of last_update is the only failure signal; the poller never reports "failed".
export function createHealthServer(deps: HealthDeps) {
    return http.createServer((req, res) => {
        if (req.url === "/healthz") {
            healthReport(deps)
                .then(({ code, body }) => {
                    res.writeHead(code, { "Content-Type": "application/json" });
                    res.end(JSON.stringify(body) + "\n");
                })
                .catch((err) => {
                    console.error("[Health] Report failed:", err);
                    res.writeHead(500, { "Content-Type": "text/plain" });
                    res.end("error\n");
                });
            return;
        }

        // root / basic liveness endpoint
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end(deps.isShuttingDown() ? "Shutting down\n" : "OK\n");
    });
}
