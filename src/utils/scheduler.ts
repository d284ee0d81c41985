import { describeError } from "./errors";
import { LogStore } from "./logStore";
import { sleep as defaultSleep } from "./sleep";
import { FetchResult } from "./source";
import { StateStore } from "./stateStore";
import { CurrentState, Logger, Reading } from "../types";

export type PollerPhase = "idle" | "polling" | "committing" | "backoff" | "stopped";

export interface ReadingSource {
    fetch(previous?: CurrentState): Promise<FetchResult>;
}

export interface PollerOptions {
    intervalMs: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    degradedAfter: number; // consecutive failed cycles before the degraded warning
    writeRetries: number; // extra attempts per store write
    retryDelayMs?: number;
    maxPending?: number;
    // timestamp of the last Reading already in the log, so the floor survives a restart
    lastTimestamp?: number;
    logger?: Logger;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    onReading?: (reading: Reading, state: CurrentState | undefined) => void;
    onDegraded?: (failures: number, lastError: string) => void;
}

export interface PollerSnapshot {
    phase: PollerPhase;
    consecutiveFailures: number;
    degraded: boolean;
    pendingReadings: number;
    lastSuccessAt?: number;
    lastError?: string;
}

const DEFAULT_MAX_PENDING = 288; // a day of 5-minute polls

/**
 * Single-writer polling loop. One cycle at a time:
 * idle → polling → (committing | backoff) → idle, until stop().
 */
export class Poller {
    private phase: PollerPhase = "idle";
    private failures = 0;
    private degraded = false;
    private lastError?: string;
    private lastSuccessAt?: number;
    private lastAppended: number;
    // Readings fetched but not yet durable in the log, oldest first
    private pending: Reading[] = [];
    private inFlight: Promise<boolean> | null = null;
    private loop: Promise<void> | null = null;
    private controller: AbortController | null = null;
    private readonly logger: Logger;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(
        private readonly source: ReadingSource,
        private readonly logStore: LogStore,
        private readonly stateStore: StateStore,
        private readonly options: PollerOptions,
    ) {
        this.logger = options.logger ?? console;
        this.sleep = options.sleep ?? defaultSleep;
        this.lastAppended = options.lastTimestamp ?? -Infinity;
    }

    start() {
        if (this.loop) {
            this.logger.log("[Poller] Already running");
            return;
        }
        this.controller = new AbortController();
        this.phase = "idle";
        this.loop = this.run(this.controller.signal);
        this.logger.log(`[Poller] Started (interval: ${this.options.intervalMs / 1000}s)`);
    }

    /** Cooperative stop: cuts the current wait short and lets an in-flight cycle finish. */
    async stop() {
        if (!this.loop) return;
        this.controller?.abort();
        await this.loop;
        this.loop = null;
        this.controller = null;
        this.phase = "stopped";
        this.logger.log("[Poller] Stopped");
    }

    get isRunning() {
        return this.loop !== null;
    }

    snapshot(): PollerSnapshot {
        return {
            phase: this.phase,
            consecutiveFailures: this.failures,
            degraded: this.degraded,
            pendingReadings: this.pending.length,
            lastSuccessAt: this.lastSuccessAt,
            lastError: this.lastError,
        };
    }

    /** Run one cycle now. A call made while a cycle is in flight joins that cycle. */
    runCycle(): Promise<boolean> {
        if (!this.inFlight) {
            this.inFlight = this.cycle().finally(() => {
                this.inFlight = null;
            });
        }
        return this.inFlight;
    }

    backoffDelay(failures = this.failures) {
        const { backoffBaseMs, backoffMaxMs } = this.options;
        return Math.min(backoffMaxMs, backoffBaseMs * 2 ** Math.max(0, failures - 1));
    }

    private async run(signal: AbortSignal) {
        while (!signal.aborted) {
            const ok = await this.runCycle();
            if (signal.aborted) break;
            if (ok) {
                this.phase = "idle";
                await this.sleep(this.options.intervalMs, signal);
            } else {
                this.phase = "backoff";
                const delay = this.backoffDelay();
                this.logger.log(`[Poller] Backing off ${delay}ms after ${this.failures} consecutive failure(s)`);
                await this.sleep(delay, signal);
                this.phase = "idle";
            }
        }
    }

    private async cycle(): Promise<boolean> {
        try {
            this.phase = "polling";
            const result = await this.source.fetch(await this.previousState());
            if (!result.ok) return this.fail(result.failure);

            this.phase = "committing";
            const floor = Math.max(this.lastAppended, this.pending.at(-1)?.timestamp ?? -Infinity);
            const reading = { ...result.reading, timestamp: Math.max(result.reading.timestamp, floor) };
            this.hold(reading);
            await this.flushPending();

            const state = await this.replaceState(reading);
            this.succeed(reading);
            this.notify(reading, state);
            return true;
        } catch (err) {
            return this.fail(err);
        }
    }

    // Listener errors are logged; the cycle has already committed.
    private notify(reading: Reading, state: CurrentState | undefined) {
        try {
            this.options.onReading?.(reading, state);
        } catch (err) {
            this.logger.warn(`[Poller] onReading listener failed: ${describeError(err)}`);
        }
    }

    private async previousState() {
        try {
            return await this.stateStore.get();
        } catch (err) {
            this.logger.warn(`[Poller] Could not read current state: ${describeError(err)}`);
            return undefined;
        }
    }

    private hold(reading: Reading) {
        this.pending.push(reading);
        const max = this.options.maxPending ?? DEFAULT_MAX_PENDING;
        if (this.pending.length > max) {
            const dropped = this.pending.splice(0, this.pending.length - max);
            this.logger.warn(`[Poller] Dropped ${dropped.length} unwritten reading(s); log has been unwritable too long`);
        }
    }

    // The log is the source of truth, so held readings go first and in order.
    private async flushPending() {
        while (this.pending.length > 0) {
            const next = this.pending[0];
            await this.withRetries("log append", () => this.logStore.append(next));
            this.lastAppended = next.timestamp;
            this.pending.shift();
        }
    }

    private async replaceState(reading: Reading) {
        try {
            return await this.withRetries("state replace", () => this.stateStore.replace(reading));
        } catch (err) {
            this.logger.warn(
                `[Poller] State replace failed (${describeError(err)}); log is up to date and the state will be rewritten on the next cycle`,
            );
            return undefined;
        }
    }

    private async withRetries<T>(label: string, fn: () => Promise<T>): Promise<T> {
        const attempts = this.options.writeRetries + 1;
        for (let attempt = 1; ; attempt++) {
            try {
                return await fn();
            } catch (err) {
                if (attempt >= attempts) throw err;
                this.logger.warn(`[Poller] ${label} failed (attempt ${attempt}/${attempts}): ${describeError(err)}`);
                await this.sleep((this.options.retryDelayMs ?? 250) * attempt);
            }
        }
    }

    private succeed(reading: Reading) {
        if (this.degraded) this.logger.log(`[Poller] Recovered after ${this.failures} failed cycle(s)`);
        this.failures = 0;
        this.degraded = false;
        this.lastError = undefined;
        this.lastSuccessAt = reading.timestamp;
        this.logger.log(
            `[Poller] ${new Date(reading.timestamp).toISOString()} total ${reading.total.toLocaleString("en-US")} (${reading.entries.length} candidates)`,
        );
    }

    private fail(err: unknown) {
        this.failures++;
        this.lastError = describeError(err);
        this.logger.error(`[Poller] Cycle failed (${this.failures} in a row): ${this.lastError}`);
        if (!this.degraded && this.failures >= this.options.degradedAfter) {
            this.degraded = true;
            this.logger.warn(`[Poller] Tracker degraded after ${this.failures} consecutive failures; still retrying`);
            this.options.onDegraded?.(this.failures, this.lastError);
        }
        return false;
    }
}
