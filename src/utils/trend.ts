import { LogStore } from "./logStore";
import { CandidateTrend, CurrentState, Reading, TrackerStatus, TrendResult, TrendWindowRequest } from "../types";

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export const TREND_PERIODS_HOURS = [1, 6, 24];

export function resolveWindow(window: TrendWindowRequest, now: number) {
    if ("hours" in window) return { from: now - window.hours * HOUR, to: now };
    return { from: window.from, to: window.to ?? now };
}

function round6(n: number) {
    return Math.round(n * 1e6) / 1e6;
}

/**
 * Compare the earliest Reading at/after `from` with the latest at/before `to`.
 *
 * Candidates that are in the latest Reading but not the baseline are measured
 * from zero (`appeared: true`); candidates that only exist in the baseline are
 * left out, so the result always describes the latest field of candidates.
 */
export function computeTrend(readings: Reading[], window: TrendWindowRequest, now = Date.now()): TrendResult {
    const { from, to } = resolveWindow(window, now);
    const selected = readings.filter((r) => r.timestamp >= from && r.timestamp <= to).sort((a, b) => a.timestamp - b.timestamp);
    if (selected.length < 2) return { status: "insufficient-data", from, to, readings: selected.length };

    const baseline = selected[0];
    const latest = selected[selected.length - 1];
    const elapsedMinutes = (latest.timestamp - baseline.timestamp) / MINUTE;
    const perMinute = (delta: number) => (elapsedMinutes > 0 ? delta / elapsedMinutes : undefined);

    const before = new Map(baseline.entries.map((e) => [e.name, e]));
    const candidates: CandidateTrend[] = latest.entries
        .slice()
        .sort((a, b) => a.rank - b.rank)
        .map((e) => {
            const base = before.get(e.name);
            const voteDelta = e.votes - (base?.votes ?? 0);
            return {
                name: e.name,
                voteDelta,
                percentDelta: round6(e.percent - (base?.percent ?? 0)),
                votesPerMinute: perMinute(voteDelta),
                currentVotes: e.votes,
                currentPercent: e.percent,
                currentRank: e.rank,
                appeared: base === undefined,
            };
        });

    const totalDelta = latest.total - baseline.total;
    return {
        status: "ok",
        trend: {
            from,
            to,
            baselineAt: baseline.timestamp,
            latestAt: latest.timestamp,
            elapsedMinutes,
            totalDelta,
            totalVotesPerMinute: perMinute(totalDelta),
            candidates,
        },
    };
}

function byName(a: CandidateTrend, b: CandidateTrend) {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export function topGainers(candidates: CandidateTrend[], n = 3) {
    return candidates
        .slice()
        .sort((a, b) => b.voteDelta - a.voteDelta || byName(a, b))
        .slice(0, n);
}

export function topLosers(candidates: CandidateTrend[], n = 3) {
    return candidates
        .slice()
        .sort((a, b) => a.voteDelta - b.voteDelta || byName(a, b))
        .slice(0, n);
}

export function trackerStatus(state: CurrentState | undefined, now: number, staleAfterMs: number): TrackerStatus {
    if (!state) return { health: "no-data" };
    const ageMs = Math.max(0, now - state.lastUpdate);
    return { health: ageMs <= staleAfterMs ? "running" : "stale", lastUpdate: state.lastUpdate, ageMs };
}

/** Trend views over the log. Read-only; safe to call while the poller writes. */
export class TrendEngine {
    constructor(private readonly logStore: LogStore, private readonly now: () => number = Date.now) {}

    async computeTrend(window: TrendWindowRequest): Promise<TrendResult> {
        const now = this.now();
        const { from, to } = resolveWindow(window, now);
        return computeTrend(await this.logStore.readRange(from, to), { from, to }, now);
    }

    async trendPeriods(hours: number[] = TREND_PERIODS_HOURS) {
        const now = this.now();
        const readings = await this.logStore.readAll();
        return hours.map((h) => ({ hours: h, result: computeTrend(readings, { hours: h }, now) }));
    }
}
