export type SourceMode = "counts" | "ratios";

export interface ReadingEntry {
    rank: number; // 1-based, by votes descending
    name: string;
    percent: number; // 0..100
    votes: number;
}

export interface Reading {
    timestamp: number; // epoch ms
    total: number;
    entries: ReadingEntry[];
}

// One persisted row of the log: a Reading flattened per candidate.
export interface LogEntry extends ReadingEntry {
    timestamp: number;
    total: number;
}

export interface CurrentState {
    currentTotal: number;
    candidateVotes: Record<string, number>;
    lastUpdate: number;
}

export type TrendWindowRequest = { hours: number } | { from: number; to?: number };

export interface CandidateTrend {
    name: string;
    voteDelta: number;
    percentDelta: number;
    votesPerMinute: number | undefined; // undefined when no time elapsed
    currentVotes: number;
    currentPercent: number;
    currentRank: number;
    appeared: boolean; // absent from the baseline reading
}

export interface TrendWindow {
    from: number;
    to: number;
    baselineAt: number;
    latestAt: number;
    elapsedMinutes: number;
    totalDelta: number;
    totalVotesPerMinute: number | undefined;
    candidates: CandidateTrend[];
}

export type TrendResult =
    | { status: "ok"; trend: TrendWindow }
    | { status: "insufficient-data"; from: number; to: number; readings: number };

export type TrackerHealth = "running" | "stale" | "no-data";

export interface TrackerStatus {
    health: TrackerHealth;
    lastUpdate?: number;
    ageMs?: number;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
