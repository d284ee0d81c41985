import fs from "fs";
import path from "path";
import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { calibrate } from "./calibrate";
import { FetchFailure, describeError } from "./errors";
import { CurrentState, Logger, Reading, ReadingEntry, SourceMode } from "../types";

const PERCENT_TOLERANCE = 1;

const nominationSchema = z.object({
    // line breaks and tabs inside a name become single spaces
    name: z
        .string()
        .transform((s) => s.replace(/[\r\n\t\v\f]+/g, " ").trim())
        .pipe(z.string().min(1)),
    ratioVotes: z.number().min(0).max(100).nullish(),
    totalVotes: z.number().int().nonnegative().nullish(),
});

const providerPayloadSchema = z.object({
    data: z.object({
        totalVotes: z.number().int().nonnegative().nullish(),
        nominations: z.array(nominationSchema),
    }),
});

type Nomination = z.infer<typeof nominationSchema>;

export type FetchResult = { ok: true; reading: Reading; raw: string } | { ok: false; failure: FetchFailure };

export interface SourceOptions {
    url: string;
    fallbackUrl?: string;
    timeoutMs: number;
    mode: SourceMode;
    initialTotalEstimate?: number;
    rawDumpPath?: string;
    http?: AxiosInstance;
    logger?: Logger;
    now?: () => number;
}

function roundPercent(p: number) {
    return Math.round(p * 1e6) / 1e6;
}

// Proxy mirrors wrap the JSON in a text preamble; fall back to the outermost object.
function parseBody(body: string): unknown {
    try {
        return JSON.parse(body);
    } catch {
        const start = body.indexOf("{");
        const end = body.lastIndexOf("}");
        if (start < 0 || end <= start) throw new FetchFailure("malformed", "response body is not JSON");
        try {
            return JSON.parse(body.slice(start, end + 1));
        } catch (err) {
            throw new FetchFailure("malformed", `response body is not JSON: ${describeError(err)}`, { cause: err });
        }
    }
}

// Case-insensitive duplicate names keep the larger figure, at the first one's position.
function dedupe(nominations: Nomination[], weight: (n: Nomination) => number) {
    const byKey = new Map<string, Nomination>();
    for (const n of nominations) {
        const key = n.name.toUpperCase();
        const seen = byKey.get(key);
        if (!seen) byKey.set(key, n);
        else if (weight(n) > weight(seen)) byKey.set(key, { ...n, name: seen.name });
    }
    return [...byKey.values()];
}

function assignRanks(rows: Omit<ReadingEntry, "rank">[]): ReadingEntry[] {
    // Array.prototype.sort is stable, so equal counts keep response order
    return rows
        .slice()
        .sort((a, b) => b.votes - a.votes)
        .map((r, i) => ({ rank: i + 1, ...r }));
}

function checkPercentSum(entries: ReadingEntry[]) {
    const sum = entries.reduce((acc, e) => acc + e.percent, 0);
    if (Math.abs(sum - 100) > PERCENT_TOLERANCE) {
        throw new FetchFailure("malformed", `percentages sum to ${sum.toFixed(3)}, expected 100`);
    }
}

/**
 * Normalize a provider payload into a Reading. Anything incomplete throws
 * FetchFailure("malformed"); a partial Reading is never returned.
 */
export function toReading(payload: unknown, timestamp: number, mode: SourceMode, previous?: { total: number; votes: Record<string, number> }): Reading {
    const parsed = providerPayloadSchema.safeParse(payload);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new FetchFailure("malformed", `unexpected payload: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`);
    }
    const { nominations, totalVotes } = parsed.data.data;
    if (nominations.length === 0) throw new FetchFailure("malformed", "payload has no candidates");

    if (mode === "ratios") {
        const missing = nominations.find((n) => n.ratioVotes == null);
        if (missing) throw new FetchFailure("malformed", `missing vote share for "${missing.name}"`);
        const shares = dedupe(nominations, (n) => n.ratioVotes ?? 0).map((n) => ({ name: n.name, percent: roundPercent(n.ratioVotes ?? 0) }));
        const { total, votes } = calibrate(shares, previous?.total ?? 0, previous?.votes ?? {});
        const entries = assignRanks(shares.map((s) => ({ name: s.name, percent: s.percent, votes: votes[s.name] ?? 0 })));
        checkPercentSum(entries);
        return { timestamp, total, entries };
    }

    const missing = nominations.find((n) => n.totalVotes == null);
    if (missing) throw new FetchFailure("malformed", `missing vote count for "${missing.name}"`);
    const unique = dedupe(nominations, (n) => n.totalVotes ?? 0);
    const voteSum = unique.reduce((acc, n) => acc + (n.totalVotes ?? 0), 0);
    const total = totalVotes ?? voteSum;
    if (total < voteSum) throw new FetchFailure("malformed", `total ${total} is below the candidate sum ${voteSum}`);

    const useShares = unique.every((n) => n.ratioVotes != null);
    const entries = assignRanks(
        unique.map((n) => {
            const votes = n.totalVotes ?? 0;
            const percent = useShares ? (n.ratioVotes ?? 0) : voteSum > 0 ? (votes / voteSum) * 100 : 0;
            return { name: n.name, percent: roundPercent(percent), votes };
        }),
    );
    if (voteSum > 0) checkPercentSum(entries);
    return { timestamp, total, entries };
}

export class SourceClient {
    private readonly http: AxiosInstance;
    private readonly logger: Logger;
    private readonly now: () => number;

    constructor(private readonly options: SourceOptions) {
        this.http = options.http ?? axios.create();
        this.logger = options.logger ?? console;
        this.now = options.now ?? Date.now;
    }

    /** One sample of the feed. Never throws; failures come back as `{ ok: false }`. */
    async fetch(previous?: CurrentState): Promise<FetchResult> {
        const timestamp = this.now();
        try {
            const raw = await this.fetchRaw();
            await this.dumpRaw(raw);
            const baseline = previous
                ? { total: previous.currentTotal, votes: previous.candidateVotes }
                : { total: this.options.initialTotalEstimate ?? 0, votes: {} };
            const reading = toReading(parseBody(raw), timestamp, this.options.mode, baseline);
            return { ok: true, reading, raw };
        } catch (err) {
            const failure = err instanceof FetchFailure ? err : new FetchFailure("network", describeError(err), { cause: err });
            return { ok: false, failure };
        }
    }

    private async fetchRaw() {
        try {
            return await this.get(this.options.url);
        } catch (err) {
            if (!this.options.fallbackUrl) throw err;
            this.logger.warn(`[Source] Primary feed failed (${describeError(err)}), trying fallback...`);
            return this.get(this.options.fallbackUrl);
        }
    }

    private async get(url: string): Promise<string> {
        try {
            const res = await this.http.get<string>(url, {
                timeout: this.options.timeoutMs,
                responseType: "text",
                transformResponse: [(data: unknown) => data],
                validateStatus: () => true,
                headers: { accept: "application/json, text/plain, */*", "user-agent": "vote-trend-tracker" },
            });
            const body = typeof res.data === "string" ? res.data : "";
            if (res.status !== 200) throw new FetchFailure("http", `${url} answered ${res.status}`);
            if (!body.trim()) throw new FetchFailure("http", `${url} returned an empty body`);
            return body;
        } catch (err) {
            if (err instanceof FetchFailure) throw err;
            if (axios.isAxiosError(err) && (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT")) {
                throw new FetchFailure("timeout", `${url} timed out after ${this.options.timeoutMs}ms`, { cause: err });
            }
            throw new FetchFailure("network", `${url}: ${describeError(err)}`, { cause: err });
        }
    }

    // Diagnostic copy only; failing to write it never fails the fetch.
    private async dumpRaw(raw: string) {
        const target = this.options.rawDumpPath;
        if (!target) return;
        try {
            await fs.promises.mkdir(path.dirname(target), { recursive: true });
            await fs.promises.writeFile(target, raw, "utf8");
        } catch (err) {
            this.logger.warn(`[Source] Could not write raw capture to ${target}: ${describeError(err)}`);
        }
    }
}
