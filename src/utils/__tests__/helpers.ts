import fs from "fs";
import os from "os";
import path from "path";
import { vi } from "vitest";
import { Reading } from "../../types";

export const T0 = Date.UTC(2025, 9, 18, 12, 0, 0);
export const MINUTE = 60 * 1000;

/** Reading with ranks by count and shares of the candidate sum. */
export function reading(timestamp: number, counts: Record<string, number>, total?: number): Reading {
    const sum = Object.values(counts).reduce((a, b) => a + b, 0);
    const entries = Object.entries(counts)
        .sort((a, b) => b[1] - a[1])
        .map(([name, votes], i) => ({
            rank: i + 1,
            name,
            votes,
            percent: sum === 0 ? 0 : Math.round((votes / sum) * 100 * 1e6) / 1e6,
        }));
    return { timestamp, total: total ?? sum, entries };
}

export function tempDir() {
    return fs.mkdtempSync(path.join(os.tmpdir(), "vote-tracker-"));
}

export function mockLogger() {
    return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
