import { describe, it, expect } from "vitest";
import { CorruptRecord } from "../errors";
import { csvLineToRow, encodeCsvRow, groupEntries, parseLogRow, splitCsvLine } from "../logEntries";
import { LogEntry } from "../../types";
import { T0 } from "./helpers";

function entry(timestamp: number, rank: number, name: string, votes: number): LogEntry {
    return { timestamp, total: 100, rank, name, percent: votes, votes };
}

describe("CSV rows", () => {
    it("encodes percent with six decimals and an ISO timestamp", () => {
        expect(encodeCsvRow({ timestamp: T0, total: 1500, rank: 1, name: "An", percent: 66.5, votes: 1000 })).toBe(
            "2025-10-18T12:00:00.000Z,1500,1,An,66.500000,1000",
        );
    });

    it("quotes names containing commas and quotes", () => {
        const line = encodeCsvRow({ timestamp: T0, total: 3, rank: 2, name: 'Band "X", live', percent: 10, votes: 1 });
        expect(line).toBe('2025-10-18T12:00:00.000Z,3,2,"Band ""X"", live",10.000000,1');
        expect(splitCsvLine(line)).toEqual(["2025-10-18T12:00:00.000Z", "3", "2", 'Band "X", live', "10.000000", "1"]);
    });

    it("rejects an unterminated quote and a wrong column count", () => {
        expect(splitCsvLine('a,"b,c')).toBeNull();
        expect(csvLineToRow("a,b,c")).toBeNull();
    });
});

describe("parseLogRow", () => {
    const valid = { timestamp: "2025-10-18T12:00:00.000Z", total: "150", rank: "1", name: "A", percent: "66.666667", votes: "100" };

    it("parses a valid row into numbers", () => {
        expect(parseLogRow(valid, 2)).toEqual({ timestamp: T0, total: 150, rank: 1, name: "A", percent: 66.666667, votes: 100 });
    });

    it.each([
        ["votes", "abc"],
        ["votes", ""],
        ["votes", "1.5"],
        ["timestamp", "yesterday"],
        ["rank", "0"],
        ["percent", "101"],
        ["name", "  "],
    ])("flags %s=%j as corrupt", (field, value) => {
        const result = parseLogRow({ ...valid, [field]: value }, 7);
        expect(result).toBeInstanceOf(CorruptRecord);
        if (result instanceof CorruptRecord) {
            expect(result.line).toBe(7);
            expect(result.reason.startsWith(`${field}:`)).toBe(true);
        }
    });
});

describe("groupEntries", () => {
    it("rebuilds readings ordered by timestamp", () => {
        const readings = groupEntries([entry(T0 + 1000, 1, "A", 5), entry(T0, 1, "A", 3), entry(T0, 2, "B", 1)]);
        expect(readings.map((r) => [r.timestamp, r.entries.map((e) => e.name)])).toEqual([
            [T0, ["A", "B"]],
            [T0 + 1000, ["A"]],
        ]);
    });

    it("keeps two appends at the same instant as two readings", () => {
        const rows = [entry(T0, 1, "A", 3), entry(T0, 2, "B", 1), entry(T0, 1, "A", 3), entry(T0, 2, "B", 1)];
        const readings = groupEntries(rows);
        expect(readings).toHaveLength(2);
        expect(readings[0]).toEqual(readings[1]);
    });
});
