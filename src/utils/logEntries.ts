import { z } from "zod";
import { CorruptRecord } from "./errors";
import { LogEntry, Reading } from "../types";

export const LOG_COLUMNS = ["timestamp", "total", "rank", "name", "percent", "votes"] as const;

const integer = z.union([z.number(), z.string().trim()]).pipe(z.coerce.string().regex(/^\d+$/, "expected a non-negative integer")).transform(Number);
const decimal = z
    .union([z.number(), z.string().trim()])
    .pipe(z.coerce.string().regex(/^-?\d+(\.\d+)?(e[-+]?\d+)?$/i, "expected a number"))
    .transform(Number);
const instant = z
    .union([z.number(), z.string()])
    .transform((v, ctx) => {
        const ms = typeof v === "number" ? v : Date.parse(v);
        if (!Number.isFinite(ms)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "unparseable timestamp" });
            return z.NEVER;
        }
        return ms;
    });

/** Strict schema for one persisted log row; no implicit coercion of blanks. */
export const logRowSchema = z.object({
    timestamp: instant,
    total: integer,
    rank: integer.refine((n) => n >= 1, "rank must be >= 1"),
    name: z.string().trim().min(1, "empty name"),
    percent: decimal.refine((n) => n >= 0 && n <= 100, "percent out of range"),
    votes: integer,
});

export function flattenReading(reading: Reading): LogEntry[] {
    return reading.entries.map((e) => ({
        timestamp: reading.timestamp,
        total: reading.total,
        rank: e.rank,
        name: e.name,
        percent: e.percent,
        votes: e.votes,
    }));
}

export function parseLogRow(raw: unknown, line: number): LogEntry | CorruptRecord {
    const parsed = logRowSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return new CorruptRecord(line, issue ? `${issue.path.join(".") || "row"}: ${issue.message}` : "invalid row");
    }
    return parsed.data;
}

/**
 * Rebuild Readings from entries in stored order. A group ends when the
 * timestamp changes or the rank stops increasing, so a Reading appended twice
 * at the same instant comes back as two Readings.
 */
export function groupEntries(entries: LogEntry[]): Reading[] {
    const readings: Reading[] = [];
    let current: Reading | undefined;
    let lastRank = 0;
    for (const e of entries) {
        if (!current || current.timestamp !== e.timestamp || e.rank <= lastRank) {
            current = { timestamp: e.timestamp, total: e.total, entries: [] };
            readings.push(current);
        }
        current.entries.push({ rank: e.rank, name: e.name, percent: e.percent, votes: e.votes });
        lastRank = e.rank;
    }
    // stable: equal timestamps keep append order
    return readings.sort((a, b) => a.timestamp - b.timestamp);
}

/* ---------- CSV codec ---------- */

function encodeField(value: string) {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function encodeCsvRow(entry: LogEntry): string {
    return [
        new Date(entry.timestamp).toISOString(),
        String(entry.total),
        String(entry.rank),
        encodeField(entry.name),
        entry.percent.toFixed(6),
        String(entry.votes),
    ].join(",");
}

export function csvHeader() {
    return LOG_COLUMNS.join(",");
}

// Splits one CSV line honouring double-quoted fields; returns null on an unterminated quote.
export function splitCsvLine(line: string): string[] | null {
    const fields: string[] = [];
    let field = "";
    let quoted = false;
    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (quoted) {
            if (ch === '"') {
                if (line[i + 1] === '"') {
                    field += '"';
                    i++;
                } else quoted = false;
            } else field += ch;
        } else if (ch === '"') quoted = true;
        else if (ch === ",") {
            fields.push(field);
            field = "";
        } else field += ch;
    }
    if (quoted) return null;
    fields.push(field);
    return fields;
}

/**
 * Split file text into records, keeping line breaks that sit inside a quoted
 * field. `line` is the 1-based physical line each record starts on.
 */
export function splitCsvRecords(text: string): { line: number; text: string }[] {
    const records: { line: number; text: string }[] = [];
    let start = 0;
    let startLine = 1;
    let line = 1;
    let quoted = false;
    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (ch === '"') quoted = !quoted;
        else if (ch === "\n") {
            if (!quoted) {
                records.push({ line: startLine, text: text.slice(start, i).replace(/\r$/, "") });
                start = i + 1;
                startLine = line + 1;
            }
            line++;
        }
    }
    if (start < text.length) records.push({ line: startLine, text: text.slice(start).replace(/\r$/, "") });
    return records;
}

export function csvLineToRow(line: string): Record<string, string> | null {
    const fields = splitCsvLine(line);
    if (!fields || fields.length !== LOG_COLUMNS.length) return null;
    const row: Record<string, string> = {};
    LOG_COLUMNS.forEach((col, i) => (row[col] = fields[i]));
    return row;
}
