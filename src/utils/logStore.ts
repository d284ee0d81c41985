import fs from "fs";
import path from "path";
import { WriteError, CorruptRecord, describeError, isMissing } from "./errors";
import { csvHeader, csvLineToRow, encodeCsvRow, flattenReading, groupEntries, parseLogRow, splitCsvRecords } from "./logEntries";
import { LogEntry, Logger, Reading } from "../types";

/** Append-only history of Readings. Only the poller writes; anyone may read. */
export interface LogStore {
    append(reading: Reading): Promise<void>;
    readAll(): Promise<Reading[]>;
    readRange(from: number, to: number): Promise<Reading[]>;
    /** Rewrite the log keeping Readings at or after `since`; returns how many were dropped. */
    retain(since: number): Promise<number>;
}

export function inRange(readings: Reading[], from: number, to: number) {
    return readings.filter((r) => r.timestamp >= from && r.timestamp <= to);
}

/**
 * CSV-backed log: one row per candidate per Reading under a
 * `timestamp,total,rank,name,percent,votes` header.
 */
export class CsvLogStore implements LogStore {
    constructor(private readonly filePath: string, private readonly logger: Logger = console) {}

    async append(reading: Reading) {
        const rows = flattenReading(reading).map(encodeCsvRow);
        if (rows.length === 0) return;
        try {
            await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
            const handle = await fs.promises.open(this.filePath, "a");
            try {
                const { size } = await handle.stat();
                const head = size === 0 ? csvHeader() + "\n" : "";
                // whole Reading in one call; appendFile keeps writing until every byte is out
                await handle.appendFile(head + rows.join("\n") + "\n", "utf8");
                await handle.sync();
            } finally {
                await handle.close();
            }
        } catch (err) {
            throw new WriteError("log", `failed to append to ${this.filePath}: ${describeError(err)}`, { cause: err });
        }
    }

    async readAll() {
        return groupEntries(await this.readEntries());
    }

    async readRange(from: number, to: number) {
        return inRange(await this.readAll(), from, to);
    }

    async retain(since: number) {
        const readings = await this.readAll();
        const kept = readings.filter((r) => r.timestamp >= since);
        const dropped = readings.length - kept.length;
        if (dropped === 0) return 0;

        const body = [csvHeader(), ...kept.flatMap((r) => flattenReading(r).map(encodeCsvRow))].join("\n") + "\n";
        const tmp = `${this.filePath}.${process.pid}.tmp`;
        try {
            await fs.promises.writeFile(tmp, body, "utf8");
            await fs.promises.rename(tmp, this.filePath);
        } catch (err) {
            await fs.promises.rm(tmp, { force: true });
            throw new WriteError("log", `failed to rewrite ${this.filePath}: ${describeError(err)}`, { cause: err });
        }
        this.logger.log(`[LogStore] Archived ${dropped} reading(s) older than ${new Date(since).toISOString()}`);
        return dropped;
    }

    private async readEntries(): Promise<LogEntry[]> {
        let text: string;
        try {
            text = await fs.promises.readFile(this.filePath, "utf8");
        } catch (err) {
            if (isMissing(err)) return [];
            throw err;
        }

        const entries: LogEntry[] = [];
        const take = (raw: string, line: number) => {
            const row = csvLineToRow(raw);
            const parsed = row ? parseLogRow(row, line) : new CorruptRecord(line, "wrong number of columns");
            if (parsed instanceof CorruptRecord) this.logger.warn(`[LogStore] Skipping ${parsed.message}`);
            else entries.push(parsed);
        };
        for (const record of splitCsvRecords(text)) {
            if (record.line === 1 || record.text.trim() === "") continue; // header
            const lines = record.text.split(/\r?\n/);
            if (lines.length > 1 && !csvLineToRow(record.text)) {
                // a stray quote ran on into the following rows; take them one by one
                lines.forEach((l, j) => {
                    if (l.trim() !== "") take(l, record.line + j);
                });
            } else take(record.text, record.line);
        }
        return entries;
    }
}
