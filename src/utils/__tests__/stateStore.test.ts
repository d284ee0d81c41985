import fs from "fs";
import path from "path";
import { describe, it, expect, beforeEach, vi } from "vitest";
import { JsonStateStore, projectState } from "../stateStore";
import { CsvLogStore, LogStore } from "../logStore";
import { prepareStores, reconcileState } from "../reconcile";
import { WriteError } from "../errors";
import { MINUTE, T0, mockLogger, reading, tempDir } from "./helpers";

describe("projectState", () => {
    it("projects total, per-candidate votes and timestamp of one reading", () => {
        expect(projectState(reading(T0, { A: 130, B: 50 }, 190))).toEqual({
            currentTotal: 190,
            candidateVotes: { A: 130, B: 50 },
            lastUpdate: T0,
        });
    });
});

describe("JsonStateStore", () => {
    let dir: string;
    let file: string;
    let logger: ReturnType<typeof mockLogger>;
    let store: JsonStateStore;

    beforeEach(() => {
        dir = tempDir();
        file = path.join(dir, "state.json");
        logger = mockLogger();
        store = new JsonStateStore(file, logger);
    });

    it("is absent before the first replace", async () => {
        expect(await store.get()).toBeUndefined();
    });

    it("stores the snake_case document and reads it back", async () => {
        await store.replace(reading(T0, { A: 100, B: 50 }));
        expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual({
            current_total: 150,
            candidate_votes: { A: 100, B: 50 },
            last_update: "2025-10-18T12:00:00.000Z",
        });
        expect(await store.get()).toEqual({ currentTotal: 150, candidateVotes: { A: 100, B: 50 }, lastUpdate: T0 });
    });

    it("replaces every field, dropping candidates the new reading lacks", async () => {
        await store.replace(reading(T0, { A: 100, B: 50 }));
        await store.replace(reading(T0 + MINUTE, { A: 120 }));
        expect(await store.get()).toEqual({ currentTotal: 120, candidateVotes: { A: 120 }, lastUpdate: T0 + MINUTE });
    });

    it("leaves no temp file behind", async () => {
        await store.replace(reading(T0, { A: 1 }));
        expect(fs.readdirSync(dir)).toEqual(["state.json"]);
    });

    it("fails with WriteError and cleans up when the swap cannot happen", async () => {
        fs.mkdirSync(path.join(file, "occupied"), { recursive: true });
        await expect(store.replace(reading(T0, { A: 1 }))).rejects.toBeInstanceOf(WriteError);
        expect(fs.readdirSync(dir)).toEqual(["state.json"]);
    });

    it("treats an unreadable document as absent and warns", async () => {
        fs.writeFileSync(file, "{ not json");
        expect(await store.get()).toBeUndefined();
        fs.writeFileSync(file, JSON.stringify({ current_total: "many", candidate_votes: {}, last_update: "x" }));
        expect(await store.get()).toBeUndefined();
        expect(logger.warn).toHaveBeenCalledTimes(2);
    });
});

describe("reconcileState", () => {
    it("rebuilds a missing state from the latest logged reading", async () => {
        const dir = tempDir();
        const logStore = new CsvLogStore(path.join(dir, "log.csv"), mockLogger());
        const stateStore = new JsonStateStore(path.join(dir, "state.json"), mockLogger());
        await logStore.append(reading(T0, { A: 1 }));
        await logStore.append(reading(T0 + MINUTE, { A: 4, B: 2 }));

        const state = await reconcileState(logStore, stateStore, mockLogger());
        expect(state).toEqual({ currentTotal: 6, candidateVotes: { A: 4, B: 2 }, lastUpdate: T0 + MINUTE });
        expect(await stateStore.get()).toEqual(state);
    });

    it("leaves a state that is already current untouched", async () => {
        const dir = tempDir();
        const logStore = new CsvLogStore(path.join(dir, "log.csv"), mockLogger());
        const stateStore = new JsonStateStore(path.join(dir, "state.json"), mockLogger());
        await logStore.append(reading(T0, { A: 1 }));
        await stateStore.replace(reading(T0, { A: 1 }));
        const logger = mockLogger();

        await reconcileState(logStore, stateStore, logger);
        expect(logger.log).not.toHaveBeenCalled();
    });

    it("returns nothing for an empty log and no state", async () => {
        const dir = tempDir();
        const state = await reconcileState(new CsvLogStore(path.join(dir, "log.csv")), new JsonStateStore(path.join(dir, "s.json")), mockLogger());
        expect(state).toBeUndefined();
    });
});

describe("prepareStores", () => {
    const unreachable = (): LogStore => ({
        append: vi.fn(async () => {}),
        readAll: vi.fn(async () => {
            throw new Error("fetch failed");
        }),
        readRange: vi.fn(async () => []),
        retain: vi.fn(async () => {
            throw new Error("fetch failed");
        }),
    });

    it("logs and carries on when the log cannot be read", async () => {
        const dir = tempDir();
        const logger = mockLogger();
        const state = await prepareStores(unreachable(), new JsonStateStore(path.join(dir, "state.json")), { retentionHours: 24, now: T0 }, logger);

        expect(state).toBeUndefined();
        expect(logger.warn.mock.calls.map((c) => c[0])).toEqual([
            "[Tracker] Log retention failed (fetch failed); keeping the full history",
            "[Tracker] Start-up reconciliation failed (fetch failed); polling anyway",
        ]);
    });

    it("prunes old readings and returns the reconciled state", async () => {
        const dir = tempDir();
        const logStore = new CsvLogStore(path.join(dir, "log.csv"), mockLogger());
        const stateStore = new JsonStateStore(path.join(dir, "state.json"), mockLogger());
        await logStore.append(reading(T0 - 48 * 60 * MINUTE, { A: 1 }));
        await logStore.append(reading(T0 - MINUTE, { A: 3 }));

        const state = await prepareStores(logStore, stateStore, { retentionHours: 24, now: T0 }, mockLogger());
        expect(state).toEqual({ currentTotal: 3, candidateVotes: { A: 3 }, lastUpdate: T0 - MINUTE });
        expect((await logStore.readAll()).map((r) => r.timestamp)).toEqual([T0 - MINUTE]);
    });
});
