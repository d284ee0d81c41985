import fs from "fs";
import path from "path";
import { z } from "zod";
import { WriteError, describeError, isMissing } from "./errors";
import { CurrentState, Logger, Reading } from "../types";

export interface StateStore {
    get(): Promise<CurrentState | undefined>;
    /** Replace the whole state with the projection of `reading`; all fields or nothing. */
    replace(reading: Reading): Promise<CurrentState>;
}

export function projectState(reading: Reading): CurrentState {
    const candidateVotes: Record<string, number> = {};
    for (const e of reading.entries) candidateVotes[e.name] = e.votes;
    return { currentTotal: reading.total, candidateVotes, lastUpdate: reading.timestamp };
}

// On-disk shape keeps the snake_case keys consumers already read.
export const stateDocumentSchema = z.object({
    current_total: z.number().int().nonnegative(),
    candidate_votes: z.record(z.number().int().nonnegative()),
    last_update: z.string().refine((s) => Number.isFinite(Date.parse(s)), "unparseable last_update"),
});

export type StateDocument = z.infer<typeof stateDocumentSchema>;

export function toDocument(state: CurrentState): StateDocument {
    return {
        current_total: state.currentTotal,
        candidate_votes: state.candidateVotes,
        last_update: new Date(state.lastUpdate).toISOString(),
    };
}

export function fromDocument(doc: StateDocument): CurrentState {
    return {
        currentTotal: doc.current_total,
        candidateVotes: doc.candidate_votes,
        lastUpdate: Date.parse(doc.last_update),
    };
}

/** JSON snapshot replaced by write-new-then-rename, never edited in place. */
export class JsonStateStore implements StateStore {
    constructor(private readonly filePath: string, private readonly logger: Logger = console) {}

    async get() {
        let text: string;
        try {
            text = await fs.promises.readFile(this.filePath, "utf8");
        } catch (err) {
            if (isMissing(err)) return undefined;
            throw err;
        }
        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (err) {
            this.logger.warn(`[StateStore] Ignoring unreadable state file ${this.filePath}: ${describeError(err)}`);
            return undefined;
        }
        const parsed = stateDocumentSchema.safeParse(json);
        if (!parsed.success) {
            this.logger.warn(`[StateStore] Ignoring invalid state file ${this.filePath}: ${parsed.error.issues[0]?.message}`);
            return undefined;
        }
        return fromDocument(parsed.data);
    }

    async replace(reading: Reading) {
        const state = projectState(reading);
        const tmp = `${this.filePath}.${process.pid}.tmp`;
        try {
            await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
            const handle = await fs.promises.open(tmp, "w");
            try {
                await handle.writeFile(JSON.stringify(toDocument(state), null, 2), "utf8");
                await handle.sync();
            } finally {
                await handle.close();
            }
            await fs.promises.rename(tmp, this.filePath);
        } catch (err) {
            await fs.promises.rm(tmp, { force: true });
            throw new WriteError("state", `failed to replace ${this.filePath}: ${describeError(err)}`, { cause: err });
        }
        return state;
    }
}
