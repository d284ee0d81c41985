export class TrackerError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type FetchFailureReason = "network" | "timeout" | "http" | "malformed";

/** The provider could not be reached, or answered with something we cannot commit. */
export class FetchFailure extends TrackerError {
    constructor(public readonly reason: FetchFailureReason, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class WriteError extends TrackerError {
    constructor(public readonly target: "log" | "state", message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class CorruptRecord extends TrackerError {
    constructor(public readonly line: number, public readonly reason: string) {
        super(`corrupt record at line ${line}: ${reason}`);
    }
}

export class ConfigError extends TrackerError {}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function isMissing(err: unknown) {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
}
