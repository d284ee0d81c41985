// Vote-count estimation for feeds that publish only vote shares.
// Counts are anchored on the previous total and never move backwards.

export interface ShareInput {
    name: string;
    percent: number;
}

export interface CalibrationResult {
    total: number;
    votes: Record<string, number>;
}

function estimate(shares: ShareInput[], total: number, previous: Record<string, number>) {
    const votes: Record<string, number> = {};
    for (const s of shares) {
        votes[s.name] = Math.max(Math.round((s.percent / 100) * total), previous[s.name] ?? 0);
    }
    return votes;
}

function sum(values: number[]) {
    return values.reduce((a, b) => a + b, 0);
}

/**
 * 1. votes = share × previous total, floored by each candidate's previous count
 * 2. implied total = sum(votes) / sum(shares) × 100
 * 3. the total only grows: a higher implied total replaces the previous one,
 *    and it is never below the sum of the estimated votes
 */
export function calibrate(shares: ShareInput[], previousTotal: number, previousVotes: Record<string, number>): CalibrationResult {
    const votes = estimate(shares, previousTotal, previousVotes);
    const voteSum = sum(Object.values(votes));
    const shareSum = sum(shares.map((s) => s.percent));
    const implied = shareSum > 0 ? Math.round((voteSum / shareSum) * 100) : 0;

    return { total: Math.max(previousTotal, implied, voteSum), votes };
}
