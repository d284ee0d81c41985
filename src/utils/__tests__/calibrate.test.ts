import { describe, it, expect } from "vitest";
import { calibrate } from "../calibrate";

describe("calibrate", () => {
    it("splits the previous total by share on the first run", () => {
        expect(calibrate([{ name: "A", percent: 60 }, { name: "B", percent: 40 }], 1000, {})).toEqual({
            total: 1000,
            votes: { A: 600, B: 400 },
        });
    });

    it("never lowers a candidate's count", () => {
        const { votes } = calibrate([{ name: "A", percent: 50 }, { name: "B", percent: 50 }], 1000, { A: 600, B: 400 });
        expect(votes).toEqual({ A: 600, B: 500 });
    });

    it("raises the total to the one implied by the floored counts", () => {
        // 600 + 500 = 1100 votes over 100% of shares
        expect(calibrate([{ name: "A", percent: 50 }, { name: "B", percent: 50 }], 1000, { A: 600, B: 400 }).total).toBe(1100);
    });

    it("keeps the previous total when the implied one is lower", () => {
        const result = calibrate([{ name: "A", percent: 49.5 }, { name: "B", percent: 49.5 }], 1000, {});
        // 495 + 495 = 990 over 99% implies 1000 exactly
        expect(result).toEqual({ total: 1000, votes: { A: 495, B: 495 } });
    });

    it("never reports a total below the sum of the counts", () => {
        const result = calibrate([{ name: "A", percent: 50.4 }, { name: "B", percent: 50.4 }], 1000, {});
        // 504 + 504 = 1008 over 100.8% implies 1000, but the counts already sum to 1008
        expect(result.total).toBe(1008);
    });
});
