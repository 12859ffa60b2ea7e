import { describe, expect, it } from "vitest";

import { BenchError } from "../src/error.js";
import { aggregate, Stats } from "../src/stats.js";

const range = (from: number, to: number) => Array.from({ length: to - from + 1 }, (_, i) => from + i);

describe("Stats", () => {
    it("computes mean and population deviation", () => {
        const sample = [2, 4, 4, 4, 5, 5, 7, 9];
        const mean = Stats.mean(sample);
        expect(mean).toBe(5);
        expect(Stats.variance(sample, mean)).toBe(4);
        expect(Stats.stdDev(sample, mean)).toBe(2);
    });

    it("uses nearest-rank cut indices", () => {
        expect(Stats.sorted.rank(100, 0.05)).toBe(5);
        expect(Stats.sorted.rank(100, 0.95)).toBe(94);
        expect(Stats.sorted.rank(20, 0.05)).toBe(1);
        expect(Stats.sorted.rank(20, 0.95)).toBe(18);
    });
});

describe("aggregate", () => {
    it("keeps every sample below twenty", () => {
        const stats = aggregate(range(1, 10).reverse());
        expect(stats.total).toBe(10);
        expect(stats.valid).toBe(10);
        expect(stats.mean).toBe(5.5);
        expect(stats.deviation).toBeCloseTo(Math.sqrt(8.25), 12);
    });

    it("trims to the 5th..95th percentile interval", () => {
        const stats = aggregate(range(1, 100));
        expect(stats.total).toBe(100);
        expect(stats.valid).toBe(90);
        // indices 5..94 hold the values 6..95
        expect(stats.mean).toBe(50.5);
    });

    it("drops outliers at exactly twenty samples", () => {
        const samples = [1000, ...Array<number>(18).fill(10), 1];
        const stats = aggregate(samples);
        expect(stats).toEqual({ mean: 10, deviation: 0, valid: 18, total: 20 });
    });

    it("does not reorder the caller's samples", () => {
        const samples = [3, 1, 2];
        aggregate(samples);
        expect(samples).toEqual([3, 1, 2]);
    });

    it("handles a single sample", () => {
        expect(aggregate([42])).toEqual({ mean: 42, deviation: 0, valid: 1, total: 1 });
    });

    it("bounds the number of trimmed samples", () => {
        for (const total of [20, 21, 39, 40, 99, 101, 2500, 2501]) {
            const stats = aggregate(range(1, total));
            expect(stats.valid).toBeLessThanOrEqual(total);
            expect(stats.valid).toBeGreaterThanOrEqual(total - 2 * Math.ceil(0.05 * total));
        }
    });

    it("never trims below the stability threshold", () => {
        for (let total = 1; total < 20; total++) {
            expect(aggregate(range(1, total)).valid).toBe(total);
        }
    });

    it("fails without samples", () => {
        expect(() => aggregate([])).toThrow(BenchError);
    });
});
