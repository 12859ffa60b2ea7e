import { describe, expect, it, vi } from "vitest";

import { Bench } from "../src/bench.js";
import type { Routine } from "../src/bench.js";
import { blackbox, sample } from "../src/sampler.js";
import { steppingClock } from "./helpers.js";

function routineOf(bench: Bench): Routine {
    if (bench.routine === null) {
        throw new Error("expected a routine");
    }
    return bench.routine;
}

describe("blackbox", () => {
    it("returns its argument", () => {
        const obj = { a: 1 };
        expect(blackbox(obj)).toBe(obj);
        expect(blackbox(7)).toBe(7);
    });
});

describe("sample", () => {
    it("stops at the sample target", () => {
        const cb = vi.fn(() => 2 + 2);
        const times = sample(routineOf(Bench.new("add(2,2)").run(cb)), 100, 1000);
        expect(times).toHaveLength(100);
        expect(cb).toHaveBeenCalledTimes(100);
        for (const t of times) {
            expect(Number.isInteger(t)).toBe(true);
            expect(t).toBeGreaterThanOrEqual(0);
        }
    });

    it("stops once the timeout is exceeded", () => {
        // 1ms per clock reading: iteration k ends 2k ms after sampling began
        const times = sample(routineOf(Bench.new("x").run(() => 1)), 100, 5, steppingClock(1_000_000n));
        expect(times).toEqual([1_000_000, 1_000_000, 1_000_000]);
    });

    it("always completes the first call", () => {
        const cb = vi.fn(() => 1);
        const times = sample(routineOf(Bench.new("slow").run(cb)), 100, 1, steppingClock(50_000_000n));
        expect(times).toEqual([50_000_000]);
        expect(cb).toHaveBeenCalledTimes(1);
    });

    it("keeps wall time within the timeout plus one call", () => {
        const start = process.hrtime.bigint();
        const times = sample(routineOf(Bench.new("spin").run(() => {
            const until = process.hrtime.bigint() + 2_000_000n;
            while (process.hrtime.bigint() < until) {
                // spin for 2ms
            }
        })), 10_000, 20);
        const elapsed = Number(process.hrtime.bigint() - start);

        const longest = Math.max(...times);
        expect(times.length).toBeLessThan(10_000);
        // generous allowance for the loop's own overhead
        expect(elapsed).toBeLessThanOrEqual(20_000_000 + longest + 10_000_000);
    });

    it("hands each call a fresh clone of the seed", () => {
        const seen: number[] = [];
        const bench = Bench.new("push").runSeeded([0], arr => {
            arr.push(1);
            seen.push(arr.length);
        });

        sample(routineOf(bench), 5, 1000);
        expect(seen).toEqual([2, 2, 2, 2, 2]);
    });

    it("calls the factory once per sample, outside the timed interval", () => {
        let made = 0;
        const factory = vi.fn(() => {
            made++;
            return made;
        });
        const inputs: number[] = [];
        const bench = Bench.new("factory").runSeededWith(factory, n => inputs.push(n));

        // the clock is only read around the call, never while the factory runs
        const clock = vi.fn(steppingClock(10n));
        const times = sample(routineOf(bench), 4, 1000, clock);

        expect(factory).toHaveBeenCalledTimes(4);
        expect(inputs).toEqual([1, 2, 3, 4]);
        expect(times).toEqual([10, 10, 10, 10]);
        expect(clock).toHaveBeenCalledTimes(1 + 2 * 4);
    });

    it("propagates errors thrown by the routine", () => {
        const bench = Bench.new("boom").run(() => {
            throw new Error("boom");
        });
        expect(() => sample(routineOf(bench), 10, 1000)).toThrow("boom");
    });
});
