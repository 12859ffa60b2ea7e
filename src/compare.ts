import type { Comparison, Estimate, Statistics } from "./shared.js";

/** A change must exceed this many of the current run's deviations to count. */
export const SIGNIFICANCE = 2;

/**
 * Compare this run against the last one.
 *
 * The gate uses the current run's deviation: a shift in mean that stays
 * within `2 * current.deviation` is reported as unchanged. A previous mean
 * of zero gives no usable percentage and is treated as no history.
 */
export function compare(current: Statistics, previous: Estimate | undefined): Comparison {
    if (previous === undefined || previous.mean === 0) {
        return { kind: "none" };
    }

    const diff = current.mean - previous.mean;
    if (Math.abs(diff) <= SIGNIFICANCE * current.deviation) {
        return { kind: "unchanged" };
    }

    return {
        kind: "changed",
        deltaPct: (diff * 100) / previous.mean,
        sign: diff > 0 ? "+" : "-"
    };
}
