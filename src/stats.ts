import { BenchError } from "./error.js";
import type { Statistics } from "./shared.js";

/** Below this many samples, quantile trimming is too unstable to apply. */
export const MIN_TRIM_SAMPLES = 20;
export const LOW_QUANTILE = 0.05;
export const HIGH_QUANTILE = 0.95;

export namespace Stats {
    export function mean(sample: readonly number[]): number {
        return sample.reduce((a, b) => a + b, 0) / sample.length;
    }

    /** Population variance (divides by n). */
    export function variance(sample: readonly number[], mean: number): number {
        let sum = 0;
        for (let i = 0; i < sample.length; ++i) {
            sum += (sample[i] - mean) ** 2;
        }
        return sum / sample.length;
    }

    export function stdDev(sample: readonly number[], mean: number): number {
        return Math.sqrt(variance(sample, mean));
    }

    // invariant: sample must be sorted
    export namespace sorted {
        /** Nearest-rank index of quantile `p` (0..1). */
        export function rank(length: number, p: number): number {
            return Math.round(p * (length - 1));
        }

        /**
         * Keep the closed interval between the 5th and 95th percentile ranks.
         * Samples shorter than {@link MIN_TRIM_SAMPLES} are returned whole.
         */
        export function trim(sample: readonly number[]): readonly number[] {
            if (sample.length < MIN_TRIM_SAMPLES) {
                return sample;
            }

            const lo = rank(sample.length, LOW_QUANTILE);
            const hi = rank(sample.length, HIGH_QUANTILE);
            return sample.slice(lo, hi + 1);
        }
    }
}

/**
 * Summarize raw per-call durations (nanoseconds) into trimmed statistics.
 */
export function aggregate(samples: readonly number[]): Statistics {
    if (samples.length === 0) {
        throw new BenchError("NO_SAMPLES", "No samples were collected.");
    }

    const ordered = [...samples].sort((a, b) => a - b);
    const valid = Stats.sorted.trim(ordered);
    const mean = Stats.mean(valid);

    return {
        mean,
        deviation: Stats.stdDev(valid, mean),
        valid: valid.length,
        total: samples.length
    };
}
