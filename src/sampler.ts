import type { Routine } from "./bench.js";
import type { Clock } from "./shared.js";

let sink: unknown;

/**
 * Hand a value to the optimizer as if it were observed, so the call that
 * produced it is not dropped as dead code.
 */
export function blackbox<T>(x: T): T {
    sink = x;
    return x;
}

export const hrtime: Clock = () => process.hrtime.bigint();

/**
 * Time `routine` once per iteration until `samples` calls have been made or
 * more than `timeout` milliseconds have passed since sampling began.
 *
 * The budget is checked between calls, so the loop can overrun it by one
 * call, and at least one sample is always collected.
 *
 * Returns per-call durations in nanoseconds, in the order they were taken.
 */
export function sample(routine: Routine, samples: number, timeout: number, now: Clock = hrtime): number[] {
    const times: number[] = [];
    const limit = BigInt(Math.ceil(timeout * 1e6));
    const begin = now();

    while (times.length < samples) {
        // Seed clones and factory output are made before the clock starts.
        const call = routine.kind === "plain" ? routine.run : routine.prepare();

        const start = now();
        blackbox(call());
        const end = now();

        times.push(Number(end - start));

        if (end - begin > limit) {
            break;
        }
    }

    return times;
}
