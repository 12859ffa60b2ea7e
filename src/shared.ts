/** Text sink for rendered output; `process.stdout` and `process.stderr` qualify. */
export interface Output {
    write(chunk: string): unknown;
}

/** Monotonic clock in nanoseconds. */
export type Clock = () => bigint;

/** Summary of one benchmark run. All times are in nanoseconds. */
export interface Statistics {
    mean: number;
    deviation: number;
    valid: number;
    total: number;
}

/** The part of {@link Statistics} that survives between runs. */
export interface Estimate {
    mean: number;
    deviation: number;
}

export type History = Map<string, Estimate>;

export type Comparison =
    | { kind: "none" }
    | { kind: "unchanged" }
    | { kind: "changed"; deltaPct: number; sign: "+" | "-" };
