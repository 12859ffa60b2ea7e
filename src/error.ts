export type BenchErrorReason =
    | "NAME_REQUIRED"
    | "NAME_TOO_LONG"
    | "INVALID_SAMPLES"
    | "INVALID_TIMEOUT"
    | "NO_SAMPLES"
    | "BENCH_THREW"
    | "NO_BENCH";

export class BenchError extends Error {
    readonly reason: BenchErrorReason;

    constructor(reason: BenchErrorReason, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "BenchError";
        this.reason = reason;
    }
}

export function describe(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
