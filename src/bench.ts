import { BenchError } from "./error.js";

export const DEFAULT_SAMPLES = 2500;
/** Milliseconds. */
export const DEFAULT_TIMEOUT = 10_000;
export const MAX_SAMPLES = 4_294_967_295;
export const MAX_NAME_BYTES = 65_535;

const encoder = new TextEncoder();
const BRAND = Symbol.for("brunch.bench");

/**
 * How a bench invokes its callback.
 *
 * For `cloned` and `factory` routines, `prepare` does the untimed setup
 * (cloning the seed or calling the factory) and hands back the call to time.
 */
export type Routine =
    | { readonly kind: "plain"; readonly run: () => unknown }
    | { readonly kind: "cloned"; readonly prepare: () => () => unknown }
    | { readonly kind: "factory"; readonly prepare: () => () => unknown };

interface BenchInit {
    name: string;
    samples: number;
    timeout: number;
    routine: Routine | null;
}

/**
 * Collapse internal whitespace and trim, rejecting names that are empty or
 * too long to persist.
 */
export function normalizeName(name: string): string {
    const normalized = name.replace(/\s+/g, " ").trim();
    if (normalized.length === 0) {
        throw new BenchError("NAME_REQUIRED", "Benchmark name is required.");
    }

    const bytes = encoder.encode(normalized).length;
    if (bytes > MAX_NAME_BYTES) {
        throw new BenchError(
            "NAME_TOO_LONG",
            `Benchmark name is ${bytes} bytes; the limit is ${MAX_NAME_BYTES}.`
        );
    }

    return normalized;
}

/**
 * A single benchmark, or a spacer.
 *
 * Instances are frozen; build them with {@link Bench.new} and finish the
 * chain with one of the `run` methods.
 *
 * ```ts
 * Bench.new("Math.sqrt(2)").withSamples(5000).run(() => Math.sqrt(2));
 * ```
 */
export class Bench {
    readonly name: string;
    readonly samples: number;
    /** Milliseconds. */
    readonly timeout: number;
    /** `null` for spacers. */
    readonly routine: Routine | null;

    constructor(init: BenchInit) {
        this.name = init.name;
        this.samples = init.samples;
        this.timeout = init.timeout;
        this.routine = init.routine;
        Object.defineProperty(this, BRAND, { value: true });
        Object.freeze(this);
    }

    static new(name: string): BenchBuilder {
        return new BenchBuilder(normalizeName(name), DEFAULT_SAMPLES, DEFAULT_TIMEOUT);
    }

    /** A line break in the results table. */
    static spacer(): Bench {
        return new Bench({
            name: "",
            samples: DEFAULT_SAMPLES,
            timeout: DEFAULT_TIMEOUT,
            routine: null
        });
    }

    /** Recognizes benches built by any loaded copy of this package. */
    static is(value: unknown): value is Bench {
        return typeof value === "object" && value !== null && BRAND in value;
    }

    get isSpacer(): boolean {
        return this.routine === null;
    }
}

export class BenchBuilder {
    constructor(
        readonly name: string,
        readonly samples: number,
        readonly timeout: number
    ) {
        Object.freeze(this);
    }

    /** Stop after this many samples (default 2,500). */
    withSamples(samples: number): BenchBuilder {
        if (!Number.isInteger(samples) || samples < 1 || samples > MAX_SAMPLES) {
            throw new BenchError(
                "INVALID_SAMPLES",
                `Sample count must be an integer between 1 and ${MAX_SAMPLES} (got ${samples}).`
            );
        }

        return new BenchBuilder(this.name, samples, this.timeout);
    }

    /** Stop once this many milliseconds have elapsed (default 10 seconds). */
    withTimeout(timeout: number): BenchBuilder {
        if (!Number.isFinite(timeout) || timeout <= 0) {
            throw new BenchError(
                "INVALID_TIMEOUT",
                `Timeout must be a positive number of milliseconds (got ${timeout}).`
            );
        }

        return new BenchBuilder(this.name, this.samples, timeout);
    }

    run(cb: () => unknown): Bench {
        return this.finish({ kind: "plain", run: cb });
    }

    /**
     * Pass a fresh `structuredClone` of `seed` to each call, so mutations
     * never carry over from one sample to the next.
     */
    runSeeded<I>(seed: I, cb: (seed: I) => unknown): Bench {
        return this.finish({
            kind: "cloned",
            prepare: () => {
                const input = structuredClone(seed);
                return () => cb(input);
            }
        });
    }

    /** Build the input for each call with `factory`. */
    runSeededWith<I>(factory: () => I, cb: (seed: I) => unknown): Bench {
        return this.finish({
            kind: "factory",
            prepare: () => {
                const input = factory();
                return () => cb(input);
            }
        });
    }

    private finish(routine: Routine): Bench {
        return new Bench({
            name: this.name,
            samples: this.samples,
            timeout: this.timeout,
            routine
        });
    }
}
