import chalk from "chalk";

import type { Bench, Routine } from "./bench.js";
import { compare } from "./compare.js";
import { readHistoryConfig } from "./env.js";
import { BenchError, describe } from "./error.js";
import { HistoryStore } from "./history.js";
import { Log, paintFor } from "./log.js";
import { renderTable, type ReportEntry } from "./report.js";
import { hrtime, sample } from "./sampler.js";
import type { Clock, History, Output, Statistics } from "./shared.js";
import { aggregate } from "./stats.js";

export interface BenchesOptions {
    /** Where `BRUNCH_HISTORY` and `NO_BRUNCH_HISTORY` are read from. */
    env?: NodeJS.ProcessEnv;
    /** Receives the results table. Defaults to stdout. */
    out?: Output;
    /** Receives warnings and errors. Defaults to stderr. */
    err?: Output;
    /** Force colour on or off; by default chalk decides. */
    color?: boolean;
    now?: Clock;
}

function measure(routine: Routine, bench: Bench, now: Clock): Statistics | BenchError {
    let samples: number[];
    try {
        samples = sample(routine, bench.samples, bench.timeout, now);
    } catch (e) {
        return new BenchError("BENCH_THREW", `Benchmark threw: ${describe(e)}`, { cause: e });
    }

    if (samples.length === 0) {
        return new BenchError("NO_SAMPLES", "No samples were collected.");
    }

    return aggregate(samples);
}

/**
 * An ordered set of benchmarks, run and reported together.
 *
 * ```ts
 * const suite = new Benches();
 * suite.push(Bench.new("String.length").run(() => "Hello World".length));
 * suite.finish();
 * ```
 */
export class Benches {
    private readonly list: Bench[] = [];

    constructor(private readonly options: BenchesOptions = {}) {}

    get length(): number {
        return this.list.length;
    }

    push(bench: Bench): void {
        this.list.push(bench);
    }

    extend(benches: Iterable<Bench>): void {
        for (const bench of benches) {
            this.push(bench);
        }
    }

    /**
     * Run every bench in order, print the table, and replace the saved
     * history with this run's results.
     *
     * Returns `false` if any bench failed to produce statistics, or if there
     * was nothing to run.
     */
    finish(): boolean {
        const paint = paintFor(this.options.color);
        const log = new Log(this.options.err ?? process.stderr, paint);
        const out = this.options.out ?? process.stdout;
        const now = this.options.now ?? hrtime;

        if (this.list.every(b => b.isSpacer)) {
            log.error(new BenchError("NO_BENCH", "At least one benchmark is required.").message);
            return false;
        }

        const seen = new Set<string>();
        for (const bench of this.list) {
            if (bench.isSpacer) {
                continue;
            }
            if (seen.has(bench.name)) {
                log.warn(`Duplicate benchmark name: ${bench.name}`);
            }
            seen.add(bench.name);
        }

        const store = new HistoryStore(readHistoryConfig(this.options.env), log);
        const last = store.load();
        const next: History = new Map();

        let ok = true;
        const entries: ReportEntry[] = [];
        for (const bench of this.list) {
            if (bench.routine === null) {
                entries.push({ kind: "spacer" });
                continue;
            }

            const result = measure(bench.routine, bench, now);
            if (result instanceof BenchError) {
                ok = false;
                entries.push({ kind: "failed", name: bench.name, error: result });
                continue;
            }

            next.set(bench.name, { mean: result.mean, deviation: result.deviation });
            entries.push({
                kind: "measured",
                name: bench.name,
                stats: result,
                comparison: compare(result, last.get(bench.name))
            });
        }

        out.write(renderTable(entries, paint));
        store.save(next);

        return ok;
    }
}

/**
 * Run `list` as one suite with the default options, announcing the start on
 * stderr and setting a failing exit code if any bench failed.
 */
export function benches(...list: Bench[]): boolean {
    process.stderr.write(`${chalk.bold.ansi256(199)("Starting:")} Running benchmark(s). Stand by!\n\n`);

    const suite = new Benches();
    suite.extend(list);

    const ok = suite.finish();
    if (!ok) {
        process.exitCode = 1;
    }
    return ok;
}
