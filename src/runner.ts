import path from "path";
import { pathToFileURL } from "url";
import glob from "fast-glob";
import escalade from "escalade";
import { tsImport } from "tsx/esm/api";

import { Bench } from "./bench.js";
import { Benches, type BenchesOptions } from "./benches.js";
import { describe } from "./error.js";
import { Log, paintFor } from "./log.js";

export const BENCH_DIR = "benches";
export const BENCH_PATTERN = "**/*.{js,mjs,ts,mts}";

/** Walk up from `cwd` to the first directory holding a `benches` folder. */
export async function findRoot(cwd: string): Promise<string | null> {
    const root = await escalade(cwd, (dir, names) => {
        if (names.includes(BENCH_DIR)) {
            return dir;
        }
    });

    return typeof root === "string" ? root : null;
}

/** Bench files under `<root>/benches`, sorted by path. */
export async function findBenchFiles(root: string): Promise<string[]> {
    const files = await glob(BENCH_PATTERN, {
        cwd: path.join(root, BENCH_DIR),
        absolute: true,
        ignore: ["**/*.d.ts", "**/*.d.mts", "**/node_modules/**"]
    });

    return files.sort();
}

/** The benches a module default-exports, or `null` if it exports anything else. */
export function benchesOf(mod: unknown): Bench[] | null {
    if (typeof mod !== "object" || mod === null || !("default" in mod)) {
        return null;
    }

    const list = mod.default;
    if (!Array.isArray(list)) {
        return null;
    }

    const items: readonly unknown[] = list;
    const out: Bench[] = [];
    for (const item of items) {
        if (!Bench.is(item)) {
            return null;
        }
        out.push(item);
    }
    return out;
}

/**
 * Import one bench file and run its benches as a suite.
 *
 * Files load through tsx, so `.ts` benches run from the compiled bin too.
 */
export async function runFile(file: string, options: BenchesOptions = {}): Promise<boolean> {
    const log = new Log(options.err ?? process.stderr, paintFor(options.color));

    let mod: unknown;
    try {
        mod = await tsImport(pathToFileURL(file).href, import.meta.url);
    } catch (e) {
        log.error(`could not load ${file}: ${describe(e)}`);
        return false;
    }

    const list = benchesOf(mod);
    if (list === null) {
        log.error(`${file} must default-export an array of benches`);
        return false;
    }

    const suite = new Benches(options);
    suite.extend(list);
    return suite.finish();
}
