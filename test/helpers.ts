import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Chalk } from "chalk";

import type { Clock, Output } from "../src/shared.js";

export const plain = new Chalk({ level: 0 });

export interface Capture extends Output {
    text(): string;
}

export function capture(): Capture {
    const chunks: string[] = [];
    return {
        write(chunk: string) {
            chunks.push(chunk);
        },
        text: () => chunks.join("")
    };
}

/** A clock that advances by `step` nanoseconds on every reading. */
export function steppingClock(step: bigint): Clock {
    let t = 0n;
    return () => {
        const now = t;
        t += step;
        return now;
    };
}

export function tempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "brunch-test-"));
}
