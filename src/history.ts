import path from "path";
import sfs from "fs";

import type { HistoryConfig } from "./env.js";
import { describe } from "./error.js";
import type { Log } from "./log.js";
import type { History } from "./shared.js";

const decoder = new TextDecoder("utf-8", { fatal: true });

interface Parsed {
    history: History;
    skipped: number;
}

function errorCode(e: unknown): string | undefined {
    return e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;
}

function readNumber(field: string): number | null {
    if (field.trim() === "") {
        return null;
    }

    const value = Number(field);
    return Number.isFinite(value) && value >= 0 ? value : null;
}

/** One `name\tmean\tdeviation` line per entry, sorted by name. */
export function serialize(history: History): string {
    const entries = [...history].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    let out = "";
    for (const [name, { mean, deviation }] of entries) {
        out += `${name}\t${mean}\t${deviation}\n`;
    }
    return out;
}

/**
 * Parse history text. Lines that don't hold a name and two non-negative
 * finite numbers are skipped and counted; blank lines are ignored.
 */
export function deserialize(text: string): Parsed {
    const history: History = new Map();
    let skipped = 0;

    for (const line of text.split(/\r?\n/)) {
        if (line.trim() === "") {
            continue;
        }

        const fields = line.split("\t");
        const name = fields[0].trim();
        const mean = fields.length === 3 ? readNumber(fields[1]) : null;
        const deviation = fields.length === 3 ? readNumber(fields[2]) : null;

        if (name === "" || mean === null || deviation === null) {
            ++skipped;
            continue;
        }

        history.set(name, { mean, deviation });
    }

    return { history, skipped };
}

/**
 * The single "last run" file. Nothing here throws: read and write problems
 * become warnings and an empty (or unsaved) history.
 */
export class HistoryStore {
    constructor(
        private readonly config: HistoryConfig,
        private readonly log: Log
    ) {}

    load(): History {
        if (this.config.disabled) {
            return new Map();
        }

        let fd: number;
        try {
            fd = sfs.openSync(this.config.path, "r");
        } catch (e) {
            if (errorCode(e) !== "ENOENT") {
                this.log.warn(`Unable to open history ${this.config.path}: ${describe(e)}`);
            }
            return new Map();
        }

        let text: string;
        try {
            text = decoder.decode(sfs.readFileSync(fd));
        } catch (e) {
            this.log.warn(`Unable to read history ${this.config.path}: ${describe(e)}`);
            return new Map();
        } finally {
            sfs.closeSync(fd);
        }

        const { history, skipped } = deserialize(text);
        if (skipped > 0) {
            this.log.warn(`Skipped ${skipped} malformed line(s) in history ${this.config.path}.`);
        }

        return history;
    }

    /** Replace the file with `history`, via a temporary sibling and a rename. */
    save(history: History): void {
        if (this.config.disabled) {
            return;
        }

        const target = this.config.path;
        const temp = `${target}.${process.pid}.tmp`;
        let opened = false;
        try {
            sfs.mkdirSync(path.dirname(target), { recursive: true });

            const fd = sfs.openSync(temp, "w");
            opened = true;
            try {
                sfs.writeFileSync(fd, serialize(history));
            } finally {
                sfs.closeSync(fd);
            }

            sfs.renameSync(temp, target);
        } catch (e) {
            this.log.warn(`Unable to save history ${target}: ${describe(e)}`);
            if (opened) {
                this.discard(temp);
            }
        }
    }

    private discard(temp: string): void {
        try {
            sfs.rmSync(temp, { force: true });
        } catch (e) {
            this.log.warn(`Unable to remove ${temp}: ${describe(e)}`);
        }
    }
}
