import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { Output } from "./shared.js";

/**
 * Chalk for the given colour preference; `undefined` keeps chalk's own
 * terminal detection.
 */
export function paintFor(color?: boolean): ChalkInstance {
    if (color === undefined) {
        return chalk;
    }
    return new Chalk({ level: color ? (chalk.level > 0 ? chalk.level : 1) : 0 });
}

/** Operator-facing notices, one line each. */
export class Log {
    constructor(
        private readonly out: Output,
        private readonly paint: ChalkInstance
    ) {}

    warn(message: string): void {
        this.out.write(`${this.paint.yellow("Warning:")} ${message}\n`);
    }

    error(message: string): void {
        this.out.write(`${this.paint.bold.red("Error:")} ${message}\n`);
    }
}
