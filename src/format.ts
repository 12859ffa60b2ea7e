import type { ChalkInstance } from "chalk";

const fixed = new Intl.NumberFormat("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2
});

const whole = new Intl.NumberFormat("en-US", {
    maximumFractionDigits: 0
});

// Below 1,000 once rounded to two decimals.
function fits(value: number): boolean {
    return Math.round(value * 100) < 100_000;
}

/** Nanoseconds, rescaled to s, ms, µs or ns by magnitude. */
export function formatTime(ns: number): string {
    if (fits(ns)) {
        return fixed.format(ns) + " ns";
    } else if (fits(ns / 1e3)) {
        return fixed.format(ns / 1e3) + " µs";
    } else if (fits(ns / 1e6)) {
        return fixed.format(ns / 1e6) + " ms";
    } else {
        return fixed.format(ns / 1e9) + " s ";
    }
}

export function formatChange(pct: number): string {
    if (pct > 0) {
        return `+${fixed.format(pct)}%`;
    } else if (pct === 0) {
        return `0.00%`;
    } else {
        return `-${fixed.format(-pct)}%`;
    }
}

export function formatCount(n: number): string {
    return whole.format(n);
}

/**
 * Dim the qualifying part of a name: up to the last `.` before the call
 * parens, e.g. `Array.prototype.` in `Array.prototype.sort(100)`.
 */
export function formatName(name: string, paint: ChalkInstance): string {
    const paren = name.lastIndexOf("(");
    const head = paren === -1 ? name : name.slice(0, paren);
    const dot = head.lastIndexOf(".");

    if (dot !== -1) {
        return paint.dim(name.slice(0, dot + 1)) + name.slice(dot + 1);
    } else if (paren > 0) {
        return paint.dim(name.slice(0, paren)) + name.slice(paren);
    } else {
        return paint.dim(name);
    }
}
