import type { ChalkInstance } from "chalk";
import stringWidth from "string-width";

import type { BenchError } from "./error.js";
import { formatChange, formatCount, formatName, formatTime } from "./format.js";
import type { Comparison, Statistics } from "./shared.js";

export type ReportEntry =
    | { kind: "spacer" }
    | { kind: "measured"; name: string; stats: Statistics; comparison: Comparison }
    | { kind: "failed"; name: string; error: BenchError };

type Cells = [name: string, time: string, change: string, samples: string];

type Row =
    | { kind: "spacer" }
    | { kind: "cells"; cells: Cells }
    | { kind: "failed"; name: string; message: string };

const GAP = "    ";

function padEnd(cell: string, width: number): string {
    return cell + " ".repeat(Math.max(0, width - stringWidth(cell)));
}

function padStart(cell: string, width: number): string {
    return " ".repeat(Math.max(0, width - stringWidth(cell))) + cell;
}

function changeCell(comparison: Comparison, paint: ChalkInstance): string {
    switch (comparison.kind) {
        case "none":
            return "";
        case "unchanged":
            return paint.dim("---");
        case "changed": {
            const text = formatChange(comparison.deltaPct);
            return comparison.sign === "+" ? paint.red(text) : paint.green(text);
        }
    }
}

function toRow(entry: ReportEntry, paint: ChalkInstance): Row {
    switch (entry.kind) {
        case "spacer":
            return { kind: "spacer" };
        case "failed":
            return {
                kind: "failed",
                name: formatName(entry.name, paint),
                message: paint.bold.ansi256(208)(entry.error.message)
            };
        case "measured": {
            const { stats } = entry;
            const samples =
                paint.dim(formatCount(stats.valid)) + paint.magenta("/") + paint.dim(formatCount(stats.total));
            return {
                kind: "cells",
                cells: [
                    formatName(entry.name, paint),
                    paint.bold(formatTime(stats.mean)),
                    changeCell(entry.comparison, paint),
                    samples
                ]
            };
        }
    }
}

/**
 * Render the results table.
 *
 * Column widths come from the display width of every cell, so wide and
 * zero-width characters (and colour codes) don't break alignment. Spacers
 * become blank lines and failed rows only size the name column. The Change
 * column is left out when no row has a significant change.
 */
export function renderTable(entries: readonly ReportEntry[], paint: ChalkInstance): string {
    const showChange = entries.some(e => e.kind === "measured" && e.comparison.kind === "changed");
    const columns = showChange ? [0, 1, 2, 3] : [0, 1, 3];

    const heading = (text: string) => paint.bold.magenta(text);
    const header: Row = {
        kind: "cells",
        cells: [heading("Method"), heading("Mean"), heading("Change"), heading("Samples")]
    };
    const rows = [header, ...entries.map(e => toRow(e, paint))];

    const widths = [0, 0, 0, 0];
    for (const row of rows) {
        if (row.kind === "cells") {
            for (const c of columns) {
                widths[c] = Math.max(widths[c], stringWidth(row.cells[c]));
            }
        } else if (row.kind === "failed") {
            widths[0] = Math.max(widths[0], stringWidth(row.name));
        }
    }

    const total = columns.reduce((sum, c) => sum + widths[c], 0) + GAP.length * (columns.length - 1);
    const rule = paint.magenta("-".repeat(total));

    const lines: string[] = [];
    for (const row of rows) {
        switch (row.kind) {
            case "spacer":
                lines.push("");
                break;
            case "failed":
                lines.push(padEnd(row.name, widths[0]) + GAP + row.message);
                break;
            case "cells":
                lines.push(
                    columns
                        .map(c => (c === 0 ? padEnd(row.cells[c], widths[c]) : padStart(row.cells[c], widths[c])))
                        .join(GAP)
                );
                break;
        }

        if (row === header) {
            lines.push(rule);
        }
    }

    return lines.join("\n") + "\n";
}
