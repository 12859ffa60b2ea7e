export { Bench, BenchBuilder, DEFAULT_SAMPLES, DEFAULT_TIMEOUT, MAX_NAME_BYTES, normalizeName } from "./bench.js";
export type { Routine } from "./bench.js";
export { Benches, benches } from "./benches.js";
export type { BenchesOptions } from "./benches.js";
export { compare } from "./compare.js";
export { BenchError } from "./error.js";
export type { BenchErrorReason } from "./error.js";
export { HISTORY_FILE, readHistoryConfig } from "./env.js";
export type { HistoryConfig } from "./env.js";
export { HistoryStore } from "./history.js";
export { renderTable } from "./report.js";
export type { ReportEntry } from "./report.js";
export { blackbox, sample } from "./sampler.js";
export { aggregate } from "./stats.js";
export type { Clock, Comparison, Estimate, History, Output, Statistics } from "./shared.js";
