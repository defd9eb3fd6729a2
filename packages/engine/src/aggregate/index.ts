export { BenchmarkAggregator } from "./benchmarkAggregator.js";
export { mean, quantileSorted } from "./stats.js";
export type { RunRecord, ToolSummary } from "./types.js";
