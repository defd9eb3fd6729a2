export { runPool } from "./pool.js";
export type { RunPoolOptions } from "./pool.js";
export { DEFAULT_CONCURRENCY, RunCoordinator } from "./runCoordinator.js";
export type { RunCoordinatorOptions } from "./runCoordinator.js";
export type { RunOptions, RunReport, RunState } from "./types.js";
