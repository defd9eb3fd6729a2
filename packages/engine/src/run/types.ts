import type { MalformedTestVectorError } from "@vmparity/vectors";

import type { RunRecord, ToolSummary } from "../aggregate/types.js";
import type { LogOrder } from "../compare/types.js";

export type RunState = "idle" | "loading" | "executing" | "summarizing" | "done" | "failed";

export interface RunOptions {
  /** Maximum concurrent tool processes (default 4, at least 1). */
  readonly concurrency?: number;
  /** Per-invocation wall-clock limit (default 30 000 ms). */
  readonly timeoutMs?: number;
  readonly maxStdoutBytes?: number;
  readonly maxStderrBytes?: number;
  readonly logOrder?: LogOrder;
  /** Cancels the run: running tools are killed and queued units dropped. */
  readonly signal?: AbortSignal;
  /** Basename prefixes skipped while discovering vector files. */
  readonly ignorePrefixes?: readonly string[];
}

export interface RunReport {
  readonly state: RunState;
  readonly testCount: number;
  /** Test ids in load order. */
  readonly testIds: readonly string[];
  readonly toolCount: number;
  readonly records: readonly RunRecord[];
  /** Keyed by tool name, in registry order. */
  readonly summaries: ReadonlyMap<string, ToolSummary>;
  /** Vector files skipped as malformed while loading. */
  readonly skipped: readonly MalformedTestVectorError[];
  readonly cancelled: boolean;
}
