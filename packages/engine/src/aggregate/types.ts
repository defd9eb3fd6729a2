import type { Verdict, VerdictKind } from "../compare/types.js";

/** One (tool, test) outcome. Written once, never edited. */
export interface RunRecord {
  readonly toolName: string;
  readonly testId: string;
  readonly verdict: Verdict;
  /** Wall-clock time of the tool process. */
  readonly durationNanos: number;
  /** VM time the tool reported itself, when its dialect carries one. */
  readonly reportedDurationNanos?: number;
}

export interface ToolSummary {
  readonly toolName: string;
  readonly count: number;
  readonly passCount: number;
  /** `passCount / count`; `0` when nothing was recorded. */
  readonly passRate: number;
  readonly meanDurationNanos: number;
  readonly minDurationNanos: number;
  readonly maxDurationNanos: number;
  readonly p50DurationNanos: number;
  readonly p95DurationNanos: number;
  /** Records that carried a tool-reported VM time. */
  readonly reportedCount: number;
  /** Over `reportedCount` records only; `0` when there are none. */
  readonly meanReportedDurationNanos: number;
  readonly minReportedDurationNanos: number;
  readonly maxReportedDurationNanos: number;
  readonly verdictCounts: Readonly<Record<VerdictKind, number>>;
}
