import type { VerdictKind } from "../compare/types.js";
import { mean, quantileSorted } from "./stats.js";
import type { RunRecord, ToolSummary } from "./types.js";

function emptyVerdictCounts(): Record<VerdictKind, number> {
  return { pass: 0, mismatch: 0, toolError: 0, timeout: 0, loadError: 0 };
}

/**
 * Append-only log of run records.
 *
 * Appends happen on the event loop, so concurrent units never interleave a
 * write. Summaries are computed from the full log on every call.
 */
export class BenchmarkAggregator {
  #records: RunRecord[] = [];

  record(record: RunRecord): void {
    this.#records.push(Object.freeze({ ...record }));
  }

  get size(): number {
    return this.#records.length;
  }

  /** Snapshot of all records in append order. */
  getRecords(): RunRecord[] {
    return [...this.#records];
  }

  summarize(toolName: string): ToolSummary {
    const verdictCounts = emptyVerdictCounts();
    const durations: number[] = [];
    const reported: number[] = [];

    for (const r of this.#records) {
      if (r.toolName !== toolName) continue;
      durations.push(r.durationNanos);
      if (r.reportedDurationNanos !== undefined) reported.push(r.reportedDurationNanos);
      verdictCounts[r.verdict.kind] += 1;
    }

    const count = durations.length;
    if (count === 0) {
      return {
        toolName,
        count: 0,
        passCount: 0,
        passRate: 0,
        meanDurationNanos: 0,
        minDurationNanos: 0,
        maxDurationNanos: 0,
        p50DurationNanos: 0,
        p95DurationNanos: 0,
        reportedCount: 0,
        meanReportedDurationNanos: 0,
        minReportedDurationNanos: 0,
        maxReportedDurationNanos: 0,
        verdictCounts,
      };
    }

    const sorted = [...durations].sort((a, b) => a - b);
    const sortedReported = [...reported].sort((a, b) => a - b);
    const passCount = verdictCounts.pass;

    return {
      toolName,
      count,
      passCount,
      passRate: passCount / count,
      meanDurationNanos: mean(sorted),
      minDurationNanos: sorted[0] ?? 0,
      maxDurationNanos: sorted[sorted.length - 1] ?? 0,
      p50DurationNanos: quantileSorted(sorted, 0.5),
      p95DurationNanos: quantileSorted(sorted, 0.95),
      reportedCount: sortedReported.length,
      meanReportedDurationNanos: mean(sortedReported),
      minReportedDurationNanos: sortedReported[0] ?? 0,
      maxReportedDurationNanos: sortedReported[sortedReported.length - 1] ?? 0,
      verdictCounts,
    };
  }

  /**
   * Summaries keyed by tool name.
   *
   * Without `toolNames`, every tool seen in the log, in first-seen order. With
   * it, exactly those tools in that order (tools with no records summarize to
   * zeros).
   */
  getSummaries(toolNames?: readonly string[]): Map<string, ToolSummary> {
    const names = toolNames ?? [...new Set(this.#records.map((r) => r.toolName))];
    const out = new Map<string, ToolSummary>();
    for (const name of names) out.set(name, this.summarize(name));
    return out;
  }
}
