import { formatVerdict, type RunRecord, type RunReport, type ToolSummary, type VerdictKind } from "@vmparity/engine";

import { formatMs } from "./formatDuration.js";

const VERDICT_LABELS: Record<VerdictKind, string> = {
  pass: "pass",
  mismatch: "MISMATCH",
  toolError: "ERROR",
  timeout: "TIMEOUT",
  loadError: "UNPARSABLE",
};

function formatCell(record: RunRecord | undefined): string {
  if (record === undefined) return "-";
  if (record.verdict.kind === "pass") {
    return record.reportedDurationNanos === undefined
      ? formatMs(record.durationNanos)
      : `${formatMs(record.reportedDurationNanos)} (vm)`;
  }
  return VERDICT_LABELS[record.verdict.kind];
}

function formatTable(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) => row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd());
}

function formatSummary(s: ToolSummary): string {
  const pct = s.count === 0 ? "0.0" : (s.passRate * 100).toFixed(1);
  const head = `  ${s.toolName}: ${s.passCount}/${s.count} passed (${pct}%)`;
  if (s.count === 0) return head;
  const parts = [
    head,
    `mean ${formatMs(s.meanDurationNanos)}`,
    `min ${formatMs(s.minDurationNanos)}`,
    `max ${formatMs(s.maxDurationNanos)}`,
    `p50 ${formatMs(s.p50DurationNanos)}`,
    `p95 ${formatMs(s.p95DurationNanos)}`,
  ];
  if (s.reportedCount > 0) {
    parts.push(
      `vm mean ${formatMs(s.meanReportedDurationNanos)}`,
      `vm min ${formatMs(s.minReportedDurationNanos)}`,
      `vm max ${formatMs(s.maxReportedDurationNanos)}`,
      `vm reported ${s.reportedCount}/${s.count}`,
    );
  }
  return parts.join(", ");
}

/**
 * Format a run report as plain text: one row per test with the time of every
 * passing tool, the failures with their diagnosis, then a summary per tool.
 *
 * A cell shows the VM time the tool reported, marked `(vm)`, and falls back to
 * process wall-clock time when the tool reported none.
 */
export function formatPrettyReport(report: RunReport): string {
  const toolNames = [...report.summaries.keys()];
  const byUnit = new Map<string, RunRecord>();
  for (const r of report.records) byUnit.set(`${r.toolName}\u0000${r.testId}`, r);

  const lines: string[] = [];
  lines.push(`Ran ${report.testCount} test(s) against ${report.toolCount} tool(s)`);
  if (report.cancelled) lines.push("Run cancelled: results are partial");

  if (report.skipped.length > 0) {
    lines.push("");
    lines.push(`Skipped ${report.skipped.length} malformed file(s):`);
    for (const e of report.skipped) lines.push(`  ${e.sourcePath}: ${e.reason}`);
  }

  lines.push("");
  lines.push(
    ...formatTable([
      ["Test", ...toolNames],
      ...report.testIds.map((id) => [id, ...toolNames.map((t) => formatCell(byUnit.get(`${t}\u0000${id}`)))]),
    ]),
  );
  if (report.records.some((r) => r.reportedDurationNanos !== undefined)) {
    lines.push("(vm) = time reported by the tool; other times are process wall-clock");
  }

  const failures = report.records.filter((r) => r.verdict.kind !== "pass");
  if (failures.length > 0) {
    lines.push("");
    lines.push("Failures:");
    const order = new Map(report.testIds.map((id, i) => [id, i]));
    const sorted = [...failures].sort(
      (a, b) =>
        (order.get(a.testId) ?? 0) - (order.get(b.testId) ?? 0) ||
        toolNames.indexOf(a.toolName) - toolNames.indexOf(b.toolName),
    );
    for (const r of sorted) lines.push(`  ${r.testId} [${r.toolName}] ${formatVerdict(r.verdict)}`);
  }

  lines.push("");
  lines.push("Summary:");
  for (const s of report.summaries.values()) lines.push(formatSummary(s));

  return lines.join("\n");
}
