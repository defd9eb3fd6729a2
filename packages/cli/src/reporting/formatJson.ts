import { bigintReplacer, type RunReport } from "@vmparity/engine";

/** Format a run report as pretty-printed JSON (bigints as decimal strings). */
export function formatJsonReport(report: RunReport): string {
  return JSON.stringify(
    {
      cancelled: report.cancelled,
      testCount: report.testCount,
      toolCount: report.toolCount,
      skipped: report.skipped.map((e) => ({ sourcePath: e.sourcePath, reason: e.reason })),
      summaries: Object.fromEntries(report.summaries),
      records: report.records,
    },
    bigintReplacer,
    2,
  );
}
