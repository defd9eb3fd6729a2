import type { MismatchDetail, Verdict } from "./types.js";

/** `JSON.stringify` replacer that writes bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

function firstLine(text: string): string {
  const line = text.split(/\r?\n/).find((l) => l.trim().length > 0);
  return line === undefined ? "(no stderr)" : line.trim();
}

function describeLocation(detail: MismatchDetail): string {
  switch (detail.scope) {
    case "account":
      return `account ${detail.address ?? "?"}`;
    case "resource":
      return "resource";
    case "log":
      return detail.index === undefined ? "logs" : `log[${detail.index}]`;
  }
}

/** One-line diagnosis of a verdict, e.g. `Mismatch: account 0xaa balance: expected 100, actual 99`. */
export function formatVerdict(verdict: Verdict): string {
  switch (verdict.kind) {
    case "pass":
      return "Pass";
    case "mismatch": {
      const { detail, divergenceCount } = verdict;
      const more = divergenceCount > 1 ? ` (+${divergenceCount - 1} more)` : "";
      return `Mismatch: ${describeLocation(detail)} ${detail.field}: expected ${detail.expected}, actual ${detail.actual}${more}`;
    }
    case "toolError":
      return `ToolError (exit ${verdict.exitCode ?? "none"}): ${firstLine(verdict.stderr)}`;
    case "timeout":
      return `Timeout after ${verdict.timeoutMs} ms`;
    case "loadError":
      return `LoadError: ${verdict.reason}`;
  }
}
