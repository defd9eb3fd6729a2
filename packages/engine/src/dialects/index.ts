import { UnparsableOutputError } from "../errors.js";
import type { ExitedOutcome } from "../process/types.js";
import type { ToolDialect, ToolEntry } from "../registry/toolRegistry.js";
import { jsonDialect } from "./jsonDialect.js";
import { textDialect } from "./textDialect.js";
import type { ExecutionResult, OutputDialect } from "./types.js";

export type { DialectParseResult, ExecutionResult, OutputDialect, ParsedToolOutput } from "./types.js";
export { jsonDialect } from "./jsonDialect.js";
export { textDialect } from "./textDialect.js";

const DIALECTS: Readonly<Record<ToolDialect, OutputDialect>> = {
  json: jsonDialect,
  text: textDialect,
};

export function getDialect(tag: ToolDialect): OutputDialect {
  return DIALECTS[tag];
}

/**
 * Map one completed invocation onto the canonical {@link ExecutionResult}
 * using the tool's declared dialect.
 *
 * Throws {@link UnparsableOutputError} when stdout does not match the dialect.
 */
export function normalizeOutput(tool: ToolEntry, raw: ExitedOutcome): ExecutionResult {
  const parsed = getDialect(tool.dialect).parse(raw.stdout);
  if (!parsed.ok) {
    throw new UnparsableOutputError(tool.name, parsed.reason, raw.stdout);
  }

  return {
    ...parsed.value,
    rawDurationNanos: raw.durationNanos,
    exitCode: raw.exitCode,
    stderrText: raw.stderr,
  };
}
