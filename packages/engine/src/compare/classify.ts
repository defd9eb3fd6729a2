import type { TestCase } from "@vmparity/vectors";

import { normalizeOutput } from "../dialects/index.js";
import type { ExecutionResult } from "../dialects/types.js";
import { UnparsableOutputError } from "../errors.js";
import type { RawOutcome } from "../process/types.js";
import type { ToolEntry } from "../registry/toolRegistry.js";
import { compareResult } from "./compare.js";
import type { CompareOptions, Verdict } from "./types.js";

export interface ClassifiedOutcome {
  readonly verdict: Verdict;
  /** Present whenever the output could be normalized. */
  readonly result?: ExecutionResult;
}

/** Outcomes that produce a verdict; cancelled invocations are never classified. */
export type ClassifiableOutcome = Exclude<RawOutcome, { kind: "cancelled" }>;

function joinReason(reason: string, stderr: string): string {
  const trimmed = stderr.trimEnd();
  return trimmed.length === 0 ? reason : `${reason}\n${trimmed}`;
}

/**
 * Turn one raw invocation into a verdict.
 *
 * Output that parses is compared even when the tool exited non-zero; only
 * unparsable output falls back to the exit status.
 */
export function classifyOutcome(
  tool: ToolEntry,
  raw: ClassifiableOutcome,
  testCase: TestCase,
  options: CompareOptions = {},
): ClassifiedOutcome {
  switch (raw.kind) {
    case "timeout":
      return { verdict: { kind: "timeout", timeoutMs: raw.timeoutMs } };

    case "failed":
      return { verdict: { kind: "toolError", exitCode: null, stderr: joinReason(raw.reason, raw.stderr) } };

    case "exited": {
      let result: ExecutionResult;
      try {
        result = normalizeOutput(tool, raw);
      } catch (err) {
        if (!(err instanceof UnparsableOutputError)) throw err;
        if (raw.exitCode !== 0) {
          return { verdict: { kind: "toolError", exitCode: raw.exitCode, stderr: raw.stderr } };
        }
        return { verdict: { kind: "loadError", reason: err.reason } };
      }
      return { verdict: compareResult(result, testCase, options), result };
    }
  }
}
