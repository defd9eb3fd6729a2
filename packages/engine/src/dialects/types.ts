import type { LogEntry, StateMap, TestCase } from "@vmparity/vectors";

import type { ToolDialect } from "../registry/toolRegistry.js";

/** Canonical execution result, identical in shape for every dialect. */
export interface ExecutionResult {
  readonly postState: StateMap;
  /** Resource (gas) usage reported by the tool; `0n` when it reports none. */
  readonly resourceUsed: bigint;
  readonly logs: readonly LogEntry[];
  /** Wall-clock time of the whole child process. */
  readonly rawDurationNanos: number;
  /** VM time the tool measured itself, when its dialect carries one. */
  readonly reportedDurationNanos?: number;
  readonly exitCode: number;
  readonly stderrText: string;
}

/** The dialect-specific part of an {@link ExecutionResult}. */
export interface ParsedToolOutput {
  readonly postState: StateMap;
  readonly resourceUsed: bigint;
  readonly logs: readonly LogEntry[];
  readonly reportedDurationNanos?: number;
}

export type DialectParseResult =
  | { readonly ok: true; readonly value: ParsedToolOutput }
  | { readonly ok: false; readonly reason: string };

/**
 * One external output format.
 *
 * A dialect owns both directions of the conversation: what the tool reads on
 * stdin and how its stdout maps onto the canonical result.
 */
export interface OutputDialect {
  readonly tag: ToolDialect;
  encodeInput(testCase: TestCase): Uint8Array;
  parse(stdout: string): DialectParseResult;
}
