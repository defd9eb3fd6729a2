import type { AccountState, Address, Hex, StateMap, TestCase } from "@vmparity/vectors";

import type { ExitedOutcome } from "../src/process/types.js";
import type { ToolDialect, ToolEntry } from "../src/registry/toolRegistry.js";

/** A stub VM tool: the current Node binary running an inline script. */
export function nodeTool(name: string, script: string, dialect: ToolDialect = "json"): ToolEntry {
  return { name, executablePath: process.execPath, fixedArgs: ["-e", script], dialect };
}

/** Stub script that prints `body` (as JSON) after draining stdin. */
export function jsonEchoScript(body: unknown): string {
  return [
    "require('fs').readFileSync(0)",
    `process.stdout.write(${JSON.stringify(JSON.stringify(body))})`,
  ].join("; ");
}

export function exited(stdout: string, overrides: Partial<ExitedOutcome> = {}): ExitedOutcome {
  return {
    kind: "exited",
    stdout,
    stderr: "",
    exitCode: 0,
    signal: null,
    durationNanos: 1_000,
    pid: 4242,
    ...overrides,
  };
}

export function account(
  balance: bigint,
  nonce = 0n,
  storage: readonly (readonly [Hex, Hex])[] = [],
): AccountState {
  return { balance, nonce, code: "0x", storage: new Map(storage) };
}

export function state(entries: readonly (readonly [Address, AccountState])[]): StateMap {
  return new Map(entries);
}

/** In-memory test case with an empty input payload. */
export function testCase(id: string, post: StateMap, overrides: Partial<TestCase> = {}): TestCase {
  return {
    id,
    sourcePath: "<memory>",
    preState: post,
    input: new Uint8Array(),
    args: [],
    expectedPostState: post,
    ...overrides,
  };
}
