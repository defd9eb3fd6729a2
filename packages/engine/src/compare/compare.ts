import type { AccountState, LogEntry, StateMap, TestCase } from "@vmparity/vectors";

import type { ExecutionResult } from "../dialects/types.js";
import type { CompareOptions, MismatchDetail, Verdict } from "./types.js";

const ABSENT = "absent";
const PRESENT = "present";

function sortedUnion<T>(a: Iterable<T>, b: Iterable<T>, compare: (x: T, y: T) => number): T[] {
  return [...new Set([...a, ...b])].sort(compare);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareSlots(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

function compareAccount(
  address: string,
  actual: AccountState,
  expected: AccountState,
  out: MismatchDetail[],
): void {
  const push = (field: string, e: string, a: string) => {
    if (e !== a) out.push({ scope: "account", address, field, expected: e, actual: a });
  };

  push("balance", expected.balance.toString(), actual.balance.toString());
  push("nonce", expected.nonce.toString(), actual.nonce.toString());
  push("code", expected.code, actual.code);

  // Zero-valued slots are never stored, so an absent slot reads as 0x0.
  for (const slot of sortedUnion(expected.storage.keys(), actual.storage.keys(), compareSlots)) {
    push(`storage[${slot}]`, expected.storage.get(slot) ?? "0x0", actual.storage.get(slot) ?? "0x0");
  }
}

function compareStates(actual: StateMap, expected: StateMap, out: MismatchDetail[]): void {
  for (const address of sortedUnion(expected.keys(), actual.keys(), compareStrings)) {
    const a = actual.get(address);
    const e = expected.get(address);
    if (a === undefined || e === undefined) {
      out.push({
        scope: "account",
        address,
        field: "presence",
        expected: e === undefined ? ABSENT : PRESENT,
        actual: a === undefined ? ABSENT : PRESENT,
      });
      continue;
    }
    compareAccount(address, a, e, out);
  }
}

function logKey(log: LogEntry): string {
  return `${log.address} [${log.topics.join(",")}] ${log.data}`;
}

function compareLogsStrict(
  actual: readonly LogEntry[],
  expected: readonly LogEntry[],
  out: MismatchDetail[],
): void {
  if (actual.length !== expected.length) {
    out.push({
      scope: "log",
      field: "count",
      expected: String(expected.length),
      actual: String(actual.length),
    });
  }

  const n = Math.min(actual.length, expected.length);
  for (let index = 0; index < n; index++) {
    const a = actual[index];
    const e = expected[index];
    if (a === undefined || e === undefined) continue;

    const push = (field: string, ev: string, av: string) => {
      if (ev !== av) out.push({ scope: "log", index, field, expected: ev, actual: av });
    };
    push("address", e.address, a.address);
    push("topics", `[${e.topics.join(",")}]`, `[${a.topics.join(",")}]`);
    push("data", e.data, a.data);
  }
}

function compareLogsUnordered(
  actual: readonly LogEntry[],
  expected: readonly LogEntry[],
  out: MismatchDetail[],
): void {
  if (actual.length !== expected.length) {
    out.push({
      scope: "log",
      field: "count",
      expected: String(expected.length),
      actual: String(actual.length),
    });
  }

  const remaining = new Map<string, number>();
  for (const log of actual) {
    const key = logKey(log);
    remaining.set(key, (remaining.get(key) ?? 0) + 1);
  }

  for (const log of expected) {
    const key = logKey(log);
    const count = remaining.get(key) ?? 0;
    if (count > 0) {
      remaining.set(key, count - 1);
    } else {
      out.push({ scope: "log", field: "entry", expected: key, actual: ABSENT });
    }
  }

  for (const [key, count] of remaining) {
    for (let i = 0; i < count; i++) {
      out.push({ scope: "log", field: "entry", expected: ABSENT, actual: key });
    }
  }
}

/** Every divergence between `result` and `testCase`, in reporting order. */
export function findDivergences(
  result: Pick<ExecutionResult, "postState" | "resourceUsed" | "logs">,
  testCase: TestCase,
  options: CompareOptions = {},
): MismatchDetail[] {
  const out: MismatchDetail[] = [];

  compareStates(result.postState, testCase.expectedPostState, out);

  if (testCase.expectedResourceUsed !== undefined && testCase.expectedResourceUsed !== result.resourceUsed) {
    out.push({
      scope: "resource",
      field: "gasUsed",
      expected: testCase.expectedResourceUsed.toString(),
      actual: result.resourceUsed.toString(),
    });
  }

  if (testCase.expectedLogs !== undefined) {
    if ((options.logOrder ?? "strict") === "unordered") {
      compareLogsUnordered(result.logs, testCase.expectedLogs, out);
    } else {
      compareLogsStrict(result.logs, testCase.expectedLogs, out);
    }
  }

  return out;
}

/**
 * Structural comparison of an execution result against its test case.
 *
 * Accounts are visited in address order, then resource usage, then logs; the
 * first divergence becomes the mismatch detail.
 */
export function compareResult(
  result: Pick<ExecutionResult, "postState" | "resourceUsed" | "logs">,
  testCase: TestCase,
  options: CompareOptions = {},
): Verdict {
  const divergences = findDivergences(result, testCase, options);
  const [first] = divergences;
  if (first === undefined) return { kind: "pass" };
  return { kind: "mismatch", detail: first, divergenceCount: divergences.length };
}
