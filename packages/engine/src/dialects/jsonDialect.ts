import { parseDocument } from "yaml";

import {
  inputToHex,
  isRecord,
  parseQuantity,
  type StateMap,
  type TestCase,
} from "@vmparity/vectors";

import { readStateAndLogs } from "./shared.js";
import type { DialectParseResult, OutputDialect } from "./types.js";

const encoder = new TextEncoder();

function encodeState(state: StateMap): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [address, account] of state) {
    out[address] = {
      balance: account.balance.toString(),
      nonce: account.nonce.toString(),
      code: account.code,
      storage: Object.fromEntries(account.storage),
    };
  }
  return out;
}

/**
 * Read a JSON document without losing integer precision.
 *
 * Parsed with the YAML failsafe schema (JSON is valid YAML), so every scalar
 * comes back as a string and large balances survive intact.
 */
function parseJsonText(text: string): unknown {
  const doc = parseDocument(text, { schema: "failsafe", prettyErrors: false });
  if (doc.errors.length > 0) return undefined;
  return doc.toJS();
}

function lastNonEmptyLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i]?.trim();
    if (line) return line;
  }
  return undefined;
}

/**
 * `json` dialect.
 *
 * stdin: one JSON request line `{ id, pre, input, args }`.
 * stdout: one JSON document `{ post, gasUsed?, logs?, timeNanos? }`; when the
 * tool prints diagnostics first, the last non-empty line is used.
 */
export const jsonDialect: OutputDialect = {
  tag: "json",

  encodeInput(testCase: TestCase): Uint8Array {
    const request = {
      id: testCase.id,
      pre: encodeState(testCase.preState),
      input: inputToHex(testCase.input),
      args: testCase.args,
    };
    return encoder.encode(`${JSON.stringify(request)}\n`);
  },

  parse(stdout: string): DialectParseResult {
    const trimmed = stdout.trim();
    if (trimmed.length === 0) return { ok: false, reason: "no output" };

    const last = lastNonEmptyLine(trimmed);
    const candidates = last === undefined || last === trimmed ? [trimmed] : [trimmed, last];

    let doc: Record<string, unknown> | undefined;
    let sawObject = false;
    for (const text of candidates) {
      const parsed = parseJsonText(text);
      if (!isRecord(parsed)) continue;
      sawObject = true;
      if (parsed.post !== undefined) {
        doc = parsed;
        break;
      }
    }

    if (doc === undefined) {
      return {
        ok: false,
        reason: sawObject ? "missing required field 'post'" : "expected a JSON object on stdout",
      };
    }

    const read = readStateAndLogs(doc.post, doc.logs);
    if (!read.ok) return read;

    let resourceUsed = 0n;
    if (doc.gasUsed !== undefined) {
      const gas = parseQuantity(doc.gasUsed);
      if (gas === null) return { ok: false, reason: `invalid gasUsed ${JSON.stringify(doc.gasUsed)}` };
      resourceUsed = gas;
    }

    let reportedDurationNanos: number | undefined;
    if (doc.timeNanos !== undefined) {
      const nanos = parseQuantity(doc.timeNanos);
      if (nanos === null) {
        return { ok: false, reason: `invalid timeNanos ${JSON.stringify(doc.timeNanos)}` };
      }
      reportedDurationNanos = Number(nanos);
    }

    return {
      ok: true,
      value: {
        postState: read.postState,
        resourceUsed,
        logs: read.logs,
        ...(reportedDurationNanos === undefined ? {} : { reportedDurationNanos }),
      },
    };
  },
};
