import { parseAddress, parseQuantity, type Address, type TestCase } from "@vmparity/vectors";

import { readStateAndLogs } from "./shared.js";
import type { DialectParseResult, OutputDialect } from "./types.js";

const DURATION_RE = /^vm took (\d+(?:\.\d+)?)\s*(ns|µs|us|ms|s)$/;

const NANOS_PER_UNIT: Record<string, number> = {
  ns: 1,
  µs: 1_000,
  us: 1_000,
  ms: 1_000_000,
  s: 1_000_000_000,
};

type RawAccount = {
  balance?: string;
  nonce?: string;
  code?: string;
  storage: Map<string, string>;
};

const LOG_FIELDS = new Set(["topics", "data"]);

type RawLog = { address: string; topics?: string[]; data?: string };

/** Split `key=value` tokens; returns null on a token without `=`. */
function parseAssignments(tokens: readonly string[]): Map<string, string> | null {
  const out = new Map<string, string>();
  for (const token of tokens) {
    const eq = token.indexOf("=");
    if (eq <= 0) return null;
    out.set(token.slice(0, eq), token.slice(eq + 1));
  }
  return out;
}

/**
 * `text` dialect: line-oriented output of evm-style command-line tools.
 *
 * ```text
 * account 0xaa balance=100 nonce=1 code=0x6001
 * storage 0xaa 0x0=0x1 0x1=0x2
 * log 0xaa topics=0x01,0x02 data=0xff
 * gas 21000
 * vm took 1.25ms
 * ```
 *
 * stdin receives the raw input bytes. Blank lines and `#` comments are ignored;
 * any other unrecognized line makes the output unparsable.
 */
export const textDialect: OutputDialect = {
  tag: "text",

  encodeInput(testCase: TestCase): Uint8Array {
    return testCase.input;
  },

  parse(stdout: string): DialectParseResult {
    const accounts = new Map<Address, RawAccount>();
    const logs: RawLog[] = [];
    let resourceUsed = 0n;
    let reportedDurationNanos: number | undefined;

    const lines = stdout.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      const line = (lines[i] ?? "").trim();
      if (line.length === 0 || line.startsWith("#")) continue;

      const where = `line ${i + 1}`;
      const duration = DURATION_RE.exec(line);
      if (duration) {
        const [, value = "", unit = ""] = duration;
        reportedDurationNanos = Math.round(Number(value) * (NANOS_PER_UNIT[unit] ?? 1));
        continue;
      }

      const [keyword, ...rest] = line.split(/\s+/);
      switch (keyword) {
        case "account": {
          const [rawAddress, ...fields] = rest;
          const assignments = parseAssignments(fields);
          if (rawAddress === undefined || assignments === null) {
            return { ok: false, reason: `${where}: expected 'account <address> key=value...'` };
          }
          const address = parseAddress(rawAddress);
          if (address === null) return { ok: false, reason: `${where}: invalid address ${rawAddress}` };
          if (accounts.has(address)) {
            return { ok: false, reason: `${where}: duplicate account ${address}` };
          }
          const account: RawAccount = { storage: new Map() };
          for (const [key, value] of assignments) {
            if (key === "balance") account.balance = value;
            else if (key === "nonce") account.nonce = value;
            else if (key === "code") account.code = value;
            else return { ok: false, reason: `${where}: unknown account field '${key}'` };
          }
          accounts.set(address, account);
          break;
        }

        case "storage": {
          const [rawAddress, ...slots] = rest;
          const assignments = parseAssignments(slots);
          if (rawAddress === undefined || assignments === null) {
            return { ok: false, reason: `${where}: expected 'storage <address> slot=value...'` };
          }
          const address = parseAddress(rawAddress);
          if (address === null) return { ok: false, reason: `${where}: invalid address ${rawAddress}` };
          const account = accounts.get(address);
          if (account === undefined) {
            return { ok: false, reason: `${where}: storage for undeclared account ${address}` };
          }
          for (const [slot, value] of assignments) account.storage.set(slot, value);
          break;
        }

        case "log": {
          const [address, ...fields] = rest;
          const assignments = parseAssignments(fields);
          if (address === undefined || assignments === null) {
            return { ok: false, reason: `${where}: expected 'log <address> topics=... data=...'` };
          }
          for (const key of assignments.keys()) {
            if (!LOG_FIELDS.has(key)) return { ok: false, reason: `${where}: unknown log field '${key}'` };
          }
          const topics = assignments.get("topics");
          const data = assignments.get("data");
          logs.push({
            address,
            ...(topics === undefined || topics === "" ? {} : { topics: topics.split(",") }),
            ...(data === undefined ? {} : { data }),
          });
          break;
        }

        case "gas": {
          const gas = rest.length === 1 ? parseQuantity(rest[0]) : null;
          if (gas === null) return { ok: false, reason: `${where}: expected 'gas <quantity>'` };
          resourceUsed = gas;
          break;
        }

        default:
          return { ok: false, reason: `${where}: unrecognized output ${JSON.stringify(line)}` };
      }
    }

    if (accounts.size === 0) {
      return { ok: false, reason: "no account lines in output" };
    }

    const post = Object.fromEntries(
      [...accounts].map(([address, { storage, ...fields }]): [Address, Record<string, unknown>] => [
        address,
        { ...fields, storage: Object.fromEntries(storage) },
      ]),
    );
    const read = readStateAndLogs(post, logs);
    if (!read.ok) return read;

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
