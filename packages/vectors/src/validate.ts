import type { Hex } from "viem";

import { hexToInput, parseAddress, parseHexData, parseQuantity, quantityToHex } from "./hex.js";
import type {
  AccountState,
  Address,
  LogEntry,
  StateMap,
  TestCase,
  ValidationError,
  ValidationResult,
} from "./types.js";
import { formatPath, hasOwn, isRecord, type PathSegment } from "./utils.js";

function pushError(
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
  message: string,
): void {
  errors.push({ path: formatPath(pathSegments), message });
}

function asRecord(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): Record<string, unknown> | null {
  if (isRecord(value)) return value;

  pushError(errors, pathSegments, "Expected an object.");
  return null;
}

function requireField(
  record: Record<string, unknown>,
  key: string,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): boolean {
  if (hasOwn(record, key)) return true;
  pushError(errors, pathSegments, `Missing required field '${key}'.`);
  return false;
}

function readQuantity(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): bigint | null {
  const parsed = parseQuantity(value);
  if (parsed === null) {
    pushError(
      errors,
      pathSegments,
      `Invalid quantity ${JSON.stringify(value)} (expected a non-negative decimal or 0x-prefixed hex integer).`,
    );
  }
  return parsed;
}

function readHexData(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): Hex | null {
  const parsed = parseHexData(value);
  if (parsed === null) {
    pushError(
      errors,
      pathSegments,
      `Invalid hex data ${JSON.stringify(value)} (expected 0x-prefixed bytes).`,
    );
  }
  return parsed;
}

function readAddress(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): Address | null {
  const parsed = parseAddress(value);
  if (parsed === null) {
    pushError(
      errors,
      pathSegments,
      `Invalid address format ${JSON.stringify(value)} (expected 0x followed by 1-40 hex digits).`,
    );
  }
  return parsed;
}

function validateStorage(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): Map<Hex, Hex> {
  const storage = new Map<Hex, Hex>();
  if (value === undefined) return storage;

  const record = asRecord(value, errors, pathSegments);
  if (record === null) return storage;

  const seen = new Set<Hex>();
  for (const [rawSlot, rawValue] of Object.entries(record)) {
    const slotPath = [...pathSegments, rawSlot];
    const slot = readQuantity(rawSlot, errors, slotPath);
    const slotValue = readQuantity(rawValue, errors, slotPath);
    if (slot === null || slotValue === null) continue;

    const key = quantityToHex(slot);
    if (seen.has(key)) {
      pushError(errors, slotPath, `Duplicate storage slot '${key}'.`);
      continue;
    }
    seen.add(key);

    // An absent slot reads as zero; keep only non-zero slots.
    if (slotValue !== 0n) storage.set(key, quantityToHex(slotValue));
  }

  return storage;
}

function validateAccount(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): AccountState | null {
  const record = asRecord(value, errors, pathSegments);
  if (record === null) return null;

  const errorCount = errors.length;

  const balance = requireField(record, "balance", errors, pathSegments)
    ? readQuantity(record.balance, errors, [...pathSegments, "balance"])
    : null;
  const nonce = requireField(record, "nonce", errors, pathSegments)
    ? readQuantity(record.nonce, errors, [...pathSegments, "nonce"])
    : null;
  const code =
    record.code === undefined ? "0x" : readHexData(record.code, errors, [...pathSegments, "code"]);
  const storage = validateStorage(record.storage, errors, [...pathSegments, "storage"]);

  if (balance === null || nonce === null || code === null || errors.length !== errorCount) {
    return null;
  }

  return { balance, nonce, code, storage };
}

/** Validate an address → account mapping (pre- or post-state). */
export function validateStateMap(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): StateMap {
  const state = new Map<Address, AccountState>();

  const record = asRecord(value, errors, pathSegments);
  if (record === null) return state;

  for (const [rawAddress, rawAccount] of Object.entries(record)) {
    const accountPath = [...pathSegments, rawAddress];
    const address = readAddress(rawAddress, errors, accountPath);
    const account = validateAccount(rawAccount, errors, accountPath);
    if (address === null || account === null) continue;

    if (state.has(address)) {
      pushError(errors, accountPath, `Duplicate address '${address}' (addresses are case-insensitive).`);
      continue;
    }
    state.set(address, account);
  }

  return state;
}

function validateLog(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): LogEntry | null {
  const record = asRecord(value, errors, pathSegments);
  if (record === null) return null;

  const address = requireField(record, "address", errors, pathSegments)
    ? readAddress(record.address, errors, [...pathSegments, "address"])
    : null;

  const topics: Hex[] = [];
  let topicsOk = true;
  if (record.topics !== undefined) {
    if (!Array.isArray(record.topics)) {
      pushError(errors, [...pathSegments, "topics"], "Expected an array of hex topics.");
      topicsOk = false;
    } else {
      record.topics.forEach((topic: unknown, i) => {
        const parsed = readHexData(topic, errors, [...pathSegments, "topics", i]);
        if (parsed === null) topicsOk = false;
        else topics.push(parsed);
      });
    }
  }

  const data =
    record.data === undefined ? "0x" : readHexData(record.data, errors, [...pathSegments, "data"]);

  if (address === null || data === null || !topicsOk) return null;
  return { address, topics, data };
}

/** Validate a list of expected (or emitted) log entries. */
export function validateLogs(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): LogEntry[] {
  if (!Array.isArray(value)) {
    pushError(errors, pathSegments, "Expected an array of log entries.");
    return [];
  }

  const logs: LogEntry[] = [];
  value.forEach((entry: unknown, i) => {
    const log = validateLog(entry, errors, [...pathSegments, i]);
    if (log !== null) logs.push(log);
  });
  return logs;
}

function validateArgs(
  value: unknown,
  errors: ValidationError[],
  pathSegments: readonly PathSegment[],
): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    pushError(errors, pathSegments, "Expected an array of strings.");
    return [];
  }

  const args: string[] = [];
  value.forEach((arg: unknown, i) => {
    if (typeof arg === "string") args.push(arg);
    else pushError(errors, [...pathSegments, i], "Per-test arguments must be strings.");
  });
  return args;
}

/**
 * Validate one test definition (`<id>: { pre, input, post, ... }`).
 *
 * All structural problems are collected; the case is only produced when there
 * are none.
 */
export function validateTestCase(
  id: string,
  value: unknown,
  sourcePath: string,
): ValidationResult<TestCase> {
  const errors: ValidationError[] = [];
  const root: PathSegment[] = [id];

  if (id.trim().length === 0) {
    pushError(errors, root, "Test ids must be non-empty strings.");
  }

  const record = asRecord(value, errors, root);
  if (record === null) return { ok: false, errors };

  const preState = requireField(record, "pre", errors, root)
    ? validateStateMap(record.pre, errors, [...root, "pre"])
    : new Map<Address, AccountState>();
  const expectedPostState = requireField(record, "post", errors, root)
    ? validateStateMap(record.post, errors, [...root, "post"])
    : new Map<Address, AccountState>();
  const input = requireField(record, "input", errors, root)
    ? readHexData(record.input, errors, [...root, "input"])
    : null;
  const args = validateArgs(record.args, errors, [...root, "args"]);
  const expectedLogs =
    record.logs === undefined ? undefined : validateLogs(record.logs, errors, [...root, "logs"]);
  const expectedResourceUsed =
    record.gasUsed === undefined
      ? undefined
      : readQuantity(record.gasUsed, errors, [...root, "gasUsed"]);

  if (errors.length > 0 || input === null) {
    return { ok: false, errors };
  }

  const testCase: TestCase = {
    id,
    sourcePath,
    preState,
    input: hexToInput(input),
    args,
    expectedPostState,
    ...(expectedLogs === undefined ? {} : { expectedLogs }),
    ...(expectedResourceUsed === undefined || expectedResourceUsed === null
      ? {}
      : { expectedResourceUsed }),
  };

  return { ok: true, value: testCase };
}
