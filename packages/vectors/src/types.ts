import type { Hex } from "viem";

export type { Hex } from "viem";

/**
 * Canonical (lowercase) account address.
 *
 * Addresses are `0x` followed by 1..40 hex digits; short forms like `0xaa` are
 * kept as written (no left padding).
 */
export type Address = `0x${string}`;

/** Account state after canonicalization. */
export interface AccountState {
  readonly balance: bigint;
  readonly nonce: bigint;
  /** Lowercase hex bytecode (`0x` when empty). */
  readonly code: Hex;
  /**
   * Storage slots keyed by canonical quantity hex (`0x0`, `0x1f`, ...).
   *
   * Zero-valued slots are never present.
   */
  readonly storage: ReadonlyMap<Hex, Hex>;
}

export type StateMap = ReadonlyMap<Address, AccountState>;

/** Single emitted log entry. */
export interface LogEntry {
  readonly address: Address;
  readonly topics: readonly Hex[];
  readonly data: Hex;
}

/** A single test vector, as loaded from a definition file. */
export interface TestCase {
  readonly id: string;
  /** File the case was loaded from (or the in-memory source name). */
  readonly sourcePath: string;
  readonly preState: StateMap;
  /** Opaque call/transaction payload handed to the tool. */
  readonly input: Uint8Array;
  /** Per-test arguments appended after the tool's fixed arguments. */
  readonly args: readonly string[];
  readonly expectedPostState: StateMap;
  readonly expectedLogs?: readonly LogEntry[];
  readonly expectedResourceUsed?: bigint;
}

/** Structured validation error (JSONPath-like `path` + human message). */
export interface ValidationError {
  readonly path: string;
  readonly message: string;
}

export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: readonly ValidationError[] };
