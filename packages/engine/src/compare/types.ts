/** Where a mismatch was found. */
export type MismatchScope = "account" | "resource" | "log";

/**
 * First divergence between a tool's result and the expectation.
 *
 * Values are rendered as strings: balances, nonces and resource usage in
 * decimal, everything else as canonical hex.
 */
export interface MismatchDetail {
  readonly scope: MismatchScope;
  /** Account the divergence belongs to (`account` scope). */
  readonly address?: string;
  /** Log position (`log` scope, strict order). */
  readonly index?: number;
  readonly field: string;
  readonly expected: string;
  readonly actual: string;
}

export type Verdict =
  | { readonly kind: "pass" }
  | {
      readonly kind: "mismatch";
      readonly detail: MismatchDetail;
      /** Total number of divergences found, including `detail`. */
      readonly divergenceCount: number;
    }
  | {
      readonly kind: "toolError";
      /** `null` when the tool never produced an exit status (spawn failure, output cap). */
      readonly exitCode: number | null;
      readonly stderr: string;
    }
  | { readonly kind: "timeout"; readonly timeoutMs: number }
  | { readonly kind: "loadError"; readonly reason: string };

export type VerdictKind = Verdict["kind"];

export const VERDICT_KINDS: readonly VerdictKind[] = [
  "pass",
  "mismatch",
  "toolError",
  "timeout",
  "loadError",
];

/**
 * How emitted logs are matched against `expectedLogs`.
 *
 * `strict` requires the same order; `unordered` compares them as multisets.
 */
export type LogOrder = "strict" | "unordered";

export const LOG_ORDERS: readonly LogOrder[] = ["strict", "unordered"];

export function isLogOrder(value: unknown): value is LogOrder {
  return LOG_ORDERS.some((o) => o === value);
}

export interface CompareOptions {
  readonly logOrder?: LogOrder;
}
