export type PathSegment = string | number;

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Type guard for plain object records (non-null, non-array). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Type guard for `Object.prototype.hasOwnProperty.call(...)` with key narrowing. */
export function hasOwn<K extends string>(
  value: Record<string, unknown>,
  key: K,
): value is Record<K, unknown> {
  return Object.prototype.hasOwnProperty.call(value, key);
}

/** Format a JSONPath-like pointer (e.g. `$.t1.post['0xaa'].balance`). */
export function formatPath(path: readonly PathSegment[]): string {
  let out = "$";

  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
      continue;
    }

    if (IDENTIFIER_RE.test(segment)) {
      out += `.${segment}`;
      continue;
    }

    const escaped = segment.replaceAll("\\", "\\\\").replaceAll("'", "\\'");
    out += `['${escaped}']`;
  }

  return out;
}
