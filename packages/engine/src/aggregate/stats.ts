export function quantileSorted(valuesSortedAsc: readonly number[], q: number): number {
  if (valuesSortedAsc.length === 0) {
    throw new Error("quantileSorted() requires a non-empty array");
  }

  if (!Number.isFinite(q) || q < 0 || q > 1) {
    throw new RangeError(`quantileSorted() q must be in [0, 1] (got ${q})`);
  }

  // Linear interpolation between closest ranks.
  const rank = q * (valuesSortedAsc.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);

  const a = valuesSortedAsc[lo] ?? 0;
  const b = valuesSortedAsc[hi] ?? a;
  if (lo === hi) return a;

  return a + (b - a) * (rank - lo);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}
