/** Nanoseconds as milliseconds with two decimals, e.g. `1.23 ms`. */
export function formatMs(nanos: number): string {
  return `${(nanos / 1_000_000).toFixed(2)} ms`;
}
