export interface RunPoolOptions {
  /** Once aborted, no further item is started; items in flight finish normally. */
  readonly signal?: AbortSignal;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 *
 * Workers pull from a shared cursor, so a slow item only holds its own slot.
 * Results are returned in item order; items never started stay `undefined`.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  options: RunPoolOptions = {},
): Promise<(R | undefined)[]> {
  const n = Math.max(1, Math.floor(concurrency));
  const results: (R | undefined)[] = new Array<R | undefined>(items.length).fill(undefined);
  let nextIdx = 0;

  async function drain(): Promise<void> {
    for (;;) {
      if (options.signal?.aborted) return;

      const idx = nextIdx;
      nextIdx += 1;
      if (idx >= items.length) return;

      const item = items[idx];
      if (item === undefined) return;

      results[idx] = await worker(item, idx);
    }
  }

  const workers = Array.from({ length: Math.min(n, items.length) }, () => drain());
  await Promise.all(workers);
  return results;
}
