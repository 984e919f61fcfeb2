export const DEFAULT_WORKERS = 4;

export interface PoolOptions<R> {
  concurrency: number;
  /** Checked after every task; once true, no further items are started. */
  shouldStop?: (result: R) => boolean;
  signal?: AbortSignal;
}

/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight.
 *
 * Results are stored by submission index, so the returned array lines up
 * with `items` whatever order the tasks finish in. Items that were never
 * started (after a stop) are left `undefined`. In-flight tasks always
 * settle before this resolves or rethrows the first task error.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  options: PoolOptions<R>,
  fn: (item: T, index: number) => Promise<R>,
): Promise<Array<R | undefined>> {
  const n = Math.max(1, Math.floor(options.concurrency));
  const results: Array<R | undefined> = new Array<R | undefined>(
    items.length,
  ).fill(undefined);
  let nextIdx = 0;
  let stopped = false;

  async function worker(): Promise<void> {
    for (;;) {
      if (stopped || options.signal?.aborted) {
        return;
      }
      const idx = nextIdx;
      nextIdx += 1;
      if (idx >= items.length) {
        return;
      }

      let result: R;
      try {
        result = await fn(items[idx], idx);
      } catch (error) {
        stopped = true;
        throw error;
      }
      results[idx] = result;
      if (options.shouldStop?.(result)) {
        stopped = true;
      }
    }
  }

  const workers = Array.from({ length: Math.min(n, items.length) }, () =>
    worker(),
  );
  const settled = await Promise.allSettled(workers);
  const failure = settled.find(
    (outcome): outcome is PromiseRejectedResult =>
      outcome.status === 'rejected',
  );
  if (failure) {
    throw failure.reason;
  }
  return results;
}
