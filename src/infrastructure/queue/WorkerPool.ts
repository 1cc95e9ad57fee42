/**
 * Worker Pool - in-process bounded concurrency
 *
 * Per-user enrichment shares one rate-limited quota, so parallelism stays
 * small and every worker funnels through the same GitHubClient gate.
 * - runWithConcurrency: ordered results, at most `limit` items in flight
 * - Mutex: serializes a critical section across async callers
 */

// =============================================================================
// MUTEX
// =============================================================================

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `task` once every previously queued task has settled.
   * A rejected task releases the lock and rejects only its own caller.
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}

// =============================================================================
// POOL
// =============================================================================

/**
 * Map `items` through `worker` with at most `limit` calls in flight.
 *
 * Results keep input order. The signal is checked before each item is picked
 * up; the first failure stops new items from starting and rejects the call.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const size = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;
  let failed = false;

  const runWorker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      signal?.throwIfAborted();
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const workers = Array.from({ length: items.length === 0 ? 0 : size }, () =>
    runWorker().catch((error: unknown) => {
      failed = true;
      throw error;
    })
  );

  await Promise.all(workers);
  return results;
}
