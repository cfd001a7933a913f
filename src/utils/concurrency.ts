/**
 * Concurrency utilities for running work items with a limit.
 */

/**
 * Options for limited parallel execution.
 */
export interface ForEachLimitOptions {
  /** Maximum concurrent tasks (default: 1, i.e. sequential) */
  concurrency?: number;
  /** Checked before each item starts; in-flight items always finish */
  signal?: AbortSignal;
}

export interface ForEachLimitResult {
  /** Number of items that were started */
  started: number;
  /** Whether the signal stopped the run before every item started */
  cancelled: boolean;
}

/**
 * Run `fn` over every item with at most `concurrency` calls in flight.
 * Items are started in order. A rejection from `fn` rejects the whole run.
 *
 * @param items - Items to process
 * @param fn - Async function to process each item
 * @param options - Concurrency and cancellation options
 */
export async function forEachLimit<T>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<void>,
  options: ForEachLimitOptions = {}
): Promise<ForEachLimitResult> {
  const requested = options.concurrency ?? 1;
  const concurrency = Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : 1;
  const { signal } = options;

  let next = 0;
  let cancelled = false;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) {
        cancelled = true;
        return;
      }
      const index = next++;
      await fn(items[index], index);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return { started: next, cancelled };
}
