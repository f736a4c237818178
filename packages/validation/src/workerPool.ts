/**
 * Worker Pool
 *
 * A fixed number of async workers pulling items from one shared cursor.
 * Each item is claimed by exactly one worker. Once the signal aborts no new
 * item is claimed; items already in flight run to completion.
 */

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export interface PoolOutcome {
  /** Items handed to a worker */
  attempted: number;
  /** Dispatch stopped before every item was claimed */
  cancelled: boolean;
}

export type PoolTask<T> = (item: T, index: number, workerId: number) => Promise<void>;

export async function runPool<T>(
  items: readonly T[],
  task: PoolTask<T>,
  options: PoolOptions
): Promise<PoolOutcome> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const signal = options.signal;
  let cursor = 0;

  async function worker(workerId: number): Promise<void> {
    while (cursor < items.length && !signal?.aborted) {
      const index = cursor++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      await task(item, index, workerId);
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, (_, workerId) => worker(workerId));
  await Promise.all(workers);

  return { attempted: cursor, cancelled: cursor < items.length };
}
