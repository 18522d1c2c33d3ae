export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

export interface PoolResult<R> {
  /** One slot per input; `undefined` where the item was never started. */
  results: Array<R | undefined>;
  completed: number;
}

/**
 * Runs `task` over `items` with at most `concurrency` in flight. Workers pull
 * the next index from a shared counter and write into their own slot, so the
 * output order matches the input order whatever the completion order.
 * After `signal` aborts no new item is started.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  { concurrency, signal, onProgress }: PoolOptions
): Promise<PoolResult<R>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let index = 0;
  let completed = 0;

  const worker = async () => {
    while (true) {
      if (signal?.aborted) {
        break;
      }
      const currentIndex = index++;
      if (currentIndex >= items.length) {
        break;
      }
      results[currentIndex] = await task(items[currentIndex], currentIndex);
      completed += 1;
      onProgress?.(completed, items.length);
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length || 1));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return { results, completed };
}
