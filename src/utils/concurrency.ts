export interface PoolOptions {
  concurrency: number;
  /** Called after each item settles, with the number of items done so far. */
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Maps items through a bounded worker pool. Results keep input order; the first rejection
 * rejects the whole call.
 */
export async function mapInPool<T, R>(
  items: readonly T[],
  options: PoolOptions,
  mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const { concurrency, onProgress } = options;
  if (!Number.isFinite(concurrency) || concurrency < 1) {
    throw new Error(`Concurrency must be at least 1. Received: ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await mapper(items[index], index);
      completed += 1;
      onProgress?.(completed, items.length);
    }
  };

  await Promise.all(Array.from({ length: Math.min(Math.floor(concurrency), items.length) }, worker));
  return results;
}
