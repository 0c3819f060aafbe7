/**
 * Maps `items` through `worker` with at most `limit` calls in flight. Results
 * keep the input order regardless of completion order. The first rejection
 * stops scheduling and rejects the whole batch.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  let nextIndex = 0;
  let failed = false;

  const runWorker = async (): Promise<void> => {
    while (!failed && nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  await Promise.all(Array.from({ length: items.length === 0 ? 0 : workerCount }, () => runWorker()));
  return results;
};
