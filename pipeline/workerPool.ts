/**
 * Runs `task` over `items` with at most `maxWorkers` in flight. Results come
 * back in input order whatever the completion order. The first rejection
 * rejects the whole run; workers stop picking up new items once it happens.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  maxWorkers: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new RangeError(`maxWorkers must be an integer >= 1, got: ${String(maxWorkers)}`);
  }

  const results = new Array<R>(items.length);
  let nextIndex = 0;
  let failed = false;

  async function worker(): Promise<void> {
    while (!failed && nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  }

  const workerCount = Math.min(maxWorkers, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
