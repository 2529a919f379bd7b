/**
 * Bounded worker pool for one layer of units.
 * Workers pull from a shared cursor, so at most `limit` operations are in flight.
 * `shouldStart` is checked before each item; returning false leaves the item untouched.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  operation: (item: T) => Promise<void>,
  shouldStart: (item: T) => boolean = () => true,
): Promise<void> {
  let cursor = 0;
  const workerCount = Math.max(1, Math.min(limit, items.length));

  const workers = Array.from({ length: workerCount }, async () => {
    while (cursor < items.length) {
      const item = items[cursor];
      cursor += 1;
      if (item === undefined || !shouldStart(item)) continue;
      await operation(item);
    }
  });

  await Promise.all(workers);
}
