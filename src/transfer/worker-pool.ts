/**
 * Bounded-concurrency map.
 */

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Results keep the input order. A rejected worker rejects the whole run,
 * so workers that must not abort siblings should return a result instead.
 */
export async function processWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const processNext = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const concurrency = Math.max(1, Math.min(limit, items.length));
  const inflight: Promise<void>[] = [];
  for (let i = 0; i < concurrency; i++) {
    inflight.push(processNext());
  }

  await Promise.all(inflight);
  return results;
}
