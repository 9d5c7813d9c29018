/**
 * Runs `worker` over `items` with at most `limit` calls in flight and
 * resolves with the results in input order. A worker rejection rejects the
 * whole run, so workers that must not fail should catch their own errors.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;

  const lanes = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      results[index] = await worker(items[index], index);
    }
  });

  await Promise.all(lanes);
  return results;
}
