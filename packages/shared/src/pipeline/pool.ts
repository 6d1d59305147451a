/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Results are collected in completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next++];
      results.push(await worker(item));
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
