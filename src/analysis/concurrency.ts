/**
 * Bounded worker pool over an in-memory list.
 */

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep the input order; callers that need another order sort them.
 *
 * @param items - Items to process.
 * @param limit - Maximum concurrent calls (values below 1 are treated as 1).
 * @param fn - Worker called with each item and its index.
 * @returns Results in input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
