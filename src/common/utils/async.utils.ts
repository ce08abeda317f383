/**
 * Async Utilities
 */

/**
 * Maps `items` through `operation` with at most `concurrency` operations in
 * flight. Results keep the order of `items`. A rejection from `operation`
 * propagates; callers that need per-item isolation catch inside `operation`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  operation: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await operation(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
