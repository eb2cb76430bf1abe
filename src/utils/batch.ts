/**
 * Run `task` over `items` in slices of `concurrency`, waiting for each slice
 * to settle before starting the next. Results line up with `items`.
 */
export async function settleInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const size = Math.max(1, Math.floor(concurrency));
  const results: PromiseSettledResult<R>[] = [];

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const settled = await Promise.allSettled(batch.map((item, j) => task(item, i + j)));
    results.push(...settled);
  }

  return results;
}
