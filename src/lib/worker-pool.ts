export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  handler: (item: T, index: number, total: number) => Promise<void>
) {
  let next = 0;

  async function worker() {
    while (next < items.length) {
      const index = next++;
      await handler(items[index], index, items.length);
    }
  }

  await Promise.all(
    Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker())
  );
}

// Same as runPool, collecting one result per item in input order
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  handler: (item: T, index: number, total: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  await runPool(items, concurrency, async (item, index, total) => {
    results[index] = await handler(item, index, total);
  });
  return results;
}
