export type PoolResult<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; error: unknown }
  | { status: "cancelled" };

/**
 * Run `processor` over `items` with at most `concurrency` in flight. Results
 * keep input order. The signal is checked at the top of each worker's loop;
 * items not yet started when it aborts come back as `cancelled`.
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency: number,
  signal?: AbortSignal,
): Promise<PoolResult<R>[]> {
  const results: PoolResult<R>[] = new Array(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      if (signal?.aborted) {
        results[index] = { status: "cancelled" };
        continue;
      }
      try {
        results[index] = { status: "fulfilled", value: await processor(items[index], index) };
      } catch (error) {
        results[index] = { status: "rejected", error };
      }
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () =>
    worker(),
  );
  await Promise.all(workers);
  return results;
}
