export type Settled<R> = { status: "fulfilled"; value: R } | { status: "rejected"; reason: unknown };

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 *
 * `min(concurrency, items.length)` workers pull the next index from a shared
 * cursor. A task that throws settles as rejected and its worker moves on, so
 * one failure never stalls the pool. `onSettled` fires once per item in
 * completion order; the returned array is in submission order.
 */
export async function runPooled<T, R>(
  items: readonly T[],
  task: (item: T) => Promise<R>,
  concurrency: number,
  onSettled?: (item: T, result: Settled<R>) => void,
): Promise<Settled<R>[]> {
  const width = Math.max(1, Math.floor(concurrency));
  const results: Settled<R>[] = new Array(items.length);
  let nextIndex = 0;

  const worker = async () => {
    while (nextIndex < items.length) {
      const idx = nextIndex++;
      const item = items[idx];
      let result: Settled<R>;
      try {
        result = { status: "fulfilled", value: await task(item) };
      } catch (reason) {
        result = { status: "rejected", reason };
      }
      results[idx] = result;
      onSettled?.(item, result);
    }
  };

  const workers = Array.from({ length: Math.min(width, items.length) }, worker);
  await Promise.all(workers);
  return results;
}
