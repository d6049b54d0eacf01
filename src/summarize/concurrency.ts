/**
 * Runs `worker` over `items` with at most `limit` calls in flight and returns
 * the results in item order, whatever order they complete in.
 *
 * The first failure stops the run: no further items are started, the signal
 * handed to in-flight workers is aborted, and that first error is rethrown
 * once every worker has settled. A caller abort fails the run the same way.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const controller = new AbortController();
  const runSignal = signal ? AbortSignal.any([signal, controller.signal]) : controller.signal;
  // Only the first error is kept
  const failures: unknown[] = [];
  let i = 0;

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (failures.length === 0) {
      const idx = i++;
      if (idx >= items.length) break;
      const item = items[idx];
      if (item === undefined) continue;
      try {
        runSignal.throwIfAborted();
        results[idx] = await worker(item, idx, runSignal);
      } catch (e: unknown) {
        if (failures.length === 0) {
          failures.push(e);
          controller.abort(e);
        }
        return;
      }
    }
  });

  await Promise.allSettled(workers);
  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
