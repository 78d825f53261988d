/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 *
 * Results keep the input order regardless of completion order. The first
 * rejection stops new work from being picked up and is rethrown once the
 * in-flight calls settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const results = new Array<R>(items.length);
  const state: { cursor: number; failure: { error: unknown } | null } = { cursor: 0, failure: null };

  const runLane = async (): Promise<void> => {
    while (state.failure === null && state.cursor < items.length) {
      const index = state.cursor++;
      try {
        signal?.throwIfAborted();
        results[index] = await worker(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => runLane()));

  if (state.failure !== null) {
    throw state.failure.error;
  }
  return results;
}
