/**
 * Bounded fan-out for network collaborators.
 *
 * @module utils/concurrency
 */

export interface ConcurrencyOptions {
  /** Checked before each task starts; tasks not yet started are skipped */
  signal?: AbortSignal;
}

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results come back in input order. The first rejection rejects the whole
 * call once in-flight tasks settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {}
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const width = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      if (options.signal?.aborted) return;
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < width; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);
  return results;
}

/**
 * Like mapWithConcurrency, but every task settles independently.
 * Entries for tasks skipped by the signal are undefined.
 */
export async function settleWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {}
): Promise<Array<PromiseSettledResult<R> | undefined>> {
  const settled = new Array<PromiseSettledResult<R> | undefined>(items.length).fill(undefined);
  await mapWithConcurrency(
    items,
    limit,
    async (item, index) => {
      try {
        settled[index] = { status: 'fulfilled', value: await fn(item, index) };
      } catch (reason) {
        settled[index] = { status: 'rejected', reason };
      }
    },
    options
  );
  return settled;
}
