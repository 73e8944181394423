/**
 * Bounded Concurrency
 *
 * A fixed pool of workers pulls items off a shared cursor, so at most
 * `limit` tasks are in flight at once. Results come back settled and in
 * input order, like Promise.allSettled.
 */

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results: PromiseSettledResult<R>[] = new Array<PromiseSettledResult<R>>(items.length);
  const cursor = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of cursor) {
      try {
        results[index] = { status: 'fulfilled', value: await task(item, index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

/** Fulfilled values of a settled batch, dropping the rejections. */
export function fulfilledValues<R>(results: PromiseSettledResult<R>[]): R[] {
  const values: R[] = [];
  for (const result of results) {
    if (result.status === 'fulfilled') {
      values.push(result.value);
    }
  }
  return values;
}
