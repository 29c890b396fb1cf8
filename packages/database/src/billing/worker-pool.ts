/**
 * Bounded Worker Pool
 *
 * Runs an async worker over a list with at most `concurrency` calls in
 * flight. Once `signal` aborts, items not yet started are reported as
 * 'skipped'; calls already started run to completion.
 *
 * Result order matches input order.
 */

export type PoolResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export async function runPool<T, R>(
  items: readonly T[],
  options: PoolOptions,
  worker: (item: T, index: number) => Promise<R>
): Promise<PoolResult<R>[]> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
  }

  const results: PoolResult<R>[] = [];
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      if (options.signal?.aborted) {
        results[index] = { status: 'skipped' };
        continue;
      }
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const lanes = Math.min(options.concurrency, items.length);
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
