/**
 * Worker Pool
 * ===========
 *
 * Bounded-concurrency map used to fan embedding calls out during a build.
 */

import { ConfigError, throwIfCancelled } from './errors.js';

/**
 * Apply `worker` to every item with at most `concurrency` calls in flight.
 *
 * Results keep input order. After the first failure no new items start;
 * calls already in flight are awaited before the first error is thrown,
 * so nothing is left running when this settles. The signal is checked
 * before each item is taken.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError('concurrency', `concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  const queue = items.entries();
  const state: { failure?: { error: unknown } } = {};

  const run = async (): Promise<void> => {
    while (!state.failure) {
      const next = queue.next();
      if (next.done) return;

      const [index, item] = next.value;
      try {
        throwIfCancelled(signal);
        results[index] = await worker(item, index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, items.length); i++) {
    workers.push(run());
  }
  await Promise.all(workers);

  if (state.failure) {
    throw state.failure.error;
  }

  return results;
}
