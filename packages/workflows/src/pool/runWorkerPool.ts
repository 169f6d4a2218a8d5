/**
 * Bounded worker pool
 * ===================
 * Runs `worker` over `items` through a p-queue with at most `concurrency`
 * calls in flight. A slow item only holds up its own slot.
 *
 * Results are returned in input order. `onSettled` fires in completion order.
 * A worker that throws rejects the whole pool; callers that need per-item
 * isolation return a Result from `worker` instead.
 */

import PQueue from 'p-queue';
import { ValidationError } from '@alphaminer/utils';

export interface WorkerPoolOptions<R> {
  concurrency: number;
  onSettled?: (result: R, index: number) => void;
}

export async function runWorkerPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions<R>
): Promise<R[]> {
  const { concurrency, onSettled } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError(`concurrency must be a positive integer, got ${concurrency}`, {
      concurrency,
    });
  }

  const queue = new PQueue({ concurrency });
  return Promise.all(
    items.map((item, index) =>
      queue.add(
        async () => {
          const result = await worker(item, index);
          onSettled?.(result, index);
          return result;
        },
        { throwOnTimeout: true }
      )
    )
  );
}
