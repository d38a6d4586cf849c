/**
 * Bounded worker pool. `concurrency` workers pull items in order; each waits `itemDelayMs`
 * after finishing an item. A failure is captured for that item only; siblings keep going.
 */

import { sleep as defaultSleep, type Sleep } from './sleep';

export interface WorkerPoolOptions<T> {
  concurrency: number;
  itemDelayMs?: number;
  sleep?: Sleep;
  /** Checked before each dispatch; returning false stops handing out new items. */
  shouldDispatch?: () => boolean | Promise<boolean>;
  /** Called once per item, in completion order, before the next dispatch by that worker. */
  onSettled?: (result: WorkerResult<T>) => void | Promise<void>;
}

export type WorkerResult<T> =
  | { item: T; index: number; ok: true }
  | { item: T; index: number; ok: false; error: unknown };

export interface WorkerPoolSummary<T> {
  /** Items handed to a worker; a prefix of the input. */
  dispatched: number;
  results: WorkerResult<T>[];
}

export async function runWorkerPool<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: WorkerPoolOptions<T>,
): Promise<WorkerPoolSummary<T>> {
  if (!(Number.isInteger(options.concurrency) && options.concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be a number from 1 and up');
  }
  const sleep = options.sleep ?? defaultSleep;
  const delay = options.itemDelayMs ?? 0;
  const results: WorkerResult<T>[] = [];
  let next = 0;
  let stopped = false;

  // The index is claimed synchronously, so two workers never take the same item.
  async function claim(): Promise<number | null> {
    if (stopped || next >= items.length) return null;
    if (options.shouldDispatch && !(await options.shouldDispatch())) {
      stopped = true;
      return null;
    }
    if (stopped || next >= items.length) return null;
    return next++;
  }

  async function workerLoop(): Promise<void> {
    for (let index = await claim(); index !== null; index = await claim()) {
      const item = items[index];
      let result: WorkerResult<T>;
      try {
        await worker(item, index);
        result = { item, index, ok: true };
      } catch (error) {
        result = { item, index, ok: false, error };
      }
      results.push(result);
      if (options.onSettled) await options.onSettled(result);
      if (delay > 0 && !stopped && next < items.length) await sleep(delay);
    }
  }

  const workers = Math.min(options.concurrency, items.length);
  const outcomes = await Promise.allSettled(Array.from({ length: workers }, () => workerLoop()));
  // Only onSettled can reject a worker loop; surface it once every loop has stopped.
  for (const outcome of outcomes) {
    if (outcome.status === 'rejected') throw outcome.reason;
  }
  return { dispatched: next, results };
}
