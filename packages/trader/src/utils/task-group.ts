/**
 * Bounded task group
 *
 * Runs async tasks with at most `concurrency` in flight and settles every one
 * of them, in the shape of Promise.allSettled. Tasks not yet started when the
 * signal aborts are rejected with BacktestCancelledError without running.
 */

import { BacktestCancelledError } from '../errors.js';

export interface TaskGroupOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export async function runTaskGroup<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  options: TaskGroupOptions = {}
): Promise<PromiseSettledResult<T>[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? tasks.length));
  const results: PromiseSettledResult<T>[] = new Array<PromiseSettledResult<T>>(tasks.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      const task = tasks[index];
      if (options.signal?.aborted) {
        results[index] = { status: 'rejected', reason: new BacktestCancelledError(options.signal.reason) };
        continue;
      }
      try {
        results[index] = { status: 'fulfilled', value: await task() };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
