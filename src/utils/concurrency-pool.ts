/**
 * Bounded-parallelism task runner.
 *
 * Runs async task factories with at most `limit` in flight. Results are
 * reported in task order, independent of completion order. With `failFast`
 * no new task is started after the first rejection; tasks already in flight
 * run to completion and the ones never started are reported as skipped.
 */

export type TaskResult<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: Error }
  | { status: 'skipped' };

export interface ConcurrencyPoolOptions {
  failFast?: boolean;
}

export interface ConcurrencyPoolResult<T> {
  results: TaskResult<T>[];
  /** True when at least one task rejected */
  hadFailure: boolean;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export async function runWithConcurrency<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number,
  options: ConcurrencyPoolOptions = {}
): Promise<ConcurrencyPoolResult<T>> {
  const results: TaskResult<T>[] = tasks.map((): TaskResult<T> => ({ status: 'skipped' }));
  const width = Math.max(1, Math.min(Math.floor(limit) || 1, tasks.length));
  let next = 0;
  let hadFailure = false;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      if (options.failFast && hadFailure) return;
      const index = next++;
      try {
        const value = await tasks[index]();
        results[index] = { status: 'fulfilled', value };
      } catch (error) {
        hadFailure = true;
        results[index] = { status: 'rejected', error: toError(error) };
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < width; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return { results, hadFailure };
}
