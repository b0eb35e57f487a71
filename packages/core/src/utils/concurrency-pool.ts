/**
 * Bounded-concurrency task runner.
 *
 * Results are reported in task order, regardless of completion order.
 */

export type TaskResult<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: Error };

export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number
): Promise<TaskResult<T>[]> {
  const results: TaskResult<T>[] = new Array(tasks.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < tasks.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await tasks[index]() };
      } catch (error) {
        results[index] = {
          status: 'rejected',
          error: error instanceof Error ? error : new Error(String(error))
        };
      }
    }
  }

  const workerCount = Math.max(1, Math.min(limit, tasks.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
