import type { TaskTracker } from "./types";

export interface ParallelExecutorOptions {
  concurrency?: number;
  progress?: TaskTracker;
}

export interface ParallelResult {
  completed: number;
  failed: number;
  errors: Array<{ id: string; error: Error }>;
}

/**
 * Execute tasks in parallel with configurable concurrency.
 * Never rejects; task failures are collected in `errors`.
 */
export async function runParallel<T>(
  items: T[],
  getId: (item: T) => string,
  execute: (item: T) => Promise<void>,
  options: ParallelExecutorOptions = {}
): Promise<ParallelResult> {
  const { concurrency = 5, progress } = options;

  const queue = [...items];
  const errors: Array<{ id: string; error: Error }> = [];
  let completed = 0;
  let failed = 0;
  let running = 0;

  return new Promise((resolve) => {
    function tryStartNext(): void {
      while (running < Math.max(1, concurrency) && queue.length > 0) {
        const item = queue.shift();
        if (item === undefined) break;
        const id = getId(item);
        running++;

        progress?.updateTask(id, { label: id, status: "running" });

        execute(item)
          .then(() => {
            completed++;
            progress?.updateTask(id, { status: "completed" });
          })
          .catch((err: unknown) => {
            failed++;
            const error = err instanceof Error ? err : new Error(String(err));
            errors.push({ id, error });
            progress?.updateTask(id, { status: "failed", error: error.message });
          })
          .finally(() => {
            running--;
            tryStartNext();

            if (running === 0 && queue.length === 0) {
              resolve({ completed, failed, errors });
            }
          });
      }
    }

    // Handle empty input
    if (items.length === 0) {
      resolve({ completed: 0, failed: 0, errors: [] });
      return;
    }

    tryStartNext();
  });
}
