export type PoolOptions = {
  onProgress?: (completed: number, total: number) => void;
  /** Checked before each task is started; once true, remaining tasks are skipped. */
  shouldStop?: () => boolean;
};

/**
 * Runs tasks with at most `workers` in flight. Results keep task order;
 * skipped tasks leave `undefined` in their slot.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  workers: number,
  options: PoolOptions = {}
): Promise<Array<T | undefined>> {
  if (tasks.length === 0) return [];
  const concurrency = Math.max(1, Math.min(16, Math.round(workers)));
  const results: Array<T | undefined> = new Array<T | undefined>(tasks.length).fill(undefined);
  const total = tasks.length;
  let completed = 0;
  let nextIndex = 0;

  const worker = async () => {
    while (true) {
      if (options.shouldStop?.()) return;
      const current = nextIndex;
      if (current >= tasks.length) return;
      nextIndex += 1;
      const task = tasks[current];
      if (!task) continue;
      try {
        results[current] = await task();
      } finally {
        completed += 1;
        options.onProgress?.(completed, total);
      }
    }
  };

  const runners = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker());
  await Promise.all(runners);
  return results;
}
