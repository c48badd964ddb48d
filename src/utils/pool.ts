// ============================================================================
// BOUNDED TASK POOL
// Runs async tasks with a concurrency limit; results keep the input order
// ============================================================================

import { logger } from "./logger.js";

export async function pool<T>(tasks: Array<() => Promise<T>>, limit: number): Promise<T[]> {
  if (tasks.length === 0) return [];

  const startTime = Date.now();
  const workerCount = Math.max(1, Math.min(limit, tasks.length));
  const results: T[] = new Array(tasks.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      const task = tasks[index];
      if (!task) continue;
      results[index] = await task();
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  logger.debug(
    { taskCount: tasks.length, concurrency: workerCount, duration: Date.now() - startTime },
    "Pool completed"
  );

  return results;
}
