/**
 * Bounded worker pool
 */

import { availableParallelism } from 'node:os';

/**
 * Run `task` over `items` with at most `limit` tasks in flight.
 * Results are returned in completion order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
  onSettled?: (result: R, item: T) => void
): Promise<R[]> {
  const results: R[] = [];
  // Lanes pull from one shared iterator, so each item is taken exactly once
  const queue = items.entries();

  const lane = async (): Promise<void> => {
    for (const [index, item] of queue) {
      const result = await task(item, index);
      results.push(result);
      onSettled?.(result, item);
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}

/**
 * Default parallel job count: one less than the CPU count, between 2 and 8
 */
export function resolveWorkerCount(maxWorkers?: number, cpuCount: number = availableParallelism()): number {
  return maxWorkers ?? Math.max(2, Math.min(cpuCount - 1, 8));
}

/**
 * ffmpeg -threads per job so that all workers together roughly fill the CPUs
 */
export function threadsPerJob(
  workers: number,
  encoderThreads?: number,
  cpuCount: number = availableParallelism()
): number {
  return encoderThreads ?? Math.max(2, Math.floor(cpuCount / workers));
}
