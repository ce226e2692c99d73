import { describe, it, expect, vi } from 'vitest';
import { resolveWorkerCount, runWithConcurrency, threadsPerJob } from './workerPool.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('runWithConcurrency', () => {
  it('never runs more tasks than the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async item => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight--;
      return item * 10;
    });

    expect(peak).toBe(3);
    expect([...results].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50, 60, 70]);
  });

  it('collects results in completion order and reports each one', async () => {
    const settled = vi.fn();

    const results = await runWithConcurrency(
      [30, 5, 15],
      3,
      async ms => {
        await delay(ms);
        return `done-${ms}`;
      },
      settled
    );

    expect(results).toEqual(['done-5', 'done-15', 'done-30']);
    expect(settled).toHaveBeenNthCalledWith(1, 'done-5', 5);
  });

  it('processes each item exactly once', async () => {
    const task = vi.fn(async (item: string, index: number) => `${index}:${item}`);

    const results = await runWithConcurrency(['a', 'b', 'c'], 8, task);

    expect(task).toHaveBeenCalledTimes(3);
    expect([...results].sort()).toEqual(['0:a', '1:b', '2:c']);
  });

  it('handles an empty list', async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe('resolveWorkerCount', () => {
  it('defaults to cpus - 1 clamped to 2..8', () => {
    expect(resolveWorkerCount(undefined, 1)).toBe(2);
    expect(resolveWorkerCount(undefined, 6)).toBe(5);
    expect(resolveWorkerCount(undefined, 32)).toBe(8);
    expect(resolveWorkerCount(3, 32)).toBe(3);
  });
});

describe('threadsPerJob', () => {
  it('splits the CPUs across workers, at least 2', () => {
    expect(threadsPerJob(4, undefined, 16)).toBe(4);
    expect(threadsPerJob(8, undefined, 4)).toBe(2);
    expect(threadsPerJob(4, 6, 16)).toBe(6);
  });
});
