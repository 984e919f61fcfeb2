import { describe, it, expect } from 'vitest';
import { runWithConcurrency } from '../../src/utils/worker-pool.js';

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('runWithConcurrency', () => {
  it('returns results in submission order, not completion order', async () => {
    const items = [40, 5, 25, 0, 10];

    const results = await runWithConcurrency(
      items,
      { concurrency: 3 },
      async (ms, idx) => {
        await delay(ms);
        return `${idx}:${ms}`;
      },
    );

    expect(results).toEqual(['0:40', '1:5', '2:25', '3:0', '4:10']);
  });

  it('never runs more than the configured number of tasks at once', async () => {
    let active = 0;
    let peak = 0;

    await runWithConcurrency(
      Array.from({ length: 12 }, (_, i) => i),
      { concurrency: 4 },
      async (i) => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(i % 3 === 0 ? 15 : 5);
        active -= 1;
        return i;
      },
    );

    expect(peak).toBe(4);
  });

  it('treats a concurrency below one as one', async () => {
    let active = 0;
    let peak = 0;

    await runWithConcurrency([1, 2, 3], { concurrency: 0 }, async (i) => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(1);
      active -= 1;
      return i;
    });

    expect(peak).toBe(1);
  });

  it('handles an empty list', async () => {
    const results = await runWithConcurrency([], { concurrency: 4 }, async () => 1);

    expect(results).toEqual([]);
  });

  it('stops dispatching once shouldStop returns true', async () => {
    const started: number[] = [];

    const results = await runWithConcurrency(
      [0, 1, 2, 3, 4, 5],
      { concurrency: 1, shouldStop: (result) => result === 'stop' },
      async (i) => {
        started.push(i);
        return i === 2 ? 'stop' : 'ok';
      },
    );

    expect(started).toEqual([0, 1, 2]);
    expect(results).toEqual(['ok', 'ok', 'stop', undefined, undefined, undefined]);
  });

  it('lets in-flight tasks finish after a stop', async () => {
    const results = await runWithConcurrency(
      [0, 1, 2, 3],
      { concurrency: 2, shouldStop: (result) => result === 'stop' },
      async (i) => {
        if (i === 0) {
          return 'stop';
        }
        await delay(20);
        return 'slow';
      },
    );

    expect(results).toEqual(['stop', 'slow', undefined, undefined]);
  });

  it('starts nothing when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const started: number[] = [];

    const results = await runWithConcurrency(
      [1, 2],
      { concurrency: 2, signal: controller.signal },
      async (i) => {
        started.push(i);
        return i;
      },
    );

    expect(started).toEqual([]);
    expect(results).toEqual([undefined, undefined]);
  });

  it('rethrows a task error after the other workers settle', async () => {
    let finished = false;

    await expect(
      runWithConcurrency([0, 1], { concurrency: 2 }, async (i) => {
        if (i === 0) {
          throw new Error('boom');
        }
        await delay(20);
        finished = true;
        return i;
      }),
    ).rejects.toThrow('boom');

    expect(finished).toBe(true);
  });
});
