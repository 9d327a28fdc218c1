import { describe, expect, it, vi } from 'vitest';
import { WorkerPool } from './worker-pool.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('WorkerPool', () => {
  it('should never run more items than its concurrency', async () => {
    let active = 0;
    let maxActive = 0;

    const pool = new WorkerPool<number>(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await sleep(10);
      active--;
    }, 3);

    pool.addAll(Array.from({ length: 12 }, (_, i) => i));
    await pool.drain();

    expect(maxActive).toBe(3);
    expect(active).toBe(0);
  });

  it('should hand each item to exactly one worker in FIFO order', async () => {
    const started: number[] = [];

    const pool = new WorkerPool<number>(async (item) => {
      started.push(item);
      await sleep(1);
    }, 2);

    pool.addAll([1, 2, 3, 4, 5]);
    await pool.drain();

    expect(started).toEqual([1, 2, 3, 4, 5]);
  });

  it('should keep going after a failed item', async () => {
    const onError = vi.fn();
    const processed: number[] = [];

    const pool = new WorkerPool<number>(
      async (item) => {
        if (item === 2) {
          throw new Error('boom');
        }
        processed.push(item);
      },
      1,
      onError,
    );

    pool.addAll([1, 2, 3]);
    await pool.drain();

    expect(processed).toEqual([1, 3]);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(2, new Error('boom'));
  });

  it('should resolve drain immediately when empty', async () => {
    const pool = new WorkerPool<number>(async () => undefined, 2);
    await expect(pool.drain()).resolves.toBeUndefined();
  });

  it('should return queued items on cancel and let in-flight ones finish', async () => {
    const finished: number[] = [];

    const pool = new WorkerPool<number>(async (item) => {
      await sleep(20);
      finished.push(item);
    }, 2);

    pool.addAll([1, 2, 3, 4, 5]);
    expect(pool.cancel()).toEqual([3, 4, 5]);
    expect(finished).toEqual([]);

    await pool.drain();
    expect(finished.sort()).toEqual([1, 2]);
    expect(() => pool.add(6)).toThrow('Cannot add items to a stopped pool');
  });

  it('should reject a concurrency below one', () => {
    expect(() => new WorkerPool<number>(async () => undefined, 0)).toThrow('positive integer');
  });
});
