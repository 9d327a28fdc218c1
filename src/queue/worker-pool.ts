/**
 * WorkerPool - bounded-concurrency queue
 *
 * Items go into one shared FIFO queue. Up to `concurrency` workers pull from
 * it, so each item is handed to exactly one worker and exactly
 * `concurrency` items are in flight while the queue has work.
 */

import { errorMessage } from '../errors/custom-errors.js';
import { logger } from '../utils/logger.js';

/**
 * Item processor; a rejection counts the item as failed
 */
export type QueueProcessor<T> = (item: T) => Promise<void>;

export class WorkerPool<T> {
  private queue: T[] = [];
  private activeCount = 0;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];

  /**
   * @param processor - Function to process each item
   * @param concurrency - Maximum number of items processed at once
   * @param onError - Called with items whose processor rejected
   */
  constructor(
    private readonly processor: QueueProcessor<T>,
    private readonly concurrency: number,
    private readonly onError: (item: T, error: unknown) => void = (_item, error) =>
      logger.error(`Queue processor error: ${errorMessage(error)}`),
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  /**
   * Add an item; it starts as soon as a worker is free
   */
  add(item: T): void {
    if (this.stopped) {
      throw new Error('Cannot add items to a stopped pool');
    }

    this.queue.push(item);
    this.pump();
  }

  addAll(items: readonly T[]): void {
    for (const item of items) {
      this.add(item);
    }
  }

  /**
   * Resolve once the queue is empty and no item is in flight
   */
  async drain(): Promise<void> {
    if (this.isIdle()) {
      return;
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop handing out items; in-flight ones keep running
   *
   * @returns Items that were still queued and will never run
   */
  cancel(): T[] {
    this.stopped = true;
    const dropped = this.queue.splice(0);
    this.wakeIdleWaiters();
    return dropped;
  }

  private pump(): void {
    while (!this.stopped && this.activeCount < this.concurrency) {
      const item = this.queue.shift();
      if (item === undefined) {
        break;
      }

      this.activeCount++;
      this.runItem(item).catch((error: unknown) => {
        logger.error(`Worker pool bookkeeping failed: ${errorMessage(error)}`);
      });
    }
  }

  private async runItem(item: T): Promise<void> {
    try {
      await this.processor(item);
    } catch (error) {
      this.onError(item, error);
    } finally {
      this.activeCount--;
      this.pump();
      this.wakeIdleWaiters();
    }
  }

  private isIdle(): boolean {
    return this.activeCount === 0 && (this.queue.length === 0 || this.stopped);
  }

  private wakeIdleWaiters(): void {
    if (!this.isIdle()) {
      return;
    }

    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }
  }
}
