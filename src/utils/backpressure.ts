/**
 * Bounded concurrency for calls to the summarization provider
 *
 * Usage:
 *   const sem = new Semaphore({ maxConcurrent: 2, name: 'summarizer' });
 *   const result = await sem.withPermit(() => summarize(text));
 */

import { ResourceExhaustedError } from '../core/errors.js';

export interface SemaphoreOptions {
  maxConcurrent: number;
  name?: string;
}

/**
 * Counting semaphore. Waiters are served in FIFO order.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  readonly name: string;
  private waitQueue: Array<() => void> = [];

  constructor(options: SemaphoreOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new ResourceExhaustedError(
        'semaphore',
        `Semaphore capacity must be a positive integer (got ${options.maxConcurrent})`
      );
    }
    this.maxPermits = options.maxConcurrent;
    this.permits = options.maxConcurrent;
    this.name = options.name ?? 'default';
  }

  /**
   * Acquire a permit, waiting if necessary
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /**
   * Release a permit. A waiting caller takes it over directly.
   */
  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  /**
   * Run fn while holding a permit. The permit is held until fn's promise
   * settles, even when the caller stops waiting for it earlier.
   */
  async withPermit<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
