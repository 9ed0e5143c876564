import { describe, it, expect } from 'vitest';
import { Semaphore } from '../../src/utils/backpressure.js';
import { ResourceExhaustedError } from '../../src/core/errors.js';
import { delay } from '../fixtures/summarizers.js';

describe('Semaphore', () => {
  describe('constructor', () => {
    it('should default the name', () => {
      expect(new Semaphore({ maxConcurrent: 3 }).name).toBe('default');
      expect(new Semaphore({ maxConcurrent: 2, name: 'summarizer' }).name).toBe('summarizer');
    });

    it('should reject a non-positive capacity', () => {
      expect(() => new Semaphore({ maxConcurrent: 0 })).toThrow(ResourceExhaustedError);
      expect(() => new Semaphore({ maxConcurrent: 1.5 })).toThrow(
        'Semaphore capacity must be a positive integer (got 1.5)'
      );
    });
  });

  describe('acquire and release', () => {
    it('should hand a released permit to the oldest waiter', async () => {
      const sem = new Semaphore({ maxConcurrent: 1 });
      const order: string[] = [];

      await sem.acquire();
      const first = sem.acquire().then(() => order.push('first'));
      const second = sem.acquire().then(() => order.push('second'));
      await delay(1);
      expect(order).toEqual([]);

      sem.release();
      await first;
      expect(order).toEqual(['first']);

      sem.release();
      await second;
      expect(order).toEqual(['first', 'second']);
    });

    it('should not grow beyond capacity on extra releases', async () => {
      const sem = new Semaphore({ maxConcurrent: 1 });
      sem.release();

      await sem.acquire();
      let acquired = false;
      const pending = sem.acquire().then(() => {
        acquired = true;
      });
      await delay(1);

      expect(acquired).toBe(false);
      sem.release();
      await pending;
      expect(acquired).toBe(true);
    });
  });

  describe('withPermit', () => {
    it('should release the permit when the task throws', async () => {
      const sem = new Semaphore({ maxConcurrent: 1 });

      await expect(
        sem.withPermit(async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
      await expect(sem.withPermit(async () => 'next')).resolves.toBe('next');
    });

    it('should return the task result', async () => {
      const sem = new Semaphore({ maxConcurrent: 1 });

      await expect(sem.withPermit(async () => 42)).resolves.toBe(42);
    });

    it('should cap concurrent tasks at capacity', async () => {
      const sem = new Semaphore({ maxConcurrent: 2 });
      let running = 0;
      let peak = 0;

      await Promise.all(
        [1, 2, 3, 4, 5].map(() =>
          sem.withPermit(async () => {
            running++;
            peak = Math.max(peak, running);
            await delay(5);
            running--;
          })
        )
      );

      expect(peak).toBe(2);
    });
  });
});
