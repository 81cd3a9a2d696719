/**
 * AsyncMutex Unit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { AsyncMutex } from '@txcore/core';

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

describe('AsyncMutex', () => {
  let mutex: AsyncMutex;

  beforeEach(() => {
    mutex = new AsyncMutex();
  });

  describe('basic functionality', () => {
    it('should hold waiters until released', async () => {
      const release = await mutex.acquire();
      let acquired = false;
      const waiter = mutex.acquire().then(next => {
        acquired = true;
        return next;
      });

      await delay(5);
      expect(acquired).toBe(false);

      release();
      const releaseNext = await waiter;
      expect(acquired).toBe(true);
      releaseNext();
    });

    it('should ignore a second release', async () => {
      const release = await mutex.acquire();
      release();

      const second = await mutex.acquire();
      let thirdAcquired = false;
      const third = mutex.acquire().then(next => {
        thirdAcquired = true;
        return next;
      });

      // A stale release must not hand over the lock held by `second`
      release();
      await delay(5);
      expect(thirdAcquired).toBe(false);

      second();
      (await third)();
      expect(thirdAcquired).toBe(true);
    });
  });

  describe('mutual exclusion', () => {
    it('should serialize concurrent critical sections', async () => {
      let inside = 0;
      let maxInside = 0;

      const work = async () => {
        await mutex.runExclusive(async () => {
          inside++;
          maxInside = Math.max(maxInside, inside);
          await delay(5);
          inside--;
        });
      };

      await Promise.all([work(), work(), work(), work()]);

      expect(maxInside).toBe(1);
    });

    it('should grant the lock in FIFO order', async () => {
      const order: number[] = [];
      const release = await mutex.acquire();

      const waiters = [1, 2, 3].map(n =>
        mutex.runExclusive(async () => {
          order.push(n);
        })
      );

      release();
      await Promise.all(waiters);

      expect(order).toEqual([1, 2, 3]);
    });

    it('should release when the critical section throws', async () => {
      await expect(
        mutex.runExclusive(async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
    });
  });
});
