import { describe, expect, test, vi } from 'vitest';

import { ConcurrentPool } from './concurrent-pool';

describe('ConcurrentPool', () => {
  describe('runSettled', () => {
    test('returns an empty array for empty input', async () => {
      const outcomes = await ConcurrentPool.runSettled(
        [],
        async (item: number) => item,
        { concurrency: 5 },
      );

      expect(outcomes).toEqual([]);
    });

    test('does not exceed the concurrency limit', async () => {
      let active = 0;
      let maxActive = 0;

      await ConcurrentPool.runSettled(
        Array.from({ length: 8 }, (_, i) => i),
        async (item) => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active--;
          return item;
        },
        { concurrency: 3 },
      );

      expect(maxActive).toBe(3);
    });

    test('treats concurrency below one as a single worker', async () => {
      const order: number[] = [];

      await ConcurrentPool.runSettled(
        [1, 2, 3],
        async (item) => {
          order.push(item);
          return item;
        },
        { concurrency: 0 },
      );

      expect(order).toEqual([1, 2, 3]);
    });

    test('captures failures per item', async () => {
      const failure = new Error('bad document');

      const outcomes = await ConcurrentPool.runSettled(
        ['doc-a', 'doc-b', 'doc-c'],
        async (item) => {
          if (item === 'doc-b') throw failure;
          return item.length;
        },
        { concurrency: 2 },
      );

      expect(outcomes).toEqual([
        { status: 'fulfilled', value: 5 },
        { status: 'rejected', reason: failure },
        { status: 'fulfilled', value: 5 },
      ]);
    });

    test('stops picking items after abort and reports skipped ones', async () => {
      const controller = new AbortController();
      const reason = new Error('cancelled');

      const outcomes = await ConcurrentPool.runSettled(
        [1, 2, 3],
        async (item) => {
          if (item === 1) controller.abort(reason);
          return item;
        },
        { concurrency: 1, abortSignal: controller.signal },
      );

      expect(outcomes).toEqual([
        { status: 'fulfilled', value: 1 },
        { status: 'rejected', reason },
        { status: 'rejected', reason },
      ]);
    });

    test('reports outcomes through onItemComplete', async () => {
      const onItemComplete = vi.fn();

      await ConcurrentPool.runSettled([7], async (item) => item, {
        concurrency: 4,
        onItemComplete,
      });

      expect(onItemComplete).toHaveBeenCalledWith(
        { status: 'fulfilled', value: 7 },
        0,
      );
    });
  });
});
