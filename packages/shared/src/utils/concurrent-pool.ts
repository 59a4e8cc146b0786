/**
 * Outcome of one item processed by ConcurrentPool.runSettled
 */
export type PoolOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

export interface ConcurrentPoolOptions<R> {
  /**
   * Maximum number of concurrent workers (values below 1 are treated as 1)
   */
  concurrency: number;

  /**
   * Stops workers from picking up new items once aborted. Items already
   * running are left to finish.
   */
  abortSignal?: AbortSignal;

  /**
   * Fired after each item completes, in completion order
   */
  onItemComplete?: (outcome: PoolOutcome<R>, index: number) => void;
}

/**
 * ConcurrentPool - Worker pool for running independent jobs.
 *
 * Keeps N workers busy: when a worker finishes an item it immediately takes
 * the next one from the shared queue. Results keep the input order. Jobs
 * share nothing but the queue index, so each document processed through the
 * pool keeps its own state.
 */
export class ConcurrentPool {
  /**
   * Process items and capture each failure instead of rejecting.
   *
   * Items skipped because of an abort are reported as rejected with the
   * signal's reason.
   */
  static async runSettled<T, R>(
    items: readonly T[],
    processFn: (item: T, index: number) => Promise<R>,
    options: ConcurrentPoolOptions<R>,
  ): Promise<PoolOutcome<R>[]> {
    const outcomes: (PoolOutcome<R> | undefined)[] = new Array(items.length);

    await this.drain(
      items,
      options.concurrency,
      options.abortSignal,
      async (item, index) => {
        let outcome: PoolOutcome<R>;
        try {
          outcome = { status: 'fulfilled', value: await processFn(item, index) };
        } catch (reason) {
          outcome = { status: 'rejected', reason };
        }
        outcomes[index] = outcome;
        options.onItemComplete?.(outcome, index);
      },
    );

    return Array.from(
      outcomes,
      (outcome): PoolOutcome<R> =>
        outcome ?? {
          status: 'rejected',
          reason: options.abortSignal?.reason ?? new Error('Item skipped'),
        },
    );
  }

  private static async drain<T>(
    items: readonly T[],
    concurrency: number,
    abortSignal: AbortSignal | undefined,
    handle: (item: T, index: number) => Promise<void>,
  ): Promise<void> {
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !abortSignal?.aborted) {
        const index = nextIndex++;
        await handle(items[index], index);
      }
    }

    const workers = Array.from(
      { length: Math.min(Math.max(1, concurrency), items.length) },
      () => worker(),
    );
    await Promise.all(workers);
  }
}
