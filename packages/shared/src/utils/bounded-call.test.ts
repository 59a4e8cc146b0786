import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import {
  CallTimeoutError,
  callWithBounds,
  checkAborted,
} from './bounded-call';

describe('callWithBounds', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('returns the first successful result', async () => {
    const fn = vi.fn(async () => 'tokens');

    await expect(
      callWithBounds(fn, { timeoutMs: 1000, retries: 2 }),
    ).resolves.toBe('tokens');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('retries failures up to the bound and rethrows the last error', async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(new Error('third'));

    await expect(
      callWithBounds(fn, { timeoutMs: 1000, retries: 2, onRetry }),
    ).rejects.toThrow('third');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, new Error('first'), 2);
    expect(onRetry).toHaveBeenNthCalledWith(2, new Error('second'), 3);
  });

  test('recovers when a retry succeeds', async () => {
    const fn = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(
      callWithBounds(fn, { timeoutMs: 1000, retries: 1 }),
    ).resolves.toBe('ok');
  });

  test('times out a hanging attempt and aborts its signal', async () => {
    let seenSignal: AbortSignal | undefined;
    const fn = (signal: AbortSignal): Promise<string> => {
      seenSignal = signal;
      return new Promise(() => {});
    };

    const promise = callWithBounds(fn, { timeoutMs: 500, retries: 0 });
    const assertion = expect(promise).rejects.toBeInstanceOf(CallTimeoutError);
    await vi.advanceTimersByTimeAsync(500);
    await assertion;

    expect(seenSignal?.aborted).toBe(true);
  });

  test('does not retry once the outer signal is aborted', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort();
      throw new Error('interrupted');
    });

    await expect(
      callWithBounds(fn, {
        timeoutMs: 1000,
        retries: 3,
        abortSignal: controller.signal,
      }),
    ).rejects.toThrow('interrupted');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('throws AbortError before calling when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'never');

    const error = await callWithBounds(fn, {
      timeoutMs: 1000,
      retries: 0,
      abortSignal: controller.signal,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error).toHaveProperty('name', 'AbortError');
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('checkAborted', () => {
  test('does nothing without a signal', () => {
    expect(() => checkAborted()).not.toThrow();
  });

  test('throws an error named AbortError', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => checkAborted(controller.signal)).toThrow('Operation aborted');
  });
});
