/**
 * Options for callWithBounds
 */
export interface BoundedCallOptions {
  /**
   * Timeout of a single attempt in milliseconds
   */
  timeoutMs: number;

  /**
   * Retries after the first attempt (0 = single attempt)
   */
  retries: number;

  /**
   * Outer cancellation; aborts the running attempt and skips retries
   */
  abortSignal?: AbortSignal;

  /**
   * Called before each retry with the error of the failed attempt
   */
  onRetry?: (error: unknown, nextAttempt: number) => void;
}

/**
 * Raised when one attempt of callWithBounds exceeds its timeout.
 */
export class CallTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Throw an AbortError when the signal has been aborted.
 */
export function checkAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    const error = new Error('Operation aborted', { cause: signal.reason });
    error.name = 'AbortError';
    throw error;
  }
}

/**
 * Run a collaborator call with a per-attempt timeout and a bounded number
 * of retries.
 *
 * Each attempt receives its own AbortSignal, aborted on timeout or when the
 * outer signal fires. The last error is rethrown once retries run out.
 */
export async function callWithBounds<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: BoundedCallOptions,
): Promise<T> {
  const retries = Math.max(0, options.retries);
  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt++) {
    checkAborted(options.abortSignal);

    try {
      return await runWithTimeout(fn, options.timeoutMs, options.abortSignal);
    } catch (error) {
      if (options.abortSignal?.aborted) {
        throw error;
      }
      lastError = error;
      if (attempt < retries) {
        options.onRetry?.(error, attempt + 2);
      }
    }
  }

  throw lastError;
}

function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer: AbortSignal | undefined,
): Promise<T> {
  const controller = new AbortController();
  const onOuterAbort = (): void => controller.abort(outer?.reason);
  outer?.addEventListener('abort', onOuterAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CallTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  return Promise.race([fn(controller.signal), timeout]).finally(() => {
    clearTimeout(timer);
    outer?.removeEventListener('abort', onOuterAbort);
  });
}
