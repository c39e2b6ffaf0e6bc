export type BackoffFn = (attempt: number) => number;

export type RetryOptions = {
  maxAttempts: number;
  /** Delay in ms after the given failed attempt (1-based). */
  backoff: BackoffFn;
  /** Return false to stop retrying on a given error. Defaults to always retry. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff clamped to [baseMs, capMs]:
 * attempt 1 waits baseMs, attempt 2 waits 2 * baseMs, and so on.
 */
export function exponentialBackoff(opts: { baseMs: number; capMs: number }): BackoffFn {
  return (attempt) => Math.min(opts.capMs, opts.baseMs * 2 ** Math.max(0, attempt - 1));
}

/**
 * Run `fn` until it resolves or `maxAttempts` is spent. The last error is
 * rethrown unchanged.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  if (opts.maxAttempts < 1) {
    throw new RangeError("maxAttempts must be at least 1");
  }
  const wait = opts.sleep ?? sleep;

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= opts.maxAttempts || opts.shouldRetry?.(err, attempt) === false) {
        throw err;
      }
      const delayMs = opts.backoff(attempt);
      opts.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
