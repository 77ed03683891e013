export interface RetryOptions {
  /** Attempts after the first one. */
  retries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  retries: 3,
  baseDelayMs: 50,
  maxDelayMs: 1000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function getRetryDelayMs(
  attempt: number,
  baseDelayMs: number = DEFAULT_RETRY_OPTIONS.baseDelayMs,
  maxDelayMs: number = DEFAULT_RETRY_OPTIONS.maxDelayMs,
): number {
  const backoff = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
  const jitter = Math.floor(Math.random() * 25);
  return backoff + jitter;
}

/**
 * Runs `fn` until it resolves or the retry budget is spent, sleeping with
 * exponential backoff and jitter between attempts. The last error is rethrown.
 */
export async function withRetries<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { retries, baseDelayMs, maxDelayMs } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= retries) {
        throw error;
      }
      await sleep(getRetryDelayMs(attempt, baseDelayMs, maxDelayMs));
    }
  }
}
