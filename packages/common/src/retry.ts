export interface RetryOptions {
  /**
   * Total number of attempts, including the first one.
   */
  attempts: number;
  /**
   * Delay before the second attempt. Doubles on every further attempt.
   */
  baseDelayMs: number;
  /**
   * Upper bound for a single delay.
   */
  maxDelayMs: number;
  /**
   * Returns false for failures that retrying cannot fix. Defaults to retrying everything.
   */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /**
   * Aborting stops further attempts; the last failure is rethrown.
   */
  signal?: AbortSignal;
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number
): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` until it succeeds or the attempt budget is spent, waiting with a
 * capped exponential backoff between attempts.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let attempt = 1;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry
        ? options.shouldRetry(error, attempt)
        : true;
      if (!retryable || attempt >= attempts || options.signal?.aborted) {
        throw error;
      }
      const delay = backoffDelay(
        attempt,
        options.baseDelayMs,
        options.maxDelayMs
      );
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
      attempt++;
    }
  }
}
