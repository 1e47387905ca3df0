import { MAX_TIMER_MS } from "../config";

export interface RetryOptions {
  /** Extra attempts after the first. */
  retries: number;
  /** Delay before retry n is `backoffMs * 2^n`. */
  backoffMs: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry `attempt + 1`, capped at the longest timer Node honors.
 */
export function backoffDelay(backoffMs: number, attempt: number): number {
  return Math.min(backoffMs * 2 ** attempt, MAX_TIMER_MS);
}

/**
 * Run `operation` until it resolves or the retry budget is spent. The last
 * error is rethrown. An aborted signal stops further attempts.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= options.retries || options.signal?.aborted) {
        throw err;
      }
      options.onRetry?.(attempt + 1, err);
      const delay = backoffDelay(options.backoffMs, attempt);
      if (delay > 0) await sleep(delay);
    }
  }
}
