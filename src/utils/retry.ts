/**
 * Retry Utility Module
 *
 * Retries an async operation when a caller-supplied predicate classifies
 * the failure as recoverable, with a fixed or growing delay between attempts.
 */

export interface RetryOptions {
  /** Total number of attempts, including the first (default: 3) */
  attempts: number;
  /** Delay before the second attempt in milliseconds (default: 1000) */
  delayMs: number;
  /** Growth factor applied to the delay after each attempt; 1 keeps it fixed (default: 1) */
  backoffMultiplier: number;
  /** Upper bound for the delay (default: 10000) */
  maxDelayMs: number;
  /** Decides whether an error is worth another attempt; omitted means every error is */
  retryOn?: (error: unknown) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  attempts: 3,
  delayMs: 1000,
  backoffMultiplier: 1,
  maxDelayMs: 10000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function calculateDelay(attempt: number, options: RetryOptions): number {
  const delay = options.delayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  return Math.min(delay, options.maxDelayMs);
}

/**
 * Execute a function, retrying failures accepted by `retryOn`
 *
 * @throws The error of the last attempt, or the first error `retryOn` rejects
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const attempts = Math.max(1, Math.floor(opts.attempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const shouldRetry = attempt < attempts && (!opts.retryOn || opts.retryOn(error));
      if (!shouldRetry) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts);
      opts.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}
