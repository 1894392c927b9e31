import { logger } from './logger';
import { describeError } from './errors';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
}

export interface RetryOptions extends RetryPolicy {
  operation: string;
  shouldRetry: (error: unknown) => boolean;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.round(policy.initialDelayMs * Math.pow(policy.backoffFactor, Math.max(0, attempt - 1)));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` until it succeeds, `shouldRetry` rejects the error, or the
 * attempt budget is spent. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }

      const delay = backoffDelay(options, attempt);
      logger.warn(`${options.operation} failed, backing off`, {
        attempt,
        delay,
        error: describeError(error),
      });
      await sleep(delay);
    }
  }
}
