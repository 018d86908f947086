import { LogStoreLimits } from '@risk-router/shared/types';
import { isRiskRouterError } from './errors';

export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  onRetry?: (error: unknown, attempt: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run an async operation with a fixed delay between attempts.
 * The error from the final attempt is rethrown unchanged; a RiskRouterError
 * marked non-retryable is rethrown on the attempt that raised it.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? LogStoreLimits.MAX_ATTEMPTS);
  const delayMs = options.delayMs ?? LogStoreLimits.RETRY_DELAY_MS;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (isRiskRouterError(error) && !error.retryable) {
        throw error;
      }
      if (attempt < attempts) {
        options.onRetry?.(error, attempt);
        await sleep(delayMs);
      }
    }
  }
  throw lastError;
}
