/**
 * Retry policy shared by every external call site
 */

import { isRateLimitError, isRetriableError, toError } from '@utils/errors';
import { logger } from '@utils/logger';
import { type RetryConfig } from '@/types/config';

/**
 * Retry policy: attempt bound, backoff function, retryable predicate
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the next attempt, given the 1-based attempt that just failed */
  backoffMs: (attempt: number, error: Error) => number;
  /** Whether a failure may be retried at all */
  isRetryable: (error: Error) => boolean;
}

/**
 * Single attempt, used where failures are handled by skipping (per-chunk detection)
 */
export const SINGLE_ATTEMPT: RetryPolicy = {
  maxAttempts: 1,
  backoffMs: () => 0,
  isRetryable: () => false,
};

/**
 * Build the standard policy: exponential backoff (base * 2^attempt), fixed longer
 * delay after a 429, transient failures only
 *
 * @param config - Retry configuration
 * @returns Retry policy
 */
export const createRetryPolicy = (config: RetryConfig): RetryPolicy => ({
  maxAttempts: config.max_attempts,
  backoffMs: (attempt, error) =>
    isRateLimitError(error) ? config.rate_limit_delay_ms : config.base_delay_ms * Math.pow(2, attempt),
  isRetryable: isRetriableError,
});

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Run an async operation under a retry policy
 *
 * @param fn - Operation, receives the 1-based attempt number
 * @param policy - Retry policy
 * @param operationName - Name used in log messages
 * @returns Result of the first successful attempt
 * @throws The last error once attempts are exhausted or a failure is not retryable
 */
export const retryWithPolicy = async <T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  operationName: string
): Promise<T> => {
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);

      if (attempt === policy.maxAttempts || !policy.isRetryable(lastError)) {
        break;
      }

      const delayMs = policy.backoffMs(attempt, lastError);
      logger.warn(
        `[RETRY] ${operationName} failed (attempt ${String(attempt)}/${String(policy.maxAttempts)}), retrying in ${String(delayMs)}ms...`,
        { error: lastError.message }
      );
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }

  if (!lastError) {
    throw new Error(`${operationName} failed with no error captured`);
  }
  throw lastError;
};
