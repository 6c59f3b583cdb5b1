/**
 * Retry with exponential backoff for rate-limited remote calls
 * Every other failure is returned to the caller on the first attempt
 */

import type { Result } from '../types/index.js';
import { debug } from './logger.js';
import { abortableSleep } from './timeout.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retries after the first attempt */
  maxRetries: number;
  /** Base delay between retries in ms */
  baseDelayMs: number;
  /** Maximum delay between retries in ms */
  maxDelayMs: number;
}

/**
 * Backoff delay for a zero-based retry attempt, with up to one base delay of jitter
 */
export function computeBackoffDelay(attempt: number, config: RetryConfig): number {
  return Math.min(
    config.baseDelayMs * Math.pow(2, attempt) + Math.random() * config.baseDelayMs,
    config.maxDelayMs
  );
}

/**
 * Executes a function, retrying while it fails with a retryable error
 *
 * @param fn - Function to execute
 * @param isRetryable - Decides whether a failure is worth another attempt
 * @param config - Retry limits
 * @param signal - Cancels the backoff sleep; the sleep rejects with CancelledError
 * @returns Result of the last attempt
 */
export async function withRetry<T, E extends Error>(
  fn: () => Promise<Result<T, E>>,
  isRetryable: (error: E) => boolean,
  config: RetryConfig,
  signal?: AbortSignal
): Promise<Result<T, E>> {
  let attempt = 0;

  for (;;) {
    const result = await fn();
    if (result.ok || !isRetryable(result.error) || attempt >= config.maxRetries) {
      return result;
    }

    const delay = computeBackoffDelay(attempt, config);
    debug('Retrying after retryable error', {
      module: 'retry',
      attempt: attempt + 1,
      delayMs: Math.round(delay),
      error: result.error.message,
    });

    await abortableSleep(delay, signal);
    attempt++;
  }
}
