/**
 * Retry with exponential backoff.
 *
 * The delay before retry `n` (1-based) is `initialDelayMs * backoffFactor^(n-1)`,
 * capped at `maxDelayMs`. Errors rejected by `retryOn` are rethrown at once.
 */

import { createLogger } from './logger.js';

const log = createLogger('retry');

/** Retry options */
export interface RetryOptions {
  /** Maximum number of retries after the first attempt. Default: 3 */
  maxRetries?: number;
  /** Initial delay in ms. Default: 1000 */
  initialDelayMs?: number;
  /** Maximum delay in ms. Default: 10000 */
  maxDelayMs?: number;
  /** Backoff multiplier. Default: 2 */
  backoffFactor?: number;
  /** Errors to retry on. Default: all errors */
  retryOn?: (error: Error) => boolean;
  /** Called before each retry with the failing error and the retry number. */
  onRetry?: (error: Error, retry: number, delayMs: number) => void;
}

/**
 * Calculate exponential backoff delay for a 0-based attempt index.
 */
export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffFactor: number,
): number {
  const delay = initialDelayMs * Math.pow(backoffFactor, attempt);
  return Math.min(delay, maxDelayMs);
}

/**
 * Sleep for a duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic.
 */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    backoffFactor = 2,
    retryOn = () => true,
    onRetry,
  } = options;

  let lastError: Error = new Error(`${label}: no attempt made`);

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const delay = calculateBackoff(attempt - 1, initialDelayMs, maxDelayMs, backoffFactor);
      log.debug(`${label}: retry ${attempt}/${maxRetries} in ${delay}ms`, {
        error: lastError.message,
      });
      onRetry?.(lastError, attempt, delay);
      await sleep(delay);
    }

    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!retryOn(lastError)) {
        throw lastError;
      }
      if (attempt === maxRetries) {
        log.warn(`${label}: retries exhausted`, { attempts: attempt + 1, error: lastError.message });
      }
    }
  }

  throw lastError;
}
