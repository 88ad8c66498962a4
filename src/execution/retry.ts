import type { Logger } from '../concerns/logger.js';
import { CallErrorClassifier } from '../concerns/error-classifier.js';
import { OperationTimeoutError } from '../errors.js';

export interface RetryOptions {
  operation: string;
  /** Additional attempts after the first, for throttling errors only. */
  maxRetries: number;
  baseDelayMs: number;
  operationTimeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function computeBackoff(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, Math.max(attempt - 1, 0));
}

/**
 * Runs `fn` until it succeeds or fails with a non-throttling error.
 * The wall-clock budget is checked before each dispatch and after each
 * return; a call in flight is never interrupted.
 */
export async function callWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const { operation, maxRetries, baseDelayMs, operationTimeoutMs, logger } = options;
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const startedAt = now();

  const checkBudget = (): void => {
    const elapsedMs = now() - startedAt;
    if (elapsedMs > operationTimeoutMs) {
      throw new OperationTimeoutError({ operation, timeoutMs: operationTimeoutMs, elapsedMs });
    }
  };

  for (let attempt = 1; ; attempt++) {
    checkBudget();

    let value: T;
    try {
      value = await fn(attempt);
    } catch (err) {
      if (attempt > maxRetries || !CallErrorClassifier.isThrottling(err)) {
        throw err;
      }
      const delay = computeBackoff(attempt, baseDelayMs);
      logger?.debug({ operation, attempt, delay }, 'throttled, backing off');
      await wait(delay);
      continue;
    }

    checkBudget();
    return { value, attempts: attempt };
  }
}
