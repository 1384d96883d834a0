/**
 * Exponential backoff retry utility
 */

import type { RetryConfig } from '../types/index.js';
import { logger } from './logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
};

export interface RetryOptions extends Partial<RetryConfig> {
  /** Attached to every retry log line, e.g. the article URL */
  context?: Record<string, unknown>;
  /** Errors this rejects are rethrown without further attempts */
  isRetryable?: (error: Error) => boolean;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { context = {}, isRetryable = () => true, ...overrides } = options;
  const { maxAttempts, initialDelayMs, maxDelayMs, factor } = {
    ...DEFAULT_RETRY_CONFIG,
    ...overrides,
  };

  let lastError = new Error('withRetry called with maxAttempts < 1');
  let delay = initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryable(lastError)) {
        logger.debug({ ...context, error: lastError.message, attempt }, 'Error is not retryable');
        throw lastError;
      }

      if (attempt === maxAttempts) {
        logger.debug({ ...context, error: lastError, attempt, maxAttempts }, 'All retry attempts exhausted');
        throw lastError;
      }

      logger.warn(
        { ...context, error: lastError.message, attempt, maxAttempts, nextDelayMs: delay },
        'Attempt failed, retrying'
      );

      await sleep(delay);
      delay = Math.min(delay * factor, maxDelayMs);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
