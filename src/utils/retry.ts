/**
 * Retry Utility with Exponential Backoff
 *
 * Provides a centralized retry mechanism with exponential backoff for transient failures.
 * Supports configurable retry attempts, delays, and retryable error detection.
 */

import { logger } from './logger.js';
import { isRemoteServiceError } from '../types/errors.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first try (default: 1) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: transient remote failures) */
  isRetryable?: (error: unknown) => boolean;
  /** Stops retrying once aborted */
  signal?: AbortSignal;
}

const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'isRetryable' | 'signal'>> = {
  maxAttempts: 1,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

/**
 * Default retryable error detection: only failures the remote client classified
 * as transient (429, 5xx, dropped connections)
 */
export function isRetryableError(error: unknown): boolean {
  return isRemoteServiceError(error) && error.category === 'transient';
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry
 * @param context - Optional context for logging (e.g., operation name)
 * @throws The last error if all retries are exhausted
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = isRetryableError,
    signal,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      if (!isRetryable(error) || signal?.aborted) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts: maxAttempts + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${maxAttempts + 1} attempts${contextStr}`
        );
        throw error;
      }

      const delay = calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts: maxAttempts + 1,
          delay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts + 1})`
      );

      await sleep(delay, signal);
    }
  }
}
