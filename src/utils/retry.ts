/**
 * Retry Utility with Exponential Backoff
 *
 * Retries transient failures of external correction services (LanguageTool,
 * Ollama) with configurable attempts, delays and retryable-error detection.
 */

import axios from 'axios';
import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of attempts including the first one (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 500) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: retries on transient errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Abort waiting between attempts when this signal fires */
  signal?: AbortSignal;
}

const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'isRetryable' | 'signal'>> = {
  maxAttempts: 3,
  initialDelay: 500,
  maxDelay: 10000,
  multiplier: 2,
};

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ECONNABORTED']);

/**
 * Default retryable error detection
 * Retries on transient errors: 429, 5xx, ECONNRESET, ETIMEDOUT, ECONNREFUSED and network errors without a response
 */
export function isTransientError(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ERR_CANCELED') {
      return false;
    }
    const status = error.response?.status;
    if (status !== undefined) {
      return status === 429 || (status >= 500 && status < 600);
    }
    // No response at all: network failure
    return true;
  }

  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' && TRANSIENT_CODES.has(error.code);
  }

  return false;
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Attempt that just failed (0-indexed)
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
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry (async function)
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name, URL)
 * @returns Result of the operation
 * @throws The last error if all attempts are exhausted, or the first non-retryable error
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
    isRetryable = isTransientError,
    signal,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      if (!isRetryable(error)) {
        logger.debug(
          {
            attempt: attempt + 1,
            maxAttempts,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt + 1 >= maxAttempts) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${maxAttempts} attempts${contextStr}`
        );
        throw error;
      }

      const delay = calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);
      logger.warn(
        { attempt: attempt + 1, maxAttempts, delay, context },
        `Retrying operation after transient failure${contextStr}`
      );
      await sleep(delay, signal);
    }
  }
}
