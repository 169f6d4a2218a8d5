/**
 * Error Handler
 * =============
 * Centralized error handling utilities.
 */

import { AppError, isRetryableError, RateLimitError } from './errors';
import { logger } from './logger';
import { sleep, type SleepFn } from './sleep';

export interface ErrorHandlerResult {
  handled: boolean;
  message?: string;
  shouldRetry?: boolean;
  retryAfter?: number;
}

/**
 * Log an error at the level its kind deserves
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
          statusCode: err.statusCode,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  const shouldRetry = isRetryableError(err);
  const retryAfter = err instanceof RateLimitError ? err.retryAfter : undefined;

  return {
    handled: true,
    message: err.message,
    shouldRetry,
    retryAfter,
  };
}

/**
 * Retry with exponential backoff.
 *
 * Makes up to `maxRetries + 1` calls, waiting `initialDelayMs * 2^attempt`
 * between them. Non-retryable errors are rethrown immediately.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  maxRetries: number = 3,
  initialDelayMs: number = 1000,
  context?: Record<string, unknown>,
  sleepFn: SleepFn = sleep
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error instanceof Error ? error : new Error(String(error)))) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delayMs = initialDelayMs * Math.pow(2, attempt);
      logger.debug('Retrying after error', {
        attempt: attempt + 1,
        maxRetries,
        delayMs,
        ...context,
      });

      await sleepFn(delayMs);
    }
  }

  handleError(lastError, { ...context, maxRetries });
  throw lastError;
}
