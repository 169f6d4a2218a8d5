/**
 * Bridge between thrown error classes and tagged failures
 */

import { failure, type Failure } from '@alphaminer/core';
import {
  AppError,
  AuthenticationError,
  JobFailedError,
  RateLimitError,
  TimeoutError,
  TransientNetworkError,
  ValidationError,
} from './errors';

/**
 * Classify any thrown value as a tagged failure. Unknown errors are transient.
 */
export function failureFromError(error: unknown): Failure {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof ValidationError) return failure('validation', message);
  if (error instanceof AuthenticationError) return failure('auth', message);
  if (error instanceof RateLimitError) return failure('rate_limited', message);
  if (error instanceof JobFailedError) return failure('job_failed', message);
  if (error instanceof TimeoutError) return failure('timeout', message);
  if (error instanceof TransientNetworkError) {
    return failure('transient', message, { status: error.status, body: error.body });
  }
  return failure('transient', message);
}

/**
 * Turn a tagged failure back into a throwable error
 */
export function errorFromFailure(f: Failure): AppError {
  switch (f.kind) {
    case 'validation':
      return new ValidationError(f.message);
    case 'auth':
      return new AuthenticationError(f.message);
    case 'rate_limited':
      return new RateLimitError(f.message);
    case 'job_failed':
      return new JobFailedError(f.message);
    case 'timeout':
      return new TimeoutError(f.message);
    case 'transient':
      return new TransientNetworkError(f.message, f.status, f.body);
  }
}
