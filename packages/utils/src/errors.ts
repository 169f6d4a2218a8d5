/**
 * Custom Error Classes
 * ====================
 * Standardized error classes shared by every package.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Local input validation failure, raised before any network call
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: ErrorContext) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Login failed after all attempts, or the session was rejected twice
 */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication failed', context?: ErrorContext) {
    super(message, 'AUTHENTICATION_ERROR', 401, context);
  }
}

/**
 * Transport error, timeout at the socket level, or retries exhausted
 */
export class TransientNetworkError extends AppError {
  public readonly status?: number;
  public readonly body?: unknown;

  constructor(message: string, status?: number, body?: unknown, context?: ErrorContext) {
    super(message, 'TRANSIENT_NETWORK_ERROR', 503, { status, ...context });
    this.status = status;
    this.body = body;
  }
}

export class RateLimitError extends AppError {
  public readonly retryAfter?: number;

  constructor(message: string = 'Rate limit exceeded', retryAfter?: number, context?: ErrorContext) {
    super(message, 'RATE_LIMIT_ERROR', 429, { retryAfter, ...context });
    this.retryAfter = retryAfter;
  }
}

/**
 * The remote job reached FAILED or ERROR
 */
export class JobFailedError extends AppError {
  public readonly jobHandle?: string;

  constructor(message: string, jobHandle?: string, context?: ErrorContext) {
    super(message, 'JOB_FAILED', 422, { jobHandle, ...context });
    this.jobHandle = jobHandle;
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs?: number;

  constructor(message: string = 'Operation timed out', timeoutMs?: number, context?: ErrorContext) {
    super(message, 'TIMEOUT_ERROR', 504, { timeoutMs, ...context });
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Check if error is worth another attempt
 */
export function isRetryableError(error: Error): boolean {
  return (
    error instanceof TransientNetworkError ||
    error instanceof RateLimitError ||
    error instanceof TimeoutError
  );
}
