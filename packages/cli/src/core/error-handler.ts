/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { AppError, createPackageLogger } from '@alphaminer/utils';

const logger = createPackageLogger('@alphaminer/cli');

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [/api[_-]?key/i, /token/i, /secret/i, /password/i, /bearer/i, /authorization/i, /cookie/i];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }
  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }
  return 'An unexpected error occurred';
}

/**
 * Log error with full context, redacting sensitive values
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(key) || containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  logger.error('CLI error', error, {
    code: error instanceof AppError ? error.code : undefined,
    context: sanitizedContext,
  });
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}
