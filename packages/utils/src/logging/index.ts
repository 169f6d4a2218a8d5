/**
 * Package Loggers
 * ===============
 * One namespaced logger per package, created on first use.
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@alphaminer/utils';
 *
 * const logger = createPackageLogger('@alphaminer/workflows');
 * logger.info('Batch started', { jobs: 12 });
 * ```
 */

import { Logger, createLogger } from '../logger';
import type { LogContext } from '../logger';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log helpers for common operations
 */
export class LogHelpers {
  static apiRequest(logger: Logger, method: string, url: string, context?: LogContext): void {
    logger.debug('API Request', { method, url, ...context });
  }

  static apiResponse(
    logger: Logger,
    method: string,
    url: string,
    statusCode: number,
    duration: number,
    context?: LogContext
  ): void {
    const level = statusCode >= 400 ? 'warn' : 'debug';
    logger[level]('API Response', { method, url, statusCode, duration, ...context });
  }

  static cache(
    logger: Logger,
    operation: 'hit' | 'miss' | 'set' | 'refresh',
    key: string,
    context?: LogContext
  ): void {
    logger.debug(`Cache ${operation}`, { key, ...context });
  }
}
