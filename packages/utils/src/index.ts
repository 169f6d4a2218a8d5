/**
 * @alphaminer/utils
 *
 * Logging, error taxonomy, retry helpers and configuration.
 */

// Logger
export { logger, createLogger, Logger, LogLevel, winstonLogger } from './logger';
export type { LogContext } from './logger';
export { createPackageLogger, LogHelpers } from './logging';

// Errors
export * from './errors';
export * from './error-handler';
export { failureFromError, errorFromFailure } from './failures';

// Config
export { loadConfig, resetConfig, toSafeConfig, envSchema } from './config';
export type { EnvConfig } from './config';

export { sleep } from './sleep';
export type { SleepFn } from './sleep';
