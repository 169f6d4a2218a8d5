/**
 * Configuration Management
 * ========================
 * Environment-backed configuration, validated once and cached.
 */

import 'dotenv/config';
import { envSchema, type EnvConfig } from './schema';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';

let config: EnvConfig | null = null;

/**
 * Load and validate configuration. The first successful load is cached until
 * `resetConfig()`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  if (config) {
    return config;
  }

  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');

    throw new ConfigurationError(`Configuration validation failed: ${errors}`, undefined, {
      errors: result.error.issues,
    });
  }

  config = result.data;

  logger.info('Configuration loaded successfully', {
    nodeEnv: config.NODE_ENV,
    logLevel: config.LOG_LEVEL,
    baseUrl: config.BRAIN_BASE_URL,
  });

  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

/**
 * Configuration with secrets masked, for printing
 */
export function toSafeConfig(cfg: EnvConfig): Omit<EnvConfig, 'BRAIN_PASSWORD'> & {
  BRAIN_PASSWORD: string;
} {
  return { ...cfg, BRAIN_PASSWORD: '***' };
}

export { envSchema };
export type { EnvConfig };
