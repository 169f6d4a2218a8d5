/**
 * Configuration Schema
 * ====================
 * Zod schema for the environment variables alphaminer reads.
 */

import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

export const envSchema = z.object({
  // Remote service
  BRAIN_USERNAME: z.string().min(1, 'BRAIN_USERNAME is required'),
  BRAIN_PASSWORD: z.string().min(1, 'BRAIN_PASSWORD is required'),
  BRAIN_BASE_URL: z.string().url().default('https://api.worldquantbrain.com'),
  BRAIN_MAX_RETRIES: positiveInt(3),
  BRAIN_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  BRAIN_TIMEOUT_MS: positiveInt(30000),

  // Workflows
  OUTPUT_DIR: z.string().default('./output'),
  MAX_CONCURRENT_SIMULATIONS: positiveInt(5),
  MAX_CONCURRENT_SUBMISSIONS: positiveInt(3),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'trace']).default('info'),
  LOG_CONSOLE: z
    .string()
    .optional()
    .transform((val) => val !== 'false'),
  LOG_FILE: z
    .string()
    .optional()
    .transform((val) => val !== 'false'),
  LOG_DIR: z.string().default('./logs'),
  LOG_MAX_FILES: z.string().default('14d'),
  LOG_MAX_SIZE: z.string().default('20m'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;
