/**
 * Simulation Command Definitions
 *
 * Shared schemas and types for simulation commands.
 * Imported by both commands/*.ts (for CLI help/options) and handlers/*.ts (for types).
 */

import { z } from 'zod';
import {
  createSimulationSettings,
  DEFAULT_SIMULATION_SETTINGS,
  NEUTRALIZATIONS,
  type Neutralization,
  type SimulationSettings,
} from '@alphaminer/core';

const defaults = DEFAULT_SIMULATION_SETTINGS;

const neutralizationSchema = z
  .string()
  .transform((value) => value.toUpperCase())
  .refine((value): value is Neutralization => NEUTRALIZATIONS.some((n) => n === value), {
    message: `Neutralization must be one of ${NEUTRALIZATIONS.join(', ')}`,
  });

/**
 * Settings options shared by every command that simulates
 */
export const settingsOptionsSchema = z.object({
  region: z
    .string()
    .min(1)
    .transform((value) => value.toUpperCase())
    .default(defaults.region),
  universe: z
    .string()
    .min(1)
    .transform((value) => value.toUpperCase())
    .default(defaults.universe),
  delay: z.coerce.number().int().min(0).default(defaults.delay),
  decay: z.coerce.number().int().min(0).default(defaults.decay),
  neutralization: neutralizationSchema.default(defaults.neutralization),
  truncation: z.coerce.number().min(0).max(1).default(defaults.truncation),
  concurrency: z.coerce.number().int().positive().optional(),
  format: z.enum(['json', 'table', 'csv']).default('table'),
});

export type SettingsOptions = z.infer<typeof settingsOptionsSchema>;

/**
 * Simulate command schema
 */
export const simulateSchema = settingsOptionsSchema.extend({
  expressions: z.array(z.string().trim().min(1)).min(1, 'At least one expression is required'),
  reportPrefix: z.string().min(1).default('simulation_results'),
});

/**
 * Simulate command arguments type
 */
export type SimulateArgs = z.infer<typeof simulateSchema>;

/**
 * Comma-separated region list, e.g. "USA,CHN"
 */
export const regionListSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((region) => region.trim().toUpperCase())
      .filter((region) => region.length > 0)
  )
  .pipe(z.array(z.string()).min(1, 'At least one region is required'));

/**
 * Regions command schema
 */
export const regionsSchema = simulateSchema.omit({ region: true }).extend({
  regions: regionListSchema,
  reportPrefix: z.string().min(1).default('multi_region'),
});

/**
 * Regions command arguments type
 */
export type RegionsArgs = z.infer<typeof regionsSchema>;

/**
 * Build frozen simulation settings from the shared options
 */
export function settingsFromArgs(
  args: Pick<SettingsOptions, 'universe' | 'delay' | 'decay' | 'neutralization' | 'truncation'> & {
    region?: string;
  }
): SimulationSettings {
  return createSimulationSettings({
    ...(args.region !== undefined ? { region: args.region } : {}),
    universe: args.universe,
    delay: args.delay,
    decay: args.decay,
    neutralization: args.neutralization,
    truncation: args.truncation,
  });
}
