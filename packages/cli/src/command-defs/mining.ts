/**
 * Mining Command Definitions
 */

import { z } from 'zod';
import { DEFAULT_VARIATION_OPTIONS, type AcceptanceCriteria } from '@alphaminer/analytics';
import { settingsOptionsSchema } from './simulation';

/**
 * Acceptance thresholds; omitted values fall back to the defaults
 */
export const criteriaOptionsSchema = z.object({
  minSharpe: z.coerce.number().optional(),
  minFitness: z.coerce.number().optional(),
  minTurnover: z.coerce.number().min(0).optional(),
  maxTurnover: z.coerce.number().min(0).optional(),
});

export type CriteriaOptions = z.infer<typeof criteriaOptionsSchema>;

/**
 * Mine command schema
 */
export const mineSchema = settingsOptionsSchema.merge(criteriaOptionsSchema).extend({
  expression: z.string().trim().min(1, 'Expression is required'),
  range: z.coerce.number().min(0).default(DEFAULT_VARIATION_OPTIONS.rangePercent),
  minPerParam: z.coerce.number().int().positive().default(DEFAULT_VARIATION_OPTIONS.minPerParam),
  maxPerParam: z.coerce.number().int().positive().default(DEFAULT_VARIATION_OPTIONS.maxPerParam),
  maxVariations: z.coerce.number().int().positive().default(DEFAULT_VARIATION_OPTIONS.maxVariations),
  skipSimulation: z.boolean().default(false),
});

export type MineArgs = z.infer<typeof mineSchema>;

/**
 * Keep only the thresholds that were given, so the rest use defaults
 */
export function criteriaFromArgs(args: CriteriaOptions): Partial<AcceptanceCriteria> {
  const criteria: Partial<AcceptanceCriteria> = {};
  if (args.minSharpe !== undefined) criteria.minSharpe = args.minSharpe;
  if (args.minFitness !== undefined) criteria.minFitness = args.minFitness;
  if (args.minTurnover !== undefined) criteria.minTurnover = args.minTurnover;
  if (args.maxTurnover !== undefined) criteria.maxTurnover = args.maxTurnover;
  return criteria;
}
