/**
 * Submission Command Definitions
 */

import { z } from 'zod';
import { criteriaOptionsSchema } from './mining';

const outputFormat = z.enum(['json', 'table', 'csv']).default('table');

/**
 * Submit command schema
 */
export const submitSchema = criteriaOptionsSchema.extend({
  maxResults: z.coerce.number().int().positive().default(100),
  maxAgeDays: z.coerce.number().int().positive().default(30),
  validate: z.boolean().default(true),
  dryRun: z.boolean().default(false),
  concurrency: z.coerce.number().int().positive().optional(),
  format: outputFormat,
});

export type SubmitArgs = z.infer<typeof submitSchema>;

const csvList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

/**
 * Tag command schema. At least one property must be given.
 */
export const tagSchema = z
  .object({
    alphaId: z.string().trim().min(1, 'Alpha id is required'),
    tags: csvList.optional(),
    name: z.string().optional(),
    color: z.string().optional(),
    description: z.string().optional(),
    format: outputFormat,
  })
  .refine(
    (args) =>
      args.tags !== undefined ||
      args.name !== undefined ||
      args.color !== undefined ||
      args.description !== undefined,
    { message: 'Provide at least one of --tags, --name, --color or --description' }
  );

export type TagArgs = z.infer<typeof tagSchema>;
