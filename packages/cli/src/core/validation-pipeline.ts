/**
 * Validation pipeline
 *
 * Single path from raw Commander options to typed handler arguments.
 */

import type { z } from 'zod';
import { ValidationError } from '@alphaminer/utils';

/**
 * Drop options Commander left undefined so schema defaults apply
 */
export function normalizeOptions(rawOptions: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(rawOptions).filter(([, value]) => value !== undefined));
}

/**
 * @throws ValidationError listing every invalid option
 */
export function validateAndCoerceArgs<TArgs>(
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>,
  rawOptions: Record<string, unknown>
): TArgs {
  const parsed = schema.safeParse(normalizeOptions(rawOptions));
  if (!parsed.success) {
    const msg = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid arguments: ${msg}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}
