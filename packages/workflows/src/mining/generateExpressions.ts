import { err, ok, validateExpression, type Result, type TextGeneratorPort } from '@alphaminer/core';
import type { ReferenceRecord } from '@alphaminer/api-clients';
import { failureFromError } from '@alphaminer/utils';
import type { ReferenceCatalog, WorkflowContext } from '../types';

export interface GenerationRequest {
  count?: number;
  strategyType?: string;
  complexity?: string;
  /** Taken from the catalog when omitted */
  operators?: string[];
  /** Taken from the catalog for region/universe/delay when omitted */
  dataFields?: string[];
  dataFieldFocus?: string[];
  region?: string;
  universe?: string;
  delay?: number;
}

function namesOf(records: ReferenceRecord[], key: string): string[] {
  const names: string[] = [];
  for (const record of records) {
    const value = record[key];
    if (typeof value === 'string' && value.length > 0) names.push(value);
  }
  return names;
}

/**
 * Ask the generator for candidate expressions and keep the syntactically
 * valid ones, without duplicates, in the order they came back.
 */
export async function generateExpressions(
  generator: TextGeneratorPort,
  request: GenerationRequest,
  ctx: Pick<WorkflowContext, 'logger'>,
  catalog?: ReferenceCatalog
): Promise<Result<string[]>> {
  const count = request.count ?? 5;

  let candidates: string[];
  try {
    const operators =
      request.operators ?? (catalog ? namesOf(await catalog.getOperators(), 'name') : undefined);
    const dataFields =
      request.dataFields ??
      (catalog
        ? namesOf(
            await catalog.getDataFields({
              region: request.region,
              universe: request.universe,
              delay: request.delay,
            }),
            'id'
          )
        : undefined);

    candidates = await generator({
      task: 'generate',
      context: {
        strategyType: request.strategyType,
        complexity: request.complexity,
        operators,
        dataFields,
        dataFieldFocus: request.dataFieldFocus,
      },
      count,
    });
  } catch (error) {
    ctx.logger.error('Expression generation failed', { error: String(error) });
    return err(failureFromError(error));
  }

  const seen = new Set<string>();
  const valid: string[] = [];
  for (const candidate of candidates) {
    const expression = candidate.trim();
    if (seen.has(expression)) continue;
    seen.add(expression);

    const check = validateExpression(expression);
    if (!check.valid) {
      ctx.logger.warn('Invalid expression generated', { expression, reason: check.reason });
      continue;
    }
    valid.push(expression);
  }

  ctx.logger.info('Generated valid expressions', { requested: count, valid: valid.length });
  return ok(valid);
}
