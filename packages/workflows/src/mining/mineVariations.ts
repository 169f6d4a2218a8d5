/**
 * Variation mining
 * ================
 * Generate parameter variations of a base expression, simulate them and keep
 * the ones that meet the acceptance criteria, best first.
 */

import { err, failure, ok, validateExpression, type MetricSet, type Result } from '@alphaminer/core';
import {
  generateVariations,
  meetsCriteria,
  rankBySharpe,
  type AcceptanceCriteria,
  type VariationOptions,
} from '@alphaminer/analytics';
import type { BatchOrchestrator } from '../simulation/BatchOrchestrator';
import { tryWriteReport } from '../reports/ReportWriter';
import type { BatchResult, SimulationRequest, WorkflowContext } from '../types';

export interface MineOptions {
  variation?: Partial<VariationOptions>;
  /** Only generate and save the variations */
  skipSimulation?: boolean;
  criteria?: Partial<AcceptanceCriteria>;
  maxConcurrency?: number;
}

export interface MinedVariation {
  expression: string;
  alphaId: string | null;
  metrics: MetricSet | null;
}

export interface MiningReport {
  variations: string[];
  batch: BatchResult | null;
  best: MinedVariation[];
  variationsPath: string | null;
  bestPath: string | null;
}

export async function mineVariations(
  orchestrator: BatchOrchestrator,
  base: SimulationRequest,
  options: MineOptions,
  ctx: WorkflowContext
): Promise<Result<MiningReport>> {
  const check = validateExpression(base.expression);
  if (!check.valid) {
    ctx.logger.error('Invalid base expression', { expression: base.expression, reason: check.reason });
    return err(failure('validation', `Invalid base expression: ${check.message}`));
  }

  const variations = generateVariations(base.expression, options.variation);
  ctx.logger.info('Generated variations', { count: variations.length });

  const variationsPath = await tryWriteReport(ctx.reports, 'variations', {
    baseExpression: base.expression,
    variations,
  });

  if (options.skipSimulation) {
    return ok({ variations, batch: null, best: [], variationsPath, bestPath: null });
  }

  const batch = await orchestrator.simulateBatch(
    variations.map((expression) => ({ expression, settings: base.settings })),
    { maxConcurrency: options.maxConcurrency, reportPrefix: 'variation_results' }
  );

  const passing: MinedVariation[] = [];
  for (const entry of batch.entries) {
    if (!entry.result.ok) continue;
    const { expression, alphaId, metrics } = entry.result.value;
    if (metrics !== null && meetsCriteria(metrics, options.criteria)) {
      passing.push({ expression, alphaId, metrics });
    }
  }
  const best = rankBySharpe(passing);

  let bestPath: string | null = null;
  if (best.length > 0) {
    bestPath = await tryWriteReport(ctx.reports, 'best_variations', best);
    ctx.logger.info('Variations met the criteria', { count: best.length });
  } else {
    ctx.logger.info('No variations met the performance criteria');
  }

  return ok({ variations, batch, best, variationsPath, bestPath });
}
