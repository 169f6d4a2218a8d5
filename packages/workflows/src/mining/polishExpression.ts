/**
 * Expression polishing
 *
 * Simulate an expression, ask the text generator for a rewrite, simulate the
 * rewrite and compare the two.
 */

import {
  err,
  failure,
  ok,
  validateExpression,
  type Result,
  type TextGeneratorPort,
} from '@alphaminer/core';
import { compareMetrics, type ImprovementReport } from '@alphaminer/analytics';
import { failureFromError } from '@alphaminer/utils';
import type { BatchOrchestrator } from '../simulation/BatchOrchestrator';
import { tryWriteReport } from '../reports/ReportWriter';
import type { SimulationOutcome, SimulationRequest, WorkflowContext } from '../types';

export interface PolishOptions {
  /** Free-form guidance passed to the generator */
  requirements?: string;
  operators?: string[];
}

export interface PolishReport {
  original: SimulationOutcome;
  polished: SimulationOutcome;
  improvements: ImprovementReport;
  reportPath: string | null;
}

export async function polishExpression(
  orchestrator: BatchOrchestrator,
  request: SimulationRequest,
  generator: TextGeneratorPort,
  options: PolishOptions,
  ctx: WorkflowContext
): Promise<Result<PolishReport>> {
  ctx.logger.info('Testing original expression', { expression: request.expression });
  const original = await orchestrator.simulateOne(request);
  if (!original.ok) {
    return original;
  }

  let candidates: string[];
  try {
    candidates = await generator({
      task: 'polish',
      context: {
        expression: request.expression,
        requirements: options.requirements,
        operators: options.operators,
      },
      count: 1,
    });
  } catch (error) {
    ctx.logger.error('Text generator failed', { error: String(error) });
    return err(failureFromError(error));
  }

  const polishedExpression = candidates.map((c) => c.trim()).find((c) => c.length > 0);
  if (polishedExpression === undefined) {
    return err(failure('validation', 'Text generator returned no expression'));
  }
  const check = validateExpression(polishedExpression);
  if (!check.valid) {
    ctx.logger.warn('Invalid polished expression', { expression: polishedExpression, reason: check.reason });
    return err(failure('validation', `Invalid polished expression: ${check.message}`));
  }

  ctx.logger.info('Testing polished expression', { expression: polishedExpression });
  const polished = await orchestrator.simulateOne({ expression: polishedExpression, settings: request.settings });
  if (!polished.ok) {
    return polished;
  }

  const improvements = compareMetrics(original.value.metrics ?? {}, polished.value.metrics ?? {});
  const reportPath = await tryWriteReport(ctx.reports, 'polish_results', {
    original: original.value,
    polished: polished.value,
    improvements,
  });

  ctx.logger.info('Polishing complete', { overallImproved: improvements.overallImproved });
  return ok({ original: original.value, polished: polished.value, improvements, reportPath });
}
