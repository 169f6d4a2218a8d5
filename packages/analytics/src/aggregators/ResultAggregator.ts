/**
 * Result Aggregator
 * =================
 * Compares metric sets before and after a change to an expression, and
 * summarizes the metrics of a batch.
 */

import type { MetricSet } from '@alphaminer/core';
import { meetsCriteria, type AcceptanceCriteria } from '../criteria';

export type ComparedMetric = 'sharpe' | 'fitness' | 'turnover' | 'returns';

export const COMPARED_METRICS: readonly ComparedMetric[] = ['sharpe', 'fitness', 'turnover', 'returns'];

/**
 * The subset of a MetricSet that can be compared. Missing or null fields are
 * left out of the comparison.
 */
export type ComparableMetrics = {
  [K in ComparedMetric]?: number | null;
};

export interface MetricChange {
  before: number;
  after: number;
  change: number;
  /** Omitted when `before` is effectively zero */
  changePct?: number;
  improved: boolean;
}

export interface ImprovementReport {
  changes: Partial<Record<ComparedMetric, MetricChange>>;
  overallImproved: boolean;
}

export interface BatchMetricsSummary {
  total: number;
  withMetrics: number;
  passing: number;
  meanSharpe: number | null;
  maxSharpe: number | null;
  meanFitness: number | null;
}

const TURNOVER_BAND = { min: 0.01, max: 0.7 } as const;
const TURNOVER_STABLE_DELTA = 0.1;
const ZERO_EPSILON = 1e-9;

function inTurnoverBand(value: number): boolean {
  return value >= TURNOVER_BAND.min && value <= TURNOVER_BAND.max;
}

function numeric(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Result Aggregator
 */
export class ResultAggregator {
  /**
   * Compare metrics field by field. Turnover counts as improved when it moves
   * into [0.01, 0.7], or stays inside it and moves by less than 0.1.
   */
  compareMetrics(before: ComparableMetrics, after: ComparableMetrics): ImprovementReport {
    const changes: Partial<Record<ComparedMetric, MetricChange>> = {};

    for (const metric of COMPARED_METRICS) {
      const b = before[metric];
      const a = after[metric];
      if (!numeric(b) || !numeric(a)) continue;

      const change = a - b;
      let improved: boolean;
      if (metric === 'turnover') {
        const wasIn = inTurnoverBand(b);
        const isIn = inTurnoverBand(a);
        improved = (!wasIn && isIn) || (wasIn && isIn && Math.abs(change) < TURNOVER_STABLE_DELTA);
      } else {
        improved = a > b;
      }

      const entry: MetricChange = { before: b, after: a, change, improved };
      if (Math.abs(b) > ZERO_EPSILON) {
        entry.changePct = (change / Math.abs(b)) * 100;
      }
      changes[metric] = entry;
    }

    return {
      changes,
      overallImproved: changes.sharpe?.improved === true || changes.fitness?.improved === true,
    };
  }

  /**
   * Summarize the metrics of a batch; entries without metrics only count
   * toward `total`.
   */
  summarize(metrics: ReadonlyArray<MetricSet | null>, criteria?: Partial<AcceptanceCriteria>): BatchMetricsSummary {
    const present = metrics.filter((m): m is MetricSet => m !== null);
    const sharpes = present.map((m) => m.sharpe);
    const fitnesses = present.map((m) => m.fitness).filter(numeric);

    return {
      total: metrics.length,
      withMetrics: present.length,
      passing: present.filter((m) => meetsCriteria(m, criteria)).length,
      meanSharpe: mean(sharpes),
      maxSharpe: sharpes.length > 0 ? Math.max(...sharpes) : null,
      meanFitness: mean(fitnesses),
    };
  }
}

const defaultAggregator = new ResultAggregator();

export function compareMetrics(before: ComparableMetrics, after: ComparableMetrics): ImprovementReport {
  return defaultAggregator.compareMetrics(before, after);
}
