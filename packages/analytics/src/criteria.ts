/**
 * Acceptance criteria and submission readiness
 */

import type { MetricSet } from '@alphaminer/core';

export interface AcceptanceCriteria {
  /** Minimum |sharpe| */
  minSharpe: number;
  /** Minimum |fitness| */
  minFitness: number;
  minTurnover: number;
  maxTurnover: number;
}

export const DEFAULT_ACCEPTANCE_CRITERIA: Readonly<AcceptanceCriteria> = Object.freeze({
  minSharpe: 1.25,
  minFitness: 1.0,
  minTurnover: 0.01,
  maxTurnover: 0.7,
});

/**
 * Checks that block submission when the service reports them as FAIL
 */
export const BLOCKING_CHECKS: readonly string[] = [
  'LOW_SHARPE',
  'LOW_FITNESS',
  'LOW_TURNOVER',
  'HIGH_TURNOVER',
  'CONCENTRATED_WEIGHT',
];

export interface ReadinessReport {
  ready: boolean;
  issues: string[];
}

function resolve(criteria: Partial<AcceptanceCriteria> = {}): AcceptanceCriteria {
  return { ...DEFAULT_ACCEPTANCE_CRITERIA, ...criteria };
}

export function meetsCriteria(metrics: MetricSet, criteria?: Partial<AcceptanceCriteria>): boolean {
  const c = resolve(criteria);
  return (
    Math.abs(metrics.sharpe) >= c.minSharpe &&
    metrics.fitness !== null &&
    Math.abs(metrics.fitness) >= c.minFitness &&
    metrics.turnover >= c.minTurnover &&
    metrics.turnover <= c.maxTurnover
  );
}

/**
 * Collect every reason an alpha should not be submitted yet
 */
export function checkSubmissionReadiness(
  metrics: MetricSet | null,
  criteria?: Partial<AcceptanceCriteria>
): ReadinessReport {
  if (metrics === null) {
    return { ready: false, issues: ['No metrics available'] };
  }

  const c = resolve(criteria);
  const issues: string[] = [];

  if (Math.abs(metrics.sharpe) < c.minSharpe) {
    issues.push(`Sharpe ratio too low: ${metrics.sharpe}`);
  }
  if (metrics.fitness === null || Math.abs(metrics.fitness) < c.minFitness) {
    issues.push(`Fitness too low: ${metrics.fitness}`);
  }
  if (metrics.turnover < c.minTurnover) {
    issues.push(`Turnover too low: ${metrics.turnover}`);
  } else if (metrics.turnover > c.maxTurnover) {
    issues.push(`Turnover too high: ${metrics.turnover}`);
  }

  if (metrics.checks.length === 0) {
    issues.push('No check results available');
  } else {
    for (const check of metrics.checks) {
      if (BLOCKING_CHECKS.includes(check.name) && check.result === 'FAIL') {
        issues.push(`Check failed: ${check.name}`);
      }
    }
  }

  return { ready: issues.length === 0, issues };
}

/**
 * Sort entries by sharpe, highest first. Entries without metrics go last in
 * their original order.
 */
export function rankBySharpe<T extends { metrics: MetricSet | null }>(entries: readonly T[]): T[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => {
      const sa = a.entry.metrics?.sharpe;
      const sb = b.entry.metrics?.sharpe;
      if (sa === undefined && sb === undefined) return a.index - b.index;
      if (sa === undefined) return 1;
      if (sb === undefined) return -1;
      return sb - sa || a.index - b.index;
    })
    .map(({ entry }) => entry);
}
