/**
 * Metric Domain Types
 */

export interface MetricCheck {
  name: string;
  /** PASS, FAIL, WARNING or PENDING as reported by the service */
  result: string;
  limit?: number;
  value?: number;
}

/**
 * In-sample metrics reported for a completed simulation
 */
export interface MetricSet {
  sharpe: number;
  fitness: number | null;
  turnover: number;
  returns: number;
  drawdown: number;
  margin: number;
  longCount: number;
  shortCount: number;
  checks: MetricCheck[];
}

export function allChecksPassed(metrics: MetricSet): boolean {
  return metrics.checks.every((check) => check.result === 'PASS');
}

export function totalPositions(metrics: MetricSet): number {
  return metrics.longCount + metrics.shortCount;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseMetricCheck(data: Record<string, unknown>): MetricCheck {
  const check: MetricCheck = {
    name: typeof data.name === 'string' ? data.name : '',
    result: typeof data.result === 'string' ? data.result : '',
  };
  const limit = optionalNumber(data.limit);
  const value = optionalNumber(data.value);
  if (limit !== undefined) check.limit = limit;
  if (value !== undefined) check.value = value;
  return check;
}

/**
 * Parse the `is` block of an alpha payload into a MetricSet
 */
export function parseMetricSet(data: Record<string, unknown>): MetricSet {
  const rawChecks = Array.isArray(data.checks) ? data.checks : [];
  return {
    sharpe: numberOr(data.sharpe, 0),
    fitness: optionalNumber(data.fitness) ?? null,
    turnover: numberOr(data.turnover, 0),
    returns: numberOr(data.returns, 0),
    drawdown: numberOr(data.drawdown, 0),
    margin: numberOr(data.margin, 0),
    longCount: numberOr(data.longCount, 0),
    shortCount: numberOr(data.shortCount, 0),
    checks: rawChecks.filter(isRecord).map(parseMetricCheck),
  };
}
