import type { BatchEntry } from '@alphaminer/workflows';

/**
 * One printable line per simulated expression
 */
export interface SimulationRow {
  expression: string;
  success: boolean;
  alphaId: string | null;
  sharpe: number | null;
  fitness: number | null;
  turnover: number | null;
  error: string | null;
}

export function toSimulationRow(entry: BatchEntry): SimulationRow {
  const expression = entry.request.expression;
  if (!entry.result.ok) {
    return {
      expression,
      success: false,
      alphaId: null,
      sharpe: null,
      fitness: null,
      turnover: null,
      error: `${entry.result.error.kind}: ${entry.result.error.message}`,
    };
  }
  const { alphaId, metrics } = entry.result.value;
  return {
    expression,
    success: true,
    alphaId,
    sharpe: metrics?.sharpe ?? null,
    fitness: metrics?.fitness ?? null,
    turnover: metrics?.turnover ?? null,
    error: null,
  };
}
