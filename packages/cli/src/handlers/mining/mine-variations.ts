/**
 * Handler for parameter mining: generate variations of one expression,
 * simulate them and rank the ones that meet the criteria.
 */

import { mineVariations } from '@alphaminer/workflows';
import { errorFromFailure } from '@alphaminer/utils';
import type { CommandContext } from '../../core/command-context';
import { criteriaFromArgs, type MineArgs } from '../../command-defs/mining';
import { settingsFromArgs } from '../../command-defs/simulation';

export type MineRow =
  | { index: number; expression: string }
  | {
      rank: number;
      expression: string;
      alphaId: string | null;
      sharpe: number | null;
      fitness: number | null;
      turnover: number | null;
    };

export async function mineVariationsHandler(args: MineArgs, ctx: CommandContext): Promise<MineRow[]> {
  const { orchestrator, workflow, limits } = ctx.services;

  const result = await mineVariations(
    orchestrator,
    { expression: args.expression, settings: settingsFromArgs(args) },
    {
      variation: {
        rangePercent: args.range,
        minPerParam: args.minPerParam,
        maxPerParam: args.maxPerParam,
        maxVariations: args.maxVariations,
      },
      skipSimulation: args.skipSimulation,
      criteria: criteriaFromArgs(args),
      maxConcurrency: args.concurrency ?? limits.maxConcurrentSimulations,
    },
    workflow
  );

  if (!result.ok) {
    throw errorFromFailure(result.error);
  }

  if (args.skipSimulation) {
    return result.value.variations.map((expression, index) => ({ index, expression }));
  }

  return result.value.best.map((variation, i) => ({
    rank: i + 1,
    expression: variation.expression,
    alphaId: variation.alphaId,
    sharpe: variation.metrics?.sharpe ?? null,
    fitness: variation.metrics?.fitness ?? null,
    turnover: variation.metrics?.turnover ?? null,
  }));
}
