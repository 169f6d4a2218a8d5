/**
 * Handler for simulating one or more expressions under one set of settings.
 */

import type { CommandContext } from '../../core/command-context';
import { settingsFromArgs, type SimulateArgs } from '../../command-defs/simulation';
import { toSimulationRow, type SimulationRow } from './simulation-row';

export async function simulateExpressionsHandler(
  args: SimulateArgs,
  ctx: CommandContext
): Promise<SimulationRow[]> {
  const { orchestrator, limits } = ctx.services;
  const settings = settingsFromArgs(args);

  const batch = await orchestrator.simulateBatch(
    args.expressions.map((expression) => ({ expression, settings })),
    {
      maxConcurrency: args.concurrency ?? limits.maxConcurrentSimulations,
      reportPrefix: args.reportPrefix,
    }
  );

  return batch.entries.map(toSimulationRow);
}
