/**
 * Handler for running the same expressions in several regions.
 */

import type { CommandContext } from '../../core/command-context';
import { settingsFromArgs, type RegionsArgs } from '../../command-defs/simulation';
import { toSimulationRow, type SimulationRow } from './simulation-row';

export type RegionRow = { region: string } & SimulationRow;

export async function simulateRegionsHandler(args: RegionsArgs, ctx: CommandContext): Promise<RegionRow[]> {
  const { orchestrator, limits } = ctx.services;
  const settings = settingsFromArgs(args);

  const byRegion = await orchestrator.simulateMultipleRegions(
    args.expressions.map((expression) => ({ expression, settings })),
    args.regions,
    {
      maxConcurrency: args.concurrency ?? limits.maxConcurrentSimulations,
      reportPrefix: args.reportPrefix,
    }
  );

  return args.regions.flatMap((region) =>
    (byRegion[region]?.entries ?? []).map((entry) => ({ region, ...toSimulationRow(entry) }))
  );
}
