import type { Command } from 'commander';

/**
 * Add the simulation settings flags. Defaults live in the zod schemas.
 */
export function addSettingsOptions(cmd: Command, { region = true }: { region?: boolean } = {}): Command {
  if (region) {
    cmd.option('--region <region>', 'Region (e.g. USA, CHN, EUR)');
  }
  return cmd
    .option('--universe <universe>', 'Universe (e.g. TOP3000)')
    .option('--delay <n>', 'Data delay in days')
    .option('--decay <n>', 'Linear decay window')
    .option('--neutralization <mode>', 'INDUSTRY, SECTOR, MARKET, SUBINDUSTRY or NONE')
    .option('--truncation <fraction>', 'Per-position weight cap in [0, 1]')
    .option('--concurrency <n>', 'Maximum simulations in flight')
    .option('--format <format>', 'Output format', 'table');
}

export function addCriteriaOptions(cmd: Command): Command {
  return cmd
    .option('--min-sharpe <n>', 'Minimum absolute Sharpe ratio')
    .option('--min-fitness <n>', 'Minimum absolute fitness')
    .option('--min-turnover <n>', 'Minimum turnover')
    .option('--max-turnover <n>', 'Maximum turnover');
}
