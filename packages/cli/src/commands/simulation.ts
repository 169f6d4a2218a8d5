/**
 * Simulation Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types';
import { toRegisteredCommand, type CommandRegistry } from '../core/command-registry';
import type { CommandContext } from '../core/command-context';
import { defineCommand } from '../core/defineCommand';
import { regionsSchema, simulateSchema } from '../command-defs/simulation';
import { simulateExpressionsHandler } from '../handlers/simulation/simulate-expressions';
import { simulateRegionsHandler } from '../handlers/simulation/simulate-regions';
import { addSettingsOptions } from './shared-options';

/**
 * Register simulation commands
 */
export function registerSimulationCommands(program: Command, registry: CommandRegistry, ctx: CommandContext): void {
  const simulationCmd = program.command('simulation').description('Simulate expressions on the remote service');

  // Run command
  defineCommand(
    addSettingsOptions(
      simulationCmd
        .command('run')
        .description('Simulate one or more expressions')
        .argument('<expressions...>', 'Expressions to simulate')
    ).option('--report-prefix <prefix>', 'Report file prefix'),
    {
      name: 'run',
      registry,
      ctx,
      argsToOpts: ([expressions], opts) => ({ ...opts, expressions }),
    }
  );

  // Regions command
  defineCommand(
    addSettingsOptions(
      simulationCmd
        .command('regions')
        .description('Simulate the same expressions in several regions')
        .argument('<expressions...>', 'Expressions to simulate')
        .requiredOption('--regions <list>', 'Comma-separated regions, e.g. USA,CHN'),
      { region: false }
    ).option('--report-prefix <prefix>', 'Report file prefix'),
    {
      name: 'regions',
      registry,
      ctx,
      argsToOpts: ([expressions], opts) => ({ ...opts, expressions }),
    }
  );
}

/**
 * Register as package command module
 */
export const simulationModule: PackageCommandModule = {
  packageName: 'simulation',
  description: 'Simulate expressions on the remote service',
  commands: [
    toRegisteredCommand({
      name: 'run',
      description: 'Simulate one or more expressions',
      schema: simulateSchema,
      handler: simulateExpressionsHandler,
      examples: ['alphaminer simulation run "rank(ts_mean(close, 10))" --region USA --decay 4'],
    }),
    toRegisteredCommand({
      name: 'regions',
      description: 'Simulate the same expressions in several regions',
      schema: regionsSchema,
      handler: simulateRegionsHandler,
      examples: ['alphaminer simulation regions "rank(-returns)" --regions USA,CHN,EUR'],
    }),
  ],
};
