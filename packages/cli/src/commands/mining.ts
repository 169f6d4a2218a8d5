/**
 * Mining Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types';
import { toRegisteredCommand, type CommandRegistry } from '../core/command-registry';
import type { CommandContext } from '../core/command-context';
import { defineCommand } from '../core/defineCommand';
import { mineSchema } from '../command-defs/mining';
import { mineVariationsHandler } from '../handlers/mining/mine-variations';
import { addCriteriaOptions, addSettingsOptions } from './shared-options';

/**
 * Register mining commands
 */
export function registerMiningCommands(program: Command, registry: CommandRegistry, ctx: CommandContext): void {
  const miningCmd = program.command('mining').description('Search for better expressions');

  defineCommand(
    addCriteriaOptions(
      addSettingsOptions(
        miningCmd
          .command('variations')
          .description('Vary the numeric parameters of an expression and rank the results')
          .argument('<expression>', 'Base expression')
      )
    )
      .option('--range <fraction>', 'Relative search range around each parameter')
      .option('--min-per-param <n>', 'Candidates for parameters up to 20')
      .option('--max-per-param <n>', 'Candidates for larger parameters')
      .option('--max-variations <n>', 'Upper bound on variants, the original included')
      .option('--skip-simulation', 'Only generate and save the variations'),
    {
      name: 'variations',
      registry,
      ctx,
      argsToOpts: ([expression], opts) => ({ ...opts, expression }),
    }
  );
}

/**
 * Register as package command module
 */
export const miningModule: PackageCommandModule = {
  packageName: 'mining',
  description: 'Search for better expressions',
  commands: [
    toRegisteredCommand({
      name: 'variations',
      description: 'Vary the numeric parameters of an expression and rank the results',
      schema: mineSchema,
      handler: mineVariationsHandler,
      examples: ['alphaminer mining variations "ts_rank(close, 20)" --max-variations 10 --min-sharpe 1.5'],
    }),
  ],
};
