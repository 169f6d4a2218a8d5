/**
 * Standard Command Wrapper
 *
 * Commander owns flags and parsing; the wrapper merges positional arguments
 * into the options and hands them to execute(), which validates against the
 * registered schema.
 *
 * Invariant: normalization never renames keys.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@alphaminer/utils';
import type { CommandContext } from './command-context';
import type { CommandRegistry } from './command-registry';
import { execute } from './execute';

export type DefineCommandArgs = {
  name: string;
  registry: CommandRegistry;
  ctx: CommandContext;
  // Merge Commander positional arguments into options before validation
  argsToOpts?: (args: unknown[], rawOpts: Record<string, unknown>) => Record<string, unknown>;
};

export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  const command = args.registry.getCommand(args.name);
  if (!command) {
    throw new NotFoundError('Command', args.name);
  }

  cmd.action(async (...commanderArgs: unknown[]) => {
    const rawOpts = cmd.opts();
    const merged = args.argsToOpts ? args.argsToOpts(commanderArgs, rawOpts) : rawOpts;
    await execute(command, merged, args.ctx);
  });

  return cmd;
}
