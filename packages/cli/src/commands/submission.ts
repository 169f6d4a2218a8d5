/**
 * Submission Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types';
import { toRegisteredCommand, type CommandRegistry } from '../core/command-registry';
import type { CommandContext } from '../core/command-context';
import { defineCommand } from '../core/defineCommand';
import { submitSchema, tagSchema } from '../command-defs/submission';
import { submitAlphasHandler } from '../handlers/submission/submit-alphas';
import { tagAlphaHandler } from '../handlers/submission/tag-alpha';
import { addCriteriaOptions } from './shared-options';

/**
 * Register submission commands
 */
export function registerSubmissionCommands(program: Command, registry: CommandRegistry, ctx: CommandContext): void {
  const submissionCmd = program.command('submission').description('Submit and organize alphas');

  defineCommand(
    addCriteriaOptions(submissionCmd.command('submit').description('Submit recent alphas that meet the criteria'))
      .option('--max-results <n>', 'Maximum alphas to consider')
      .option('--max-age-days <n>', 'Ignore alphas older than this')
      .option('--no-validate', 'Submit without the readiness check')
      .option('--dry-run', 'List the candidates without submitting')
      .option('--concurrency <n>', 'Maximum submissions in flight')
      .option('--format <format>', 'Output format', 'table'),
    { name: 'submit', registry, ctx }
  );

  defineCommand(
    submissionCmd
      .command('tag')
      .description('Set tags, name, color or description on an alpha')
      .argument('<alphaId>', 'Alpha id')
      .option('--tags <list>', 'Comma-separated tags')
      .option('--name <name>', 'Alpha name')
      .option('--color <color>', 'Display color')
      .option('--description <text>', 'Description')
      .option('--format <format>', 'Output format', 'table'),
    {
      name: 'tag',
      registry,
      ctx,
      argsToOpts: ([alphaId], opts) => ({ ...opts, alphaId }),
    }
  );
}

/**
 * Register as package command module
 */
export const submissionModule: PackageCommandModule = {
  packageName: 'submission',
  description: 'Submit and organize alphas',
  commands: [
    toRegisteredCommand({
      name: 'submit',
      description: 'Submit recent alphas that meet the criteria',
      schema: submitSchema,
      handler: submitAlphasHandler,
      examples: ['alphaminer submission submit --min-sharpe 1.5 --dry-run'],
    }),
    toRegisteredCommand({
      name: 'tag',
      description: 'Set tags, name, color or description on an alpha',
      schema: tagSchema,
      handler: tagAlphaHandler,
      examples: ['alphaminer submission tag abc123 --tags momentum,usa --color GREEN'],
    }),
  ],
};
