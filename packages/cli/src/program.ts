/**
 * Program assembly
 *
 * Package modules go into the registry first; registerXCommands then adds the
 * Commander flags and wires each subcommand to execute().
 */

import { Command } from 'commander';
import { CommandContext } from './core/command-context';
import { CommandRegistry } from './core/command-registry';
import { miningModule, registerMiningCommands } from './commands/mining';
import { registerSimulationCommands, simulationModule } from './commands/simulation';
import { registerSubmissionCommands, submissionModule } from './commands/submission';

export const CLI_VERSION = '0.1.0';

export function createCommandRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registry.registerPackage(simulationModule);
  registry.registerPackage(miningModule);
  registry.registerPackage(submissionModule);
  return registry;
}

export function createProgram(ctx: CommandContext = new CommandContext()): Command {
  const registry = createCommandRegistry();
  const program = new Command();

  program
    .name('alphaminer')
    .description('Simulate, mine and submit expressions on WorldQuant Brain')
    .version(CLI_VERSION);

  registerSimulationCommands(program, registry, ctx);
  registerMiningCommands(program, registry, ctx);
  registerSubmissionCommands(program, registry, ctx);

  program
    .command('commands')
    .description('List every command with examples')
    .action(() => {
      ctx.write(registry.generateHelp());
    });

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}
