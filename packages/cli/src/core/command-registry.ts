/**
 * Command Registry - command lookup and help text
 */

import { ConfigurationError } from '@alphaminer/utils';
import type { CommandDefinition, PackageCommandModule, RegisteredCommand } from '../types';
import { validateAndCoerceArgs } from './validation-pipeline';

/**
 * Erase a definition's argument type behind its own validation step
 */
export function toRegisteredCommand<TArgs>(definition: CommandDefinition<TArgs>): RegisteredCommand {
  return {
    name: definition.name,
    description: definition.description,
    examples: definition.examples ?? [],
    run: (rawArgs, ctx) => definition.handler(validateAndCoerceArgs(definition.schema, rawArgs), ctx),
  };
}

export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, RegisteredCommand> = new Map();

  /**
   * Register a package command module. Command names are global.
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(`Package ${module.packageName} is already registered`, 'packageName', {
        packageName: module.packageName,
      });
    }

    for (const command of module.commands) {
      if (this.commands.has(command.name)) {
        throw new ConfigurationError(`Command ${command.name} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
    }

    this.packages.set(module.packageName, module);
    for (const command of module.commands) {
      this.commands.set(command.name, command);
    }
  }

  getCommand(commandName: string): RegisteredCommand | undefined {
    return this.commands.get(commandName);
  }

  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }

  getAllCommands(): RegisteredCommand[] {
    return Array.from(this.commands.values());
  }

  /**
   * Generate help text for all packages and their commands
   */
  generateHelp(): string {
    const lines: string[] = [];
    for (const module of this.packages.values()) {
      lines.push(`${module.packageName}: ${module.description}`);
      for (const command of module.commands) {
        lines.push(`  ${command.name.padEnd(12)} ${command.description}`);
        for (const example of command.examples) {
          lines.push(`    Example: ${example}`);
        }
      }
    }
    return lines.join('\n');
  }
}
