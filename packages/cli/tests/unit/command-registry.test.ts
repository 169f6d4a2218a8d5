/**
 * Tests for command-registry.ts
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ConfigurationError, ValidationError } from '@alphaminer/utils';
import { CommandRegistry, toRegisteredCommand } from '../../src/core/command-registry';
import { CommandContext } from '../../src/core/command-context';
import { createCommandRegistry } from '../../src/program';
import { simulationModule } from '../../src/commands/simulation';

describe('CommandRegistry', () => {
  it('registers every command of the program', () => {
    const registry = createCommandRegistry();
    expect(registry.getAllCommands().map((c) => c.name)).toEqual(['run', 'regions', 'variations', 'submit', 'tag']);
    expect(registry.getPackages().map((p) => p.packageName)).toEqual(['simulation', 'mining', 'submission']);
  });

  it('rejects a package registered twice', () => {
    const registry = new CommandRegistry();
    registry.registerPackage(simulationModule);
    expect(() => registry.registerPackage(simulationModule)).toThrow(ConfigurationError);
  });

  it('rejects a command name already taken by another package', () => {
    const registry = new CommandRegistry();
    registry.registerPackage(simulationModule);
    expect(() =>
      registry.registerPackage({ packageName: 'other', description: 'Other', commands: simulationModule.commands })
    ).toThrow('Command run is already registered');
  });

  it('lists packages, commands and examples in the help text', () => {
    const lines = createCommandRegistry().generateHelp().split('\n');
    expect(lines[0]).toBe('simulation: Simulate expressions on the remote service');
    expect(lines[1]).toBe('  run          Simulate one or more expressions');
    expect(lines[2]).toBe(
      '    Example: alphaminer simulation run "rank(ts_mean(close, 10))" --region USA --decay 4'
    );
  });
});

describe('toRegisteredCommand', () => {
  const command = toRegisteredCommand({
    name: 'echo',
    description: 'Echo a count',
    schema: z.object({ count: z.coerce.number().int() }),
    handler: async (args) => ({ doubled: args.count * 2 }),
  });

  it('validates raw options before calling the handler', async () => {
    await expect(command.run({ count: '4' }, new CommandContext())).resolves.toEqual({ doubled: 8 });
  });

  it('rejects invalid options', async () => {
    await expect(command.run({ count: 'four' }, new CommandContext())).rejects.toThrow(ValidationError);
  });
});
