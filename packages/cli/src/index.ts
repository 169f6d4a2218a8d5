/**
 * @alphaminer/cli
 */

export { createProgram, createCommandRegistry, CLI_VERSION } from './program';
export { CommandContext, createDefaultServices } from './core/command-context';
export type { CommandServices, CommandContextOptions, OutputWriter } from './core/command-context';
export { CommandRegistry, toRegisteredCommand } from './core/command-registry';
export { execute } from './core/execute';
export { defineCommand } from './core/defineCommand';
export { formatOutput, formatJSON, formatTable, formatCSV } from './core/output-formatter';
export { formatError, handleError } from './core/error-handler';
export type { CommandDefinition, OutputFormat, PackageCommandModule, RegisteredCommand } from './types';
