/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context';

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table' | 'csv';

/**
 * Command definition structure
 */
export interface CommandDefinition<TArgs = unknown> {
  /**
   * Command name (e.g., 'simulate', 'submit')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;

  /**
   * Command handler; receives arguments already validated against `schema`
   */
  handler: (args: TArgs, ctx: CommandContext) => Promise<unknown>;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * A command with its argument type erased, as kept in the registry. `run`
 * validates raw options and calls the handler.
 */
export interface RegisteredCommand {
  name: string;
  description: string;
  examples: string[];
  run(rawArgs: Record<string, unknown>, ctx: CommandContext): Promise<unknown>;
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'simulation', 'submission')
   */
  packageName: string;

  /**
   * Package description
   */
  description: string;

  /**
   * Commands in this package
   */
  commands: RegisteredCommand[];
}
