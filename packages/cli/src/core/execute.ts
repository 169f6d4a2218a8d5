/**
 * Command Executor
 *
 * Validates options, calls the handler, formats the result and turns any
 * error into a sanitized message on stderr.
 */

import { z } from 'zod';
import type { RegisteredCommand } from '../types';
import type { CommandContext } from './command-context';
import { formatOutput } from './output-formatter';
import { handleError } from './error-handler';

const formatSchema = z.enum(['json', 'table', 'csv']).catch('table');

/**
 * @returns whether the command succeeded
 */
export async function execute(
  command: RegisteredCommand,
  rawArgs: Record<string, unknown>,
  ctx: CommandContext
): Promise<boolean> {
  try {
    const result = await command.run(rawArgs, ctx);
    ctx.write(formatOutput(result, formatSchema.parse(rawArgs.format)));
    return true;
  } catch (error) {
    ctx.writeError(`Error: ${handleError(error, { command: command.name })}`);
    ctx.markFailed();
    return false;
  }
}
