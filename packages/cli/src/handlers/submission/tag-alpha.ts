/**
 * Handler for setting name, color, tags or description on an alpha.
 */

import type { AlphaProperties } from '@alphaminer/core';
import { tagAlpha } from '@alphaminer/workflows';
import { errorFromFailure } from '@alphaminer/utils';
import type { CommandContext } from '../../core/command-context';
import type { TagArgs } from '../../command-defs/submission';

export async function tagAlphaHandler(args: TagArgs, ctx: CommandContext) {
  const { submissions, workflow } = ctx.services;

  // Build properties - only include fields that were provided
  const properties: AlphaProperties = {};
  if (args.tags !== undefined) properties.tags = args.tags;
  if (args.name !== undefined) properties.name = args.name;
  if (args.color !== undefined) properties.color = args.color;
  if (args.description !== undefined) properties.description = args.description;

  const result = await tagAlpha(submissions, args.alphaId, properties, workflow);
  if (!result.ok) {
    throw errorFromFailure(result.error);
  }

  return { alphaId: args.alphaId, updated: result.value, fields: Object.keys(properties).join(',') };
}
