/**
 * Handler for finding recent unsubmitted alphas that meet the criteria and
 * submitting them.
 */

import { findSuccessfulAlphas, submitAlphas } from '@alphaminer/workflows';
import { errorFromFailure } from '@alphaminer/utils';
import type { CommandContext } from '../../core/command-context';
import { criteriaFromArgs } from '../../command-defs/mining';
import type { SubmitArgs } from '../../command-defs/submission';

export interface SubmissionRow {
  alphaId: string;
  expression: string;
  status: 'CANDIDATE' | 'SUBMITTED' | 'FAILED' | 'SKIPPED';
  detail: string | null;
}

export async function submitAlphasHandler(args: SubmitArgs, ctx: CommandContext): Promise<SubmissionRow[]> {
  const { submissions, workflow, limits } = ctx.services;
  const criteria = criteriaFromArgs(args);

  const found = await findSuccessfulAlphas(
    submissions,
    criteria,
    { maxResults: args.maxResults, maxAgeDays: args.maxAgeDays },
    workflow
  );
  if (!found.ok) {
    throw errorFromFailure(found.error);
  }

  if (args.dryRun) {
    return found.value.map((alpha): SubmissionRow => ({
      alphaId: alpha.id,
      expression: alpha.expression,
      status: 'CANDIDATE',
      detail: null,
    }));
  }

  const report = await submitAlphas(
    submissions,
    found.value,
    {
      validate: args.validate,
      criteria,
      maxConcurrency: args.concurrency ?? limits.maxConcurrentSubmissions,
    },
    workflow
  );

  const expressions = new Map(found.value.map((alpha) => [alpha.id, alpha.expression]));
  const rows = report.entries.map((entry): SubmissionRow => ({
    alphaId: entry.alphaId,
    expression: entry.expression,
    status: entry.result.ok ? 'SUBMITTED' : 'FAILED',
    detail: entry.result.ok ? null : entry.result.error.message,
  }));
  for (const skipped of report.skipped) {
    rows.push({
      alphaId: skipped.alphaId,
      expression: expressions.get(skipped.alphaId) ?? '',
      status: 'SKIPPED',
      detail: skipped.issues.join('; '),
    });
  }
  return rows;
}
