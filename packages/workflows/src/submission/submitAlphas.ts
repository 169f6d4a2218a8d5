/**
 * Alpha submission workflows
 * ==========================
 * Finding alphas worth submitting, submitting them through the worker pool
 * and tagging them afterwards.
 */

import { createJob, err, ok, type AlphaProperties, type AlphaRecord, type Result } from '@alphaminer/core';
import { JobPoller, SUBMISSION_POLL_PROFILE, type PollProfile } from '@alphaminer/api-clients';
import { checkSubmissionReadiness, meetsCriteria, type AcceptanceCriteria } from '@alphaminer/analytics';
import { failureFromError, type SleepFn } from '@alphaminer/utils';
import { runWorkerPool } from '../pool/runWorkerPool';
import { tryWriteReport } from '../reports/ReportWriter';
import type { SubmissionGateway, WorkflowContext } from '../types';

export const DEFAULT_SUBMISSION_CONCURRENCY = 3;
const PAGE_SIZE = 50;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface SubmitAlphasOptions {
  /** Check readiness first and skip alphas that are not ready */
  validate?: boolean;
  maxConcurrency?: number;
  criteria?: Partial<AcceptanceCriteria>;
  pollProfile?: Partial<PollProfile>;
  sleep?: SleepFn;
  /** Write a `submission_results` report */
  saveResults?: boolean;
}

export interface SubmissionEntry {
  alphaId: string;
  expression: string;
  result: Result<Record<string, unknown>>;
}

export interface SubmissionReport {
  entries: SubmissionEntry[];
  successCount: number;
  skipped: Array<{ alphaId: string; issues: string[] }>;
  reportPath: string | null;
}

export async function submitAlphas(
  gateway: SubmissionGateway,
  alphas: readonly AlphaRecord[],
  options: SubmitAlphasOptions,
  ctx: WorkflowContext
): Promise<SubmissionReport> {
  const validate = options.validate ?? true;
  const skipped: SubmissionReport['skipped'] = [];
  const toSubmit: AlphaRecord[] = [];

  for (const alpha of alphas) {
    if (validate) {
      const readiness = checkSubmissionReadiness(alpha.metrics, options.criteria);
      if (!readiness.ready) {
        ctx.logger.warn('Alpha is not ready for submission', { alphaId: alpha.id, issues: readiness.issues });
        skipped.push({ alphaId: alpha.id, issues: readiness.issues });
        continue;
      }
    }
    toSubmit.push(alpha);
  }

  ctx.logger.info('Submitting alphas', { count: toSubmit.length, skipped: skipped.length });
  const poller = new JobPoller(gateway, { ...SUBMISSION_POLL_PROFILE, ...options.pollProfile }, options.sleep);

  const entries = await runWorkerPool(
    toSubmit,
    async (alpha): Promise<SubmissionEntry> => {
      const result = await submitOne(gateway, poller, alpha.id);
      if (result.ok) {
        ctx.logger.info('Alpha submitted', { alphaId: alpha.id });
      } else {
        ctx.logger.warn('Alpha submission failed', { alphaId: alpha.id, failure: result.error });
      }
      return { alphaId: alpha.id, expression: alpha.expression, result };
    },
    { concurrency: options.maxConcurrency ?? DEFAULT_SUBMISSION_CONCURRENCY }
  );

  const successCount = entries.filter((entry) => entry.result.ok).length;
  const reportPath =
    options.saveResults === false || entries.length === 0
      ? null
      : await tryWriteReport(
          ctx.reports,
          'submission_results',
          entries.map((entry) => ({
            alphaId: entry.alphaId,
            expression: entry.expression,
            submissionResult: entry.result.ok ? entry.result.value : { failure: entry.result.error },
          }))
        );

  ctx.logger.info('Submission complete', { successCount, total: entries.length });
  return { entries, successCount, skipped, reportPath };
}

async function submitOne(
  gateway: SubmissionGateway,
  poller: JobPoller,
  alphaId: string
): Promise<Result<Record<string, unknown>>> {
  try {
    const started = await gateway.startAlphaSubmission(alphaId);
    if (!started.ok) {
      return started;
    }
    return await poller.poll(createJob(started.value));
  } catch (error) {
    return err(failureFromError(error));
  }
}

/**
 * Set name, color, tags or description on an alpha. Fields left undefined
 * are not touched; an empty update sends nothing and returns false.
 */
export async function tagAlpha(
  gateway: SubmissionGateway,
  alphaId: string,
  properties: AlphaProperties,
  ctx: Pick<WorkflowContext, 'logger'>
): Promise<Result<boolean>> {
  const result = await gateway.patchAlphaProperties(alphaId, properties);
  if (result.ok && result.value) {
    ctx.logger.info('Alpha properties updated', { alphaId, fields: Object.keys(properties) });
  } else if (!result.ok) {
    ctx.logger.error('Failed to update alpha properties', { alphaId, failure: result.error });
  }
  return result;
}

export interface FindAlphasOptions {
  maxResults?: number;
  /** Ignore alphas created more than this many days ago */
  maxAgeDays?: number;
}

/**
 * Page through unsubmitted alphas, newest first, keeping those that meet the
 * criteria.
 */
export async function findSuccessfulAlphas(
  gateway: SubmissionGateway,
  criteria: Partial<AcceptanceCriteria>,
  options: FindAlphasOptions,
  ctx: Pick<WorkflowContext, 'clock' | 'logger'>
): Promise<Result<AlphaRecord[]>> {
  const maxResults = options.maxResults ?? 100;
  const maxAgeDays = options.maxAgeDays ?? 30;
  const cutoffMs = ctx.clock.nowMs() - maxAgeDays * DAY_MS;
  const found: AlphaRecord[] = [];
  let offset = 0;

  while (found.length < maxResults) {
    const page = await gateway.listAlphas({
      limit: PAGE_SIZE,
      offset,
      status: 'UNSUBMITTED',
      order: '-dateCreated',
    });
    if (!page.ok) {
      ctx.logger.error('Failed to list alphas', { offset, failure: page.error });
      return page;
    }

    for (const alpha of page.value.results) {
      if (alpha.dateCreated !== null && alpha.dateCreated.getTime() < cutoffMs) continue;
      if (alpha.metrics === null || !meetsCriteria(alpha.metrics, criteria)) continue;
      found.push(alpha);
      if (found.length >= maxResults) break;
    }

    if (page.value.results.length < PAGE_SIZE) break;
    offset += PAGE_SIZE;
  }

  ctx.logger.info('Found successful alphas', { count: found.length });
  return ok(found);
}
