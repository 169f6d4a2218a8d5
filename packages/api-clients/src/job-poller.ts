/**
 * Job Poller
 * ==========
 * Drives a remote job to a terminal state by repeated status queries.
 *
 * Only counted iterations use up `maxAttempts`; a 429 wait is free. The
 * evaluation profile completes on `status: COMPLETE`, the submission profile
 * on any JSON object that does not report FAILED or ERROR.
 */

import {
  ok,
  err,
  failure,
  transitionJob,
  type Failure,
  type Job,
  type Result,
} from '@alphaminer/core';
import { createPackageLogger, sleep as defaultSleep, type SleepFn } from '@alphaminer/utils';
import { parseRetryAfterMs, type ApiResponse } from './base-client';

const logger = createPackageLogger('@alphaminer/api-clients');

export type CompletionRule = 'status-field' | 'any-body';

export interface PollProfile {
  maxAttempts: number;
  pollIntervalMs: number;
  completion: CompletionRule;
}

export const SIMULATION_POLL_PROFILE: Readonly<PollProfile> = Object.freeze({
  maxAttempts: 60,
  pollIntervalMs: 5000,
  completion: 'status-field',
});

export const SUBMISSION_POLL_PROFILE: Readonly<PollProfile> = Object.freeze({
  maxAttempts: 30,
  pollIntervalMs: 10000,
  completion: 'any-body',
});

/**
 * The one client capability the poller needs
 */
export interface JobStatusSource {
  pollJobOnce(handle: string): Promise<Result<ApiResponse>>;
}

type PollStep =
  | { kind: 'done'; payload: Record<string, unknown> }
  | { kind: 'failed'; status: 'FAILED' | 'ERROR'; failure: Failure }
  | { kind: 'waiting'; running: boolean; reason: string }
  | { kind: 'rate_limited'; waitMs: number };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEmptyBody(body: unknown): boolean {
  return body === '' || body === null || body === undefined;
}

export class JobPoller {
  private readonly profile: PollProfile;
  private readonly sleep: SleepFn;

  constructor(
    private readonly source: JobStatusSource,
    profile: Partial<PollProfile> = {},
    sleep: SleepFn = defaultSleep
  ) {
    this.profile = { ...SIMULATION_POLL_PROFILE, ...profile };
    this.sleep = sleep;
  }

  getProfile(): PollProfile {
    return { ...this.profile };
  }

  /**
   * Interpret one status response
   */
  classify(response: ApiResponse): PollStep {
    const { status, headers, body } = response;

    if (status === 429) {
      return { kind: 'rate_limited', waitMs: parseRetryAfterMs(headers, this.profile.pollIntervalMs) };
    }
    if (status === 202 || status === 204 || (status === 200 && isEmptyBody(body))) {
      return { kind: 'waiting', running: false, reason: `still processing (HTTP ${status})` };
    }
    if (status !== 200) {
      return { kind: 'waiting', running: false, reason: `unexpected HTTP ${status}` };
    }
    if (!isRecord(body)) {
      return { kind: 'waiting', running: false, reason: 'unparsable status body' };
    }

    const remoteStatus = typeof body.status === 'string' ? body.status.toUpperCase() : undefined;
    const failedAs = remoteStatus === 'FAILED' ? 'FAILED' : remoteStatus === 'ERROR' ? 'ERROR' : null;
    if (failedAs) {
      const message = typeof body.message === 'string' ? body.message : `Job reported ${failedAs}`;
      return {
        kind: 'failed',
        status: failedAs,
        failure: failure('job_failed', message, { status, body }),
      };
    }
    if (remoteStatus === 'COMPLETE' || this.profile.completion === 'any-body') {
      return { kind: 'done', payload: body };
    }
    return {
      kind: 'waiting',
      running: remoteStatus === 'RUNNING',
      reason: `status ${remoteStatus ?? 'missing'}`,
    };
  }

  /**
   * Poll until the job is terminal. The job is updated in place.
   */
  async poll(job: Job): Promise<Result<Record<string, unknown>>> {
    const { maxAttempts, pollIntervalMs } = this.profile;
    const jobLogger = logger.child({ jobHandle: job.handle });
    let attempts = 0;

    while (attempts < maxAttempts) {
      const result = await this.source.pollJobOnce(job.handle);

      let reason: string;
      if (!result.ok) {
        if (result.error.kind === 'auth') {
          jobLogger.error('Polling stopped: client is not authenticated', result.error);
          return result;
        }
        reason = result.error.message;
      } else {
        const step = this.classify(result.value);

        if (step.kind === 'done') {
          transitionJob(job, 'COMPLETE', step.payload);
          jobLogger.debug('Job complete', { attempts: attempts + 1 });
          return ok(step.payload);
        }
        if (step.kind === 'failed') {
          transitionJob(job, step.status, isRecord(result.value.body) ? result.value.body : undefined);
          jobLogger.warn('Job failed remotely', { status: step.status, message: step.failure.message });
          return err(step.failure);
        }
        if (step.kind === 'rate_limited') {
          jobLogger.debug('Rate limited while polling', { waitMs: step.waitMs });
          await this.sleep(step.waitMs);
          continue;
        }
        if (step.running) {
          transitionJob(job, 'RUNNING');
        }
        reason = step.reason;
      }

      attempts += 1;
      jobLogger.trace('Job not finished', { attempt: attempts, maxAttempts, reason });
      if (attempts < maxAttempts) {
        await this.sleep(pollIntervalMs);
      }
    }

    transitionJob(job, 'TIMEOUT');
    jobLogger.warn('Job polling timed out', { maxAttempts });
    return err(failure('timeout', `Job ${job.handle} did not finish after ${maxAttempts} polls`));
  }
}
