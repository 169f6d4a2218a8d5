/**
 * Remote Job State
 *
 * A Job is created in PENDING when a submission returns its poll handle and
 * is mutated only by the poller. Terminal states are never left.
 */

export type JobStatus = 'PENDING' | 'RUNNING' | 'COMPLETE' | 'FAILED' | 'ERROR' | 'TIMEOUT';

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'COMPLETE',
  'FAILED',
  'ERROR',
  'TIMEOUT',
]);

export interface Job {
  /** Opaque locator returned by submission (absolute URL or path) */
  readonly handle: string;
  status: JobStatus;
  resultPayload?: Record<string, unknown>;
}

export function createJob(handle: string): Job {
  return { handle, status: 'PENDING' };
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.has(status);
}

/**
 * Move a job to a new status. Returns false (and leaves the job untouched)
 * when the job is already terminal.
 */
export function transitionJob(
  job: Job,
  next: JobStatus,
  payload?: Record<string, unknown>
): boolean {
  if (isTerminal(job.status)) {
    return false;
  }
  job.status = next;
  if (payload !== undefined) {
    job.resultPayload = payload;
  }
  return true;
}
