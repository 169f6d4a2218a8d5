/**
 * Batch Orchestrator
 * ==================
 * Runs many simulations through a bounded worker pool. Each worker takes one
 * request through validate, submit, poll and alpha lookup, and records the
 * outcome against that request only.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  createJob,
  err,
  failure,
  findSettingsProblem,
  ok,
  validateExpression,
  withRegion,
  type MetricSet,
  type Result,
} from '@alphaminer/core';
import { JobPoller, type PollProfile } from '@alphaminer/api-clients';
import { ResultAggregator } from '@alphaminer/analytics';
import { createPackageLogger, failureFromError, type SleepFn } from '@alphaminer/utils';
import { runWorkerPool } from '../pool/runWorkerPool';
import { tryWriteReport } from '../reports/ReportWriter';
import type {
  BatchEntry,
  BatchResult,
  ReportSink,
  SimulationGateway,
  SimulationOutcome,
  SimulationRequest,
} from '../types';

const logger = createPackageLogger('@alphaminer/workflows');

export const DEFAULT_MAX_CONCURRENCY = 5;

export interface BatchOrchestratorConfig {
  gateway: SimulationGateway;
  pollProfile?: Partial<PollProfile>;
  sleep?: SleepFn;
  maxConcurrency?: number;
  /** Where batch reports go; reports are skipped without one */
  reports?: ReportSink;
  ids?: { newRunId(): string };
}

export interface BatchOptions {
  maxConcurrency?: number;
  /** Called as each request finishes, in completion order */
  onResult?: (entry: BatchEntry) => void;
  /** Write a `<prefix>_<unixSeconds>.json` report when set */
  reportPrefix?: string;
}

export interface MultiRegionOptions {
  maxConcurrency?: number;
  /** Per-region reports use `<prefix>_<region>`; the summary `<prefix>_aggregated` */
  reportPrefix?: string;
}

function describeEntry(entry: BatchEntry): Record<string, unknown> {
  const base = { expression: entry.request.expression, settings: entry.request.settings };
  if (entry.result.ok) {
    const { jobHandle, status, alphaId, metrics } = entry.result.value;
    return { ...base, success: true, jobHandle, status, alphaId, metrics };
  }
  return { ...base, success: false, failure: entry.result.error };
}

function summarizeBatch(entries: BatchEntry[]): Pick<BatchResult, 'successCount' | 'failures'> {
  let successCount = 0;
  const failures: BatchResult['failures'] = [];
  for (const entry of entries) {
    if (entry.result.ok) {
      successCount += 1;
    } else {
      failures.push({ index: entry.index, expression: entry.request.expression, failure: entry.result.error });
    }
  }
  return { successCount, failures };
}

export class BatchOrchestrator {
  private readonly gateway: SimulationGateway;
  private readonly poller: JobPoller;
  private readonly maxConcurrency: number;
  private readonly reports?: ReportSink;
  private readonly ids: { newRunId(): string };
  private readonly aggregator = new ResultAggregator();

  constructor(config: BatchOrchestratorConfig) {
    this.gateway = config.gateway;
    this.poller = new JobPoller(config.gateway, config.pollProfile, config.sleep);
    this.maxConcurrency = config.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    this.reports = config.reports;
    this.ids = config.ids ?? { newRunId: () => `batch_${uuidv4()}` };
  }

  /**
   * Take one request to a terminal outcome. Never throws.
   */
  async simulateOne(request: SimulationRequest): Promise<Result<SimulationOutcome>> {
    const { expression, settings } = request;

    const check = validateExpression(expression);
    if (!check.valid) {
      logger.warn('Rejected invalid expression', { expression, reason: check.reason });
      return err(failure('validation', check.message));
    }

    const settingsProblem = findSettingsProblem(settings);
    if (settingsProblem) {
      logger.warn('Rejected invalid settings', { expression, problem: settingsProblem });
      return err(failure('validation', settingsProblem));
    }

    try {
      const submitted = await this.gateway.submitSimulation(expression, settings);
      if (!submitted.ok) {
        return submitted;
      }

      const job = createJob(submitted.value);
      const polled = await this.poller.poll(job);
      if (!polled.ok) {
        return polled;
      }

      const alphaId = typeof polled.value.alpha === 'string' ? polled.value.alpha : null;
      let metrics: MetricSet | null = null;
      if (alphaId === null) {
        logger.warn('Completed job reported no alpha id', { jobHandle: job.handle });
      } else {
        const alpha = await this.gateway.getAlpha(alphaId);
        if (alpha.ok) {
          metrics = alpha.value.metrics;
        } else {
          logger.warn('Could not fetch alpha details, keeping outcome without metrics', {
            alphaId,
            failure: alpha.error,
          });
        }
      }

      return ok({ expression, settings, jobHandle: job.handle, status: job.status, alphaId, metrics });
    } catch (error) {
      logger.error('Unexpected error during simulation', error, { expression });
      return err(failureFromError(error));
    }
  }

  /**
   * Simulate every request. The result holds exactly one entry per request,
   * in input order.
   */
  async simulateBatch(requests: readonly SimulationRequest[], options: BatchOptions = {}): Promise<BatchResult> {
    const runId = this.ids.newRunId();
    const concurrency = options.maxConcurrency ?? this.maxConcurrency;
    const batchLogger = logger.child({ runId });
    batchLogger.info('Simulating batch', { jobs: requests.length, concurrency });

    const entries = await runWorkerPool(
      requests,
      async (request, index): Promise<BatchEntry> => ({
        index,
        request,
        result: await this.simulateOne(request),
      }),
      {
        concurrency,
        onSettled: (entry) => {
          if (entry.result.ok) {
            batchLogger.info('Simulation completed', { index: entry.index, alphaId: entry.result.value.alphaId });
          } else {
            batchLogger.warn('Simulation failed', { index: entry.index, failure: entry.result.error });
          }
          options.onResult?.(entry);
        },
      }
    );

    const { successCount, failures } = summarizeBatch(entries);
    const reportPath = options.reportPrefix
      ? await tryWriteReport(this.reports, options.reportPrefix, {
          runId,
          total: entries.length,
          successCount,
          results: entries.map(describeEntry),
        })
      : null;

    batchLogger.info('Batch complete', { successCount, total: entries.length });
    return { runId, entries, successCount, failures, reportPath };
  }

  /**
   * Rerun the same expressions once per region. Regions run one after another
   * and do not affect each other.
   */
  async simulateMultipleRegions(
    requests: readonly SimulationRequest[],
    regions: readonly string[],
    options: MultiRegionOptions = {}
  ): Promise<Record<string, BatchResult>> {
    const byRegion: Record<string, BatchResult> = {};

    for (const region of regions) {
      logger.info('Simulating region', { region, jobs: requests.length });
      const regional = requests.map((request) => ({
        expression: request.expression,
        settings: withRegion(request.settings, region),
      }));
      try {
        byRegion[region] = await this.simulateBatch(regional, {
          maxConcurrency: options.maxConcurrency,
          reportPrefix: options.reportPrefix ? `${options.reportPrefix}_${region.toLowerCase()}` : undefined,
        });
      } catch (error) {
        logger.error('Region failed', error, { region });
        const regionFailure = failureFromError(error);
        const entries: BatchEntry[] = regional.map((request, index) => ({
          index,
          request,
          result: err(regionFailure),
        }));
        byRegion[region] = {
          runId: this.ids.newRunId(),
          entries,
          ...summarizeBatch(entries),
          reportPath: null,
        };
      }
    }

    if (options.reportPrefix) {
      await tryWriteReport(this.reports, `${options.reportPrefix}_aggregated`, {
        regions: Object.fromEntries(
          Object.entries(byRegion).map(([region, batch]) => [
            region,
            {
              successCount: batch.successCount,
              total: batch.entries.length,
              summary: this.aggregator.summarize(
                batch.entries.map((entry) => (entry.result.ok ? entry.result.value.metrics : null))
              ),
            },
          ])
        ),
        expressions: requests.map((request, index) => ({
          expression: request.expression,
          byRegion: Object.fromEntries(
            Object.entries(byRegion).map(([region, batch]) => [region, describeEntry(batch.entries[index])])
          ),
        })),
      });
    }

    return byRegion;
  }
}
