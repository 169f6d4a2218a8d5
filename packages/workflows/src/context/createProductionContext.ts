import { v4 as uuidv4 } from 'uuid';
import { createSystemClock, type ClockPort } from '@alphaminer/core';
import { BrainClient, ReferenceDataCache } from '@alphaminer/api-clients';
import { createPackageLogger, loadConfig, type EnvConfig } from '@alphaminer/utils';
import { BatchOrchestrator } from '../simulation/BatchOrchestrator';
import { ReportWriter } from '../reports/ReportWriter';
import type { ReportSink, WorkflowContext, WorkflowLogger } from '../types';

export interface ProductionContextConfig {
  /**
   * Optional logger override (defaults to the workflows package logger)
   */
  logger?: WorkflowLogger;

  /**
   * Optional clock override (for testing)
   */
  clock?: ClockPort;

  /**
   * Optional ID generator override (for testing)
   */
  ids?: { newRunId(): string };

  /**
   * Optional report sink override (defaults to a ReportWriter on OUTPUT_DIR)
   */
  reports?: ReportSink;
}

export interface ProductionServices {
  ctx: WorkflowContext;
  client: BrainClient;
  orchestrator: BatchOrchestrator;
  referenceData: ReferenceDataCache;
  config: EnvConfig;
}

export function createWorkflowContext(outputDir: string, config: ProductionContextConfig = {}): WorkflowContext {
  const packageLogger = createPackageLogger('@alphaminer/workflows');
  const clock = config.clock ?? createSystemClock();

  return {
    clock,
    ids: config.ids ?? { newRunId: () => `run_${uuidv4()}` },
    logger: config.logger ?? {
      info: (message, context) => packageLogger.info(message, context),
      warn: (message, context) => packageLogger.warn(message, context),
      error: (message, context) => packageLogger.error(message, undefined, context),
      debug: (message, context) => packageLogger.debug(message, context),
    },
    reports: config.reports ?? new ReportWriter(outputDir, clock),
  };
}

/**
 * Wire the client, orchestrator and reference cache from configuration.
 * Nothing is shared between calls.
 */
export function createProductionServices(
  env: EnvConfig = loadConfig(),
  config: ProductionContextConfig = {}
): ProductionServices {
  const ctx = createWorkflowContext(env.OUTPUT_DIR, config);

  const client = new BrainClient({
    credentials: { username: env.BRAIN_USERNAME, password: env.BRAIN_PASSWORD },
    baseURL: env.BRAIN_BASE_URL,
    timeout: env.BRAIN_TIMEOUT_MS,
    retry: { maxRetries: env.BRAIN_MAX_RETRIES, initialDelayMs: env.BRAIN_RETRY_DELAY_MS },
  });

  const orchestrator = new BatchOrchestrator({
    gateway: client,
    maxConcurrency: env.MAX_CONCURRENT_SIMULATIONS,
    reports: ctx.reports,
    ids: ctx.ids,
  });

  return {
    ctx,
    client,
    orchestrator,
    referenceData: new ReferenceDataCache(client),
    config: env,
  };
}
