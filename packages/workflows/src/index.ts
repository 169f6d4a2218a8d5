/**
 * @alphaminer/workflows
 *
 * Orchestration over the simulation client: batches, regions, mining,
 * polishing, generation and submission.
 */

export type {
  BatchEntry,
  BatchFailure,
  BatchResult,
  ReferenceCatalog,
  ReportSink,
  SimulationGateway,
  SimulationOutcome,
  SimulationRequest,
  SubmissionGateway,
  WorkflowContext,
  WorkflowLogger,
} from './types';

export { runWorkerPool, type WorkerPoolOptions } from './pool/runWorkerPool';

export {
  BatchOrchestrator,
  DEFAULT_MAX_CONCURRENCY,
  type BatchOptions,
  type BatchOrchestratorConfig,
  type MultiRegionOptions,
} from './simulation/BatchOrchestrator';

export {
  submitAlphas,
  tagAlpha,
  findSuccessfulAlphas,
  DEFAULT_SUBMISSION_CONCURRENCY,
  type FindAlphasOptions,
  type SubmissionEntry,
  type SubmissionReport,
  type SubmitAlphasOptions,
} from './submission/submitAlphas';

export { mineVariations, type MineOptions, type MinedVariation, type MiningReport } from './mining/mineVariations';
export { polishExpression, type PolishOptions, type PolishReport } from './mining/polishExpression';
export { generateExpressions, type GenerationRequest } from './mining/generateExpressions';

export { ReportWriter, tryWriteReport } from './reports/ReportWriter';

export {
  createWorkflowContext,
  createProductionServices,
  type ProductionContextConfig,
  type ProductionServices,
} from './context/createProductionContext';
