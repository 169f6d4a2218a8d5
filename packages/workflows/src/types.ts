import type {
  AlphaProperties,
  AlphaRecord,
  ClockPort,
  Failure,
  JobStatus,
  MetricSet,
  Result,
  SimulationSettings,
} from '@alphaminer/core';
import type {
  AlphaPage,
  DataFieldQuery,
  JobStatusSource,
  ListAlphasOptions,
  ReferenceRecord,
} from '@alphaminer/api-clients';

/**
 * One expression to evaluate under one set of settings
 */
export interface SimulationRequest {
  expression: string;
  settings: SimulationSettings;
}

export interface SimulationOutcome {
  expression: string;
  settings: SimulationSettings;
  jobHandle: string;
  status: JobStatus;
  /** Id of the alpha the completed job produced, when it reported one */
  alphaId: string | null;
  /** In-sample metrics; null when the alpha details could not be fetched */
  metrics: MetricSet | null;
}

export interface BatchEntry {
  index: number;
  request: SimulationRequest;
  result: Result<SimulationOutcome>;
}

export interface BatchFailure {
  index: number;
  expression: string;
  failure: Failure;
}

export interface BatchResult {
  runId: string;
  /** One entry per input, in input order */
  entries: BatchEntry[];
  successCount: number;
  failures: BatchFailure[];
  /** Where the batch report was written, if it was */
  reportPath: string | null;
}

/**
 * What the batch orchestrator needs from the remote service
 */
export interface SimulationGateway extends JobStatusSource {
  submitSimulation(expression: string, settings: SimulationSettings): Promise<Result<string>>;
  getAlpha(alphaId: string): Promise<Result<AlphaRecord>>;
}

/**
 * What the submission workflows need from the remote service
 */
export interface SubmissionGateway extends JobStatusSource {
  startAlphaSubmission(alphaId: string): Promise<Result<string>>;
  patchAlphaProperties(alphaId: string, properties: AlphaProperties): Promise<Result<boolean>>;
  listAlphas(options?: ListAlphasOptions): Promise<Result<AlphaPage>>;
}

/**
 * Operator and data field lookup; `ReferenceDataCache` in production
 */
export interface ReferenceCatalog {
  getOperators(): Promise<ReferenceRecord[]>;
  getDataFields(query?: DataFieldQuery): Promise<ReferenceRecord[]>;
}

export interface ReportSink {
  /** Persist `data` and return the path it was written to */
  write(prefix: string, data: unknown): Promise<string>;
}

export type WorkflowLogger = {
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, context?: Record<string, unknown>) => void;
  debug?: (message: string, context?: Record<string, unknown>) => void;
};

export type WorkflowContext = {
  clock: ClockPort;
  ids: { newRunId(): string };
  logger: WorkflowLogger;
  reports: ReportSink;
};
