/**
 * @alphaminer/analytics
 *
 * Parameter variations, metric comparison and acceptance policy.
 */

export {
  extractParameters,
  substituteParameters,
  candidateValues,
  generateVariations,
  DEFAULT_VARIATION_OPTIONS,
  type ParameterSite,
  type VariationOptions,
} from './variation/parameter-variation';

export {
  ResultAggregator,
  compareMetrics,
  COMPARED_METRICS,
  type ComparedMetric,
  type ComparableMetrics,
  type MetricChange,
  type ImprovementReport,
  type BatchMetricsSummary,
} from './aggregators/ResultAggregator';

export {
  meetsCriteria,
  checkSubmissionReadiness,
  rankBySharpe,
  BLOCKING_CHECKS,
  DEFAULT_ACCEPTANCE_CRITERIA,
  type AcceptanceCriteria,
  type ReadinessReport,
} from './criteria';
