/**
 * @alphaminer/api-clients
 *
 * HTTP client for the alpha simulation service, job poller and reference
 * data cache.
 */

export {
  BaseApiClient,
  headerValue,
  parseRetryAfterMs,
  type ApiResponse,
  type BaseApiClientConfig,
  type HttpMethod,
  type PreparedRequest,
  type RateLimiterConfig,
  type RequestOptions,
  type ResponseHeaders,
  type RetryConfig,
} from './base-client';

export {
  BrainClient,
  DEFAULT_BRAIN_BASE_URL,
  describeBody,
  type AlphaPage,
  type BrainClientConfig,
  type BrainCredentials,
  type DataFieldQuery,
  type ListAlphasOptions,
  type ReferenceRecord,
} from './brain-client';

export {
  JobPoller,
  SIMULATION_POLL_PROFILE,
  SUBMISSION_POLL_PROFILE,
  type CompletionRule,
  type JobStatusSource,
  type PollProfile,
} from './job-poller';

export { ReferenceDataCache, type ReferenceDataSource } from './reference-cache';
