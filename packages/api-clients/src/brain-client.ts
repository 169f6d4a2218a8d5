/**
 * Brain Client
 * ============
 * Session-holding client for the alpha simulation service.
 *
 * Login is single flight: concurrent callers share one in-flight attempt.
 * Every successful login bumps the session generation, so a request that was
 * sent under an older session and comes back 401 simply resends on the newer
 * one. Once login attempts are exhausted the client stays unusable.
 */

import {
  ok,
  err,
  failure,
  toWireSettings,
  parseAlphaRecord,
  type AlphaProperties,
  type AlphaRecord,
  type Result,
  type SimulationSettings,
} from '@alphaminer/core';
import {
  AuthenticationError,
  TransientNetworkError,
  failureFromError,
  retryWithBackoff,
  createPackageLogger,
} from '@alphaminer/utils';
import {
  BaseApiClient,
  headerValue,
  type ApiResponse,
  type BaseApiClientConfig,
  type PreparedRequest,
  type ResponseHeaders,
} from './base-client';

const logger = createPackageLogger('@alphaminer/api-clients');

export const DEFAULT_BRAIN_BASE_URL = 'https://api.worldquantbrain.com';

export interface BrainCredentials {
  username: string;
  password: string;
}

export interface BrainClientConfig extends Omit<BaseApiClientConfig, 'baseURL'> {
  credentials: BrainCredentials;
  baseURL?: string;
}

export interface ListAlphasOptions {
  limit?: number;
  offset?: number;
  status?: string;
  order?: string;
}

export interface AlphaPage {
  count: number;
  results: AlphaRecord[];
}

export interface DataFieldQuery {
  instrumentType?: string;
  region?: string;
  delay?: number;
  universe?: string;
  datasetId?: string;
  search?: string;
  limit?: number;
}

export type ReferenceRecord = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function recordsOf(value: unknown): ReferenceRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Short, log-safe rendering of a response body
 */
export function describeBody(body: unknown): string {
  const text = typeof body === 'string' ? body : (JSON.stringify(body) ?? String(body));
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

function sessionCookieFrom(headers: ResponseHeaders): string | undefined {
  const raw = headers['set-cookie'];
  const cookies = Array.isArray(raw) ? raw : raw ? [raw] : [];
  const pairs = cookies.map((cookie) => cookie.split(';')[0].trim()).filter((pair) => pair);
  return pairs.length > 0 ? pairs.join('; ') : undefined;
}

function unexpected(what: string, response: ApiResponse): Result<never> {
  return err(
    failure('transient', `${what} returned HTTP ${response.status}: ${describeBody(response.body)}`, {
      status: response.status,
      body: response.body,
    })
  );
}

export class BrainClient extends BaseApiClient {
  private readonly credentials: BrainCredentials;
  private sessionCookie?: string;
  private sessionGeneration = 0;
  private loginPromise: Promise<void> | null = null;
  private authExhausted = false;

  constructor(config: BrainClientConfig) {
    super({
      ...config,
      baseURL: config.baseURL ?? DEFAULT_BRAIN_BASE_URL,
      apiName: config.apiName ?? 'Brain',
    });
    this.credentials = config.credentials;
  }

  /**
   * Whether login attempts were exhausted; the client makes no further calls
   */
  isUnusable(): boolean {
    return this.authExhausted;
  }

  getSessionGeneration(): number {
    return this.sessionGeneration;
  }

  /**
   * Log in with basic credentials. Concurrent callers share one attempt.
   */
  async authenticate(): Promise<void> {
    if (this.authExhausted) {
      throw new AuthenticationError('Login attempts exhausted for this client');
    }
    if (!this.loginPromise) {
      this.loginPromise = this.login().finally(() => {
        this.loginPromise = null;
      });
    }
    return this.loginPromise;
  }

  private async login(): Promise<void> {
    const { maxRetries, initialDelayMs } = this.retryConfig;

    try {
      await retryWithBackoff(
        async () => {
          let response: ApiResponse;
          try {
            response = await this.exchange('post', '/authentication', {}, {}, this.credentials);
          } catch (error) {
            throw new TransientNetworkError(
              `Authentication request failed: ${error instanceof Error ? error.message : String(error)}`
            );
          }
          if (response.status !== 201) {
            throw new TransientNetworkError(
              `Authentication returned HTTP ${response.status}`,
              response.status,
              response.body
            );
          }
          this.sessionCookie = sessionCookieFrom(response.headers);
          this.sessionGeneration += 1;
        },
        maxRetries - 1,
        initialDelayMs,
        { apiName: this.apiName, operation: 'authenticate' },
        this.sleep
      );
    } catch (error) {
      this.authExhausted = true;
      throw new AuthenticationError(
        `Authentication failed after ${maxRetries} attempts: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    logger.info('Authenticated', { apiName: this.apiName, generation: this.sessionGeneration });
  }

  protected async prepareRequest(): Promise<Result<PreparedRequest>> {
    if (this.authExhausted) {
      return err(failure('auth', 'Login attempts exhausted for this client'));
    }
    if (this.sessionGeneration === 0) {
      try {
        await this.authenticate();
      } catch (error) {
        return err(failureFromError(error));
      }
    }
    return ok<PreparedRequest>({
      headers: this.sessionCookie ? { Cookie: this.sessionCookie } : {},
      sessionGeneration: this.sessionGeneration,
    });
  }

  protected async recoverUnauthorized(prepared: PreparedRequest): Promise<Result<void>> {
    if (prepared.sessionGeneration !== this.sessionGeneration) {
      // Someone already logged in again since this request was sent
      return ok(undefined);
    }
    logger.info('Session expired, re-authenticating', { apiName: this.apiName });
    try {
      await this.authenticate();
      return ok(undefined);
    } catch (error) {
      return err(failureFromError(error));
    }
  }

  /**
   * Submit an expression for simulation. Returns the job handle to poll.
   */
  async submitSimulation(
    expression: string,
    settings: SimulationSettings
  ): Promise<Result<string>> {
    const result = await this.request('post', '/simulations', {
      body: { type: 'REGULAR', settings: toWireSettings(settings), regular: expression },
    });
    if (!result.ok) {
      return result;
    }

    const location = headerValue(result.value.headers, 'location');
    if (result.value.status !== 201 || !location) {
      return unexpected('Simulation submission', result.value);
    }

    logger.debug('Simulation submitted', { jobHandle: location, expression });
    return ok(location);
  }

  /**
   * One status query against a job handle. 429 responses are returned to the
   * caller so the poller can decide how long to wait.
   */
  async pollJobOnce(handle: string): Promise<Result<ApiResponse>> {
    return this.request('get', handle, { honorRetryAfter: false });
  }

  async getAlpha(alphaId: string): Promise<Result<AlphaRecord>> {
    const result = await this.request('get', `/alphas/${alphaId}`);
    if (!result.ok) {
      return result;
    }
    if (result.value.status !== 200 || !isRecord(result.value.body)) {
      return unexpected(`Alpha details for ${alphaId}`, result.value);
    }
    return ok(parseAlphaRecord(result.value.body));
  }

  /**
   * One page of the user's alphas
   */
  async listAlphas(options: ListAlphasOptions = {}): Promise<Result<AlphaPage>> {
    const params: Record<string, string | number | boolean> = {
      limit: options.limit ?? 50,
      offset: options.offset ?? 0,
      order: options.order ?? '-dateCreated',
      hidden: 'false',
    };
    if (options.status) {
      params.status = options.status;
    }

    const result = await this.request('get', '/users/self/alphas', { params });
    if (!result.ok) {
      return result;
    }
    const body = result.value.body;
    if (result.value.status !== 200 || !isRecord(body)) {
      return unexpected('Alpha listing', result.value);
    }

    const results = recordsOf(body.results).map(parseAlphaRecord);
    const count = typeof body.count === 'number' ? body.count : results.length;
    return ok({ count, results });
  }

  /**
   * Update alpha properties. Only provided fields are sent; an empty patch
   * makes no request.
   */
  async patchAlphaProperties(
    alphaId: string,
    properties: AlphaProperties
  ): Promise<Result<boolean>> {
    const patch: Record<string, unknown> = {};
    if (properties.name !== undefined) patch.name = properties.name;
    if (properties.color !== undefined) patch.color = properties.color;
    if (properties.tags !== undefined) patch.tags = properties.tags;
    if (properties.description !== undefined) {
      patch.regular = { description: properties.description };
    }

    if (Object.keys(patch).length === 0) {
      logger.warn('No properties to update, skipping', { alphaId });
      return ok(false);
    }

    const result = await this.request('patch', `/alphas/${alphaId}`, { body: patch });
    if (!result.ok) {
      return result;
    }
    if (result.value.status !== 200) {
      return unexpected(`Property update for ${alphaId}`, result.value);
    }
    return ok(true);
  }

  /**
   * Start the submission of an alpha. Returns the handle to poll for the
   * acceptance outcome.
   */
  async startAlphaSubmission(alphaId: string): Promise<Result<string>> {
    const submitPath = `/alphas/${alphaId}/submit`;
    const result = await this.request('post', submitPath);
    if (!result.ok) {
      return result;
    }
    if (result.value.status !== 201) {
      return unexpected(`Submission of ${alphaId}`, result.value);
    }
    return ok(headerValue(result.value.headers, 'location') ?? submitPath);
  }

  /**
   * All data fields matching the query, following count/offset pagination.
   * Pagination stops early at an empty or failed page.
   */
  async getDataFields(query: DataFieldQuery = {}): Promise<Result<ReferenceRecord[]>> {
    const params: Record<string, string | number | boolean> = {
      instrumentType: query.instrumentType ?? 'EQUITY',
      region: query.region ?? 'USA',
      delay: query.delay ?? 1,
      universe: query.universe ?? 'TOP3000',
      limit: query.limit ?? 50,
    };
    if (query.datasetId) params['dataset.id'] = query.datasetId;
    if (query.search) params.search = query.search;

    const first = await this.request('get', '/data-fields', { params });
    if (!first.ok) {
      return first;
    }
    if (first.value.status !== 200 || !isRecord(first.value.body)) {
      return unexpected('Data field listing', first.value);
    }

    const total = typeof first.value.body.count === 'number' ? first.value.body.count : 0;
    const fields = recordsOf(first.value.body.results);

    while (fields.length < total) {
      const offset = fields.length;
      const page = await this.request('get', '/data-fields', { params: { ...params, offset } });
      if (!page.ok || page.value.status !== 200 || !isRecord(page.value.body)) {
        logger.warn('Data field page failed, stopping pagination', { offset });
        break;
      }
      const pageResults = recordsOf(page.value.body.results);
      if (pageResults.length === 0) {
        logger.warn('Empty data field page, stopping pagination', { offset });
        break;
      }
      fields.push(...pageResults);
    }

    logger.info('Fetched data fields', { count: fields.length, region: params.region });
    return ok(fields);
  }

  /**
   * Operator catalogue. The service answers with a plain list or `{results}`.
   */
  async getOperators(): Promise<Result<ReferenceRecord[]>> {
    const result = await this.request('get', '/operators');
    if (!result.ok) {
      return result;
    }
    if (result.value.status !== 200) {
      return unexpected('Operator listing', result.value);
    }
    const body = result.value.body;
    return ok(isRecord(body) ? recordsOf(body.results) : recordsOf(body));
  }
}
