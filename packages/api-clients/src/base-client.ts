/**
 * Base API Client
 * ===============
 * Unified API client base with retry logic, server-directed backoff,
 * optional client-side pacing and a hook for session recovery.
 */

import axios, { type AxiosInstance } from 'axios';
import { ok, err, failure, type Failure, type Result } from '@alphaminer/core';
import { LogHelpers, logger, sleep as defaultSleep, type SleepFn } from '@alphaminer/utils';

export type HttpMethod = 'get' | 'post' | 'patch' | 'put' | 'delete';

export type ResponseHeaders = Record<string, string | string[]>;

/**
 * A completed HTTP exchange. Any status code ends up here; only transport
 * failures are treated as errors.
 */
export interface ApiResponse {
  status: number;
  /** Header names are lower-cased */
  headers: ResponseHeaders;
  /** Parsed JSON when the body was JSON, raw text otherwise, '' when empty */
  body: unknown;
}

export interface RequestOptions {
  body?: unknown;
  params?: Record<string, string | number | boolean>;
  /** Wait out 429 responses instead of returning them. Defaults to true. */
  honorRetryAfter?: boolean;
}

export interface RateLimiterConfig {
  maxRequests: number;
  windowMs: number;
}

export interface RetryConfig {
  /** Total attempts for a request that fails at the transport level */
  maxRetries: number;
  /** Base delay for exponential backoff, also the 429 fallback wait */
  initialDelayMs: number;
}

export interface BaseApiClientConfig {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  rateLimiter?: RateLimiterConfig;
  retry?: RetryConfig;
  apiName?: string;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
  /** Optional sleep for testing */
  sleep?: SleepFn;
}

/**
 * Headers and session state captured before an attempt is sent
 */
export interface PreparedRequest {
  headers: Record<string, string>;
  sessionGeneration: number;
}

/**
 * Sliding-window limiter for client-side pacing
 */
class RateLimiter {
  private requests: number[] = [];
  private readonly maxRequests: number;
  private readonly windowMs: number;

  constructor(config: RateLimiterConfig) {
    this.maxRequests = config.maxRequests;
    this.windowMs = config.windowMs;
  }

  canMakeRequest(): boolean {
    const now = Date.now();
    this.requests = this.requests.filter((timestamp) => now - timestamp < this.windowMs);
    return this.requests.length < this.maxRequests;
  }

  recordRequest(): void {
    const now = Date.now();
    this.requests = this.requests.filter((timestamp) => now - timestamp < this.windowMs);
    this.requests.push(now);
  }

  getTimeUntilNextRequest(): number {
    if (this.requests.length === 0) return 0;
    const elapsed = Date.now() - this.requests[0];
    return Math.max(0, this.windowMs - elapsed);
  }
}

/**
 * Case-insensitive lookup of a single header value
 */
export function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Parse `Retry-After` as (possibly fractional) seconds into milliseconds
 */
export function parseRetryAfterMs(headers: ResponseHeaders, fallbackMs: number): number {
  const raw = headerValue(headers, 'retry-after');
  if (raw === undefined) {
    return fallbackMs;
  }
  const seconds = Number.parseFloat(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return fallbackMs;
  }
  return Math.round(seconds * 1000);
}

function normalizeHeaders(headers: object): ResponseHeaders {
  const normalized: ResponseHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[key.toLowerCase()] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      normalized[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      normalized[key.toLowerCase()] = value.map(String);
    }
  }
  return normalized;
}

function describeTransportError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return `timeout: ${error.message}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base API client with retry logic and rate limiting
 */
export class BaseApiClient {
  protected axiosInstance: AxiosInstance;
  protected rateLimiter?: RateLimiter;
  protected retryConfig: RetryConfig;
  protected apiName: string;
  protected sleep: SleepFn;

  constructor(config: BaseApiClientConfig) {
    this.apiName = config.apiName || 'API';
    this.sleep = config.sleep ?? defaultSleep;

    this.axiosInstance =
      config.axiosInstance ??
      axios.create({
        baseURL: config.baseURL,
        timeout: config.timeout || 30000,
        headers: {
          'Content-Type': 'application/json',
          ...config.headers,
        },
      });

    if (config.rateLimiter) {
      this.rateLimiter = new RateLimiter(config.rateLimiter);
    }

    this.retryConfig = config.retry || {
      maxRetries: 3,
      initialDelayMs: 5000,
    };

    // Client-side pacing
    this.axiosInstance.interceptors.request.use(async (requestConfig) => {
      const limiter = this.rateLimiter;
      if (limiter) {
        while (!limiter.canMakeRequest()) {
          const waitTime = limiter.getTimeUntilNextRequest();
          logger.debug('Rate limit reached, waiting', {
            apiName: this.apiName,
            waitTimeMs: waitTime,
          });
          await this.sleep(waitTime);
        }
        limiter.recordRequest();
      }
      return requestConfig;
    });
  }

  /**
   * Send one HTTP exchange. Throws only on transport failure.
   */
  protected async exchange(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {},
    headers: Record<string, string> = {},
    auth?: { username: string; password: string }
  ): Promise<ApiResponse> {
    const response = await this.axiosInstance.request({
      method,
      url,
      data: options.body,
      params: options.params,
      headers,
      auth,
      validateStatus: () => true,
    });

    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      body: response.data ?? '',
    };
  }

  /**
   * Headers for the next attempt. Subclasses attach session state here; a
   * failure aborts the request without network I/O.
   */
  protected async prepareRequest(): Promise<Result<PreparedRequest>> {
    return ok({ headers: {}, sessionGeneration: 0 });
  }

  /**
   * Called once per request on HTTP 401. Return ok to resend.
   */
  protected async recoverUnauthorized(_prepared: PreparedRequest): Promise<Result<void>> {
    return err(failure('auth', `${this.apiName} rejected the request as unauthorized`, { status: 401 }));
  }

  /**
   * Make a request with retry logic.
   *
   * Transport failures are retried with `initialDelayMs * 2^attempt` backoff
   * for `maxRetries` attempts in total. A 401 is recovered once and a 429 is
   * waited out (when `honorRetryAfter`); neither consumes an attempt. Every
   * other status is returned as-is.
   */
  async request(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {}
  ): Promise<Result<ApiResponse>> {
    const honorRetryAfter = options.honorRetryAfter ?? true;
    const { maxRetries, initialDelayMs } = this.retryConfig;
    let attempt = 0;
    let recovered = false;
    let lastFailure: Failure = failure('transient', `${method.toUpperCase()} ${url} was not attempted`);

    while (attempt < maxRetries) {
      const prepared = await this.prepareRequest();
      if (!prepared.ok) {
        return prepared;
      }

      let response: ApiResponse;
      const startedAt = Date.now();
      LogHelpers.apiRequest(logger, method, url, { apiName: this.apiName, attempt });
      try {
        response = await this.exchange(method, url, options, prepared.value.headers);
        LogHelpers.apiResponse(logger, method, url, response.status, Date.now() - startedAt, {
          apiName: this.apiName,
        });
      } catch (error) {
        lastFailure = failure('transient', describeTransportError(error));
        attempt += 1;
        if (attempt < maxRetries) {
          const delayMs = initialDelayMs * Math.pow(2, attempt - 1);
          logger.warn('Request failed, retrying', {
            apiName: this.apiName,
            method,
            url,
            attempt,
            maxRetries,
            delayMs,
            error: lastFailure.message,
          });
          await this.sleep(delayMs);
        }
        continue;
      }

      if (response.status === 401) {
        if (recovered) {
          return err(
            failure('auth', `${this.apiName} rejected the request after re-authentication`, {
              status: response.status,
              body: response.body,
            })
          );
        }
        recovered = true;
        const recovery = await this.recoverUnauthorized(prepared.value);
        if (!recovery.ok) {
          return recovery;
        }
        continue;
      }

      if (response.status === 429 && honorRetryAfter) {
        const waitMs = parseRetryAfterMs(response.headers, initialDelayMs);
        logger.info('Rate limited by server, waiting', { apiName: this.apiName, url, waitMs });
        await this.sleep(waitMs);
        continue;
      }

      return ok(response);
    }

    return err(
      failure(
        'transient',
        `${method.toUpperCase()} ${url} failed after ${maxRetries} attempts: ${lastFailure.message}`,
        { status: lastFailure.status, body: lastFailure.body }
      )
    );
  }
}
