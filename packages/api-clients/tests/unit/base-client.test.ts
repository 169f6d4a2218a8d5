/**
 * Tests for base-client.ts
 *
 * Tests cover:
 * - Header helpers
 * - Retry-After parsing
 * - Default unauthorized handling of the bare base client
 */

import { describe, it, expect, vi } from 'vitest';
import { BaseApiClient, headerValue, parseRetryAfterMs } from '../../src/base-client';
import { StubService } from '../helpers/stub-service';

describe('headerValue', () => {
  it('looks up lower-cased names and takes the first of repeated headers', () => {
    const headers = { location: '/simulations/1', 'set-cookie': ['a=1', 'b=2'] };
    expect(headerValue(headers, 'Location')).toBe('/simulations/1');
    expect(headerValue(headers, 'Set-Cookie')).toBe('a=1');
    expect(headerValue(headers, 'retry-after')).toBeUndefined();
  });
});

describe('parseRetryAfterMs', () => {
  it.each([
    ['2.5', 2500],
    ['0', 0],
    ['10', 10000],
  ])('parses %s seconds', (value, expected) => {
    expect(parseRetryAfterMs({ 'retry-after': value }, 999)).toBe(expected);
  });

  it('falls back when missing or unparsable', () => {
    expect(parseRetryAfterMs({}, 5000)).toBe(5000);
    expect(parseRetryAfterMs({ 'retry-after': 'later' }, 5000)).toBe(5000);
    expect(parseRetryAfterMs({ 'retry-after': '-1' }, 5000)).toBe(5000);
  });
});

describe('BaseApiClient', () => {
  it('returns non-401, non-429 statuses as they are', async () => {
    const service = new StubService().on('get', '/missing', () => ({ status: 404, body: { detail: 'gone' } }));
    const client = new BaseApiClient({
      baseURL: 'https://brain.test',
      axiosInstance: service.createAxios(),
      sleep: vi.fn(async (_ms: number) => {}),
    });

    const result = await client.request('get', '/missing');

    expect(result).toEqual({
      ok: true,
      value: { status: 404, headers: {}, body: { detail: 'gone' } },
    });
  });

  it('treats 401 as an auth failure when nothing can recover the session', async () => {
    const service = new StubService().on('get', '/private', () => ({ status: 401 }));
    const client = new BaseApiClient({
      baseURL: 'https://brain.test',
      axiosInstance: service.createAxios(),
      apiName: 'Stub',
    });

    const result = await client.request('get', '/private');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'auth', message: 'Stub rejected the request as unauthorized', status: 401 },
    });
  });
});
