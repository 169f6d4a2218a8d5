/**
 * Tests for brain-client.ts
 *
 * Tests cover:
 * - Login, session cookie and single-flight authentication
 * - Re-authentication on 401 and sticky failure after exhaustion
 * - Retry-After handling and transport retry budget
 * - Job submission, polling passthrough and alpha endpoints
 * - Reference data pagination
 * - Client-side pacing
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createSimulationSettings, toWireSettings } from '@alphaminer/core';
import { BrainClient } from '../../src/brain-client';
import { StubService, type RecordedRequest, type StubReply } from '../helpers/stub-service';

const credentials = { username: 'researcher@example.test', password: 'test-secret' };

function setup(options: { maxRetries?: number; rateLimiter?: { maxRequests: number; windowMs: number } } = {}) {
  const service = new StubService();
  const sleep = vi.fn(async (_ms: number) => {});
  const client = new BrainClient({
    credentials,
    axiosInstance: service.createAxios(),
    retry: { maxRetries: options.maxRetries ?? 3, initialDelayMs: 1000 },
    rateLimiter: options.rateLimiter,
    sleep,
  });
  return { service, sleep, client };
}

/** Reject the first session, accept any later one */
function firstSessionExpired(id: string) {
  return (request: RecordedRequest): StubReply =>
    request.cookie === 'session=s1'
      ? { status: 401, body: { detail: 'Session expired' } }
      : { status: 200, body: { id, regular: { code: 'rank(close)' } } };
}

describe('BrainClient', () => {
  describe('authentication', () => {
    it('logs in with basic credentials and sends the session cookie', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('get', '/operators', () => ({ status: 200, body: [{ name: 'rank' }] }));

      await client.authenticate();
      const result = await client.getOperators();

      expect(service.requests[0]).toMatchObject({
        method: 'post',
        url: '/authentication',
        auth: credentials,
      });
      expect(client.getSessionGeneration()).toBe(1);
      expect(result).toEqual({ ok: true, value: [{ name: 'rank' }] });
      expect(service.requestsTo('get', '/operators')[0].cookie).toBe('session=s1');
    });

    it('logs in lazily, once, for concurrent first requests', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('get', '/operators', () => ({ status: 200, body: [] }));

      const results = await Promise.all([
        client.getOperators(),
        client.getOperators(),
        client.getOperators(),
      ]);

      expect(results.every((r) => r.ok)).toBe(true);
      expect(service.loginCount).toBe(1);
    });

    it('re-authenticates once when two concurrent requests both get 401', async () => {
      const { service, client } = setup();
      service
        .acceptLogins()
        .on('get', '/alphas/A1', firstSessionExpired('A1'))
        .on('get', '/alphas/A2', firstSessionExpired('A2'));

      await client.authenticate();
      const [first, second] = await Promise.all([client.getAlpha('A1'), client.getAlpha('A2')]);

      expect(service.loginCount).toBe(2);
      expect(first.ok && first.value.id).toBe('A1');
      expect(second.ok && second.value.expression).toBe('rank(close)');
      expect(client.getSessionGeneration()).toBe(2);
    });

    it('fails with kind auth when the new session is rejected too', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('get', '/alphas/A1', () => ({ status: 401, body: { detail: 'no' } }));

      const result = await client.getAlpha('A1');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('auth');
        expect(result.error.status).toBe(401);
      }
      expect(service.loginCount).toBe(2);
    });

    it('becomes unusable after login attempts are exhausted', async () => {
      const { service, sleep, client } = setup();
      service
        .on('post', '/authentication', () => ({ status: 500, body: { detail: 'down' } }))
        .on('get', '/operators', () => ({ status: 200, body: [] }));

      const first = await client.getOperators();

      expect(first).toEqual({
        ok: false,
        error: {
          kind: 'auth',
          message: 'Authentication failed after 3 attempts: Authentication returned HTTP 500',
        },
      });
      expect(service.loginCount).toBe(3);
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
      expect(client.isUnusable()).toBe(true);

      const requestsBefore = service.requests.length;
      const second = await client.getOperators();
      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error.kind).toBe('auth');
      }
      expect(service.requests).toHaveLength(requestsBefore);
      await expect(client.authenticate()).rejects.toThrow('Login attempts exhausted');
    });
  });

  describe('retries', () => {
    it('waits Retry-After seconds on 429 without spending the retry budget', async () => {
      const { service, sleep, client } = setup();
      service
        .acceptLogins()
        .sequence('get', '/operators', [
          { status: 429, headers: { 'Retry-After': '2.5' } },
          'reset',
          'reset',
          { status: 200, body: [{ name: 'ts_mean' }] },
        ]);

      const result = await client.getOperators();

      expect(result).toEqual({ ok: true, value: [{ name: 'ts_mean' }] });
      expect(sleep.mock.calls).toEqual([[2500], [1000], [2000]]);
      expect(service.requestsTo('get', '/operators')).toHaveLength(4);
    });

    it('falls back to the retry delay when Retry-After is missing', async () => {
      const { service, sleep, client } = setup();
      service
        .acceptLogins()
        .sequence('get', '/operators', [{ status: 429 }, { status: 200, body: [] }]);

      await client.getOperators();

      expect(sleep.mock.calls).toEqual([[1000]]);
    });

    it('returns a transient failure after maxRetries transport errors', async () => {
      const { service, sleep, client } = setup();
      service.acceptLogins().sequence('get', '/operators', ['reset']);

      const result = await client.getOperators();

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'transient',
          message: 'GET /operators failed after 3 attempts: ECONNRESET: socket hang up',
        },
      });
      expect(service.requestsTo('get', '/operators')).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });
  });

  describe('jobs', () => {
    it('submits a simulation and returns the Location handle', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('post', '/simulations', () => ({
        status: 201,
        headers: { Location: 'https://brain.test/simulations/abc' },
      }));
      const settings = createSimulationSettings({ region: 'EUR' });

      const result = await client.submitSimulation('rank(close)', settings);

      expect(result).toEqual({ ok: true, value: 'https://brain.test/simulations/abc' });
      expect(service.requestsTo('post', '/simulations')[0].body).toEqual({
        type: 'REGULAR',
        settings: toWireSettings(settings),
        regular: 'rank(close)',
      });
      expect(settings.region).toBe('EUR');
    });

    it('reports a rejected submission with its status and body', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('post', '/simulations', () => ({
        status: 400,
        body: { message: 'Unknown operator' },
      }));

      const result = await client.submitSimulation('foo(close)', createSimulationSettings());

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'transient',
          message: 'Simulation submission returned HTTP 400: {"message":"Unknown operator"}',
          status: 400,
          body: { message: 'Unknown operator' },
        },
      });
    });

    it('polls absolute handles as given and passes 429 through', async () => {
      const { service, sleep, client } = setup();
      const handle = 'https://brain.test/simulations/abc';
      service.acceptLogins().on('get', handle, () => ({ status: 429, headers: { 'Retry-After': '3' } }));

      const result = await client.pollJobOnce(handle);

      expect(result.ok && result.value.status).toBe(429);
      expect(result.ok && result.value.headers['retry-after']).toBe('3');
      expect(sleep).not.toHaveBeenCalled();
      expect(service.requestsTo('get', handle)).toHaveLength(1);
    });

    it('starts a submission and falls back to the submit path as handle', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('post', '/alphas/A1/submit', () => ({ status: 201 }));

      expect(await client.startAlphaSubmission('A1')).toEqual({ ok: true, value: '/alphas/A1/submit' });
    });
  });

  describe('alphas', () => {
    it('patches only provided properties, nesting the description', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('patch', '/alphas/A1', () => ({ status: 200, body: {} }));

      const result = await client.patchAlphaProperties('A1', { name: 'momentum', description: 'ranked close' });

      expect(result).toEqual({ ok: true, value: true });
      expect(service.requestsTo('patch', '/alphas/A1')[0].body).toEqual({
        name: 'momentum',
        regular: { description: 'ranked close' },
      });
    });

    it('skips an empty patch without a request', async () => {
      const { service, client } = setup();
      service.acceptLogins();

      expect(await client.patchAlphaProperties('A1', {})).toEqual({ ok: true, value: false });
      expect(service.requests).toHaveLength(0);
    });

    it('lists one page of alphas with filters', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('get', '/users/self/alphas', () => ({
        status: 200,
        body: { count: 7, results: [{ id: 'A1', regular: { code: 'rank(close)' } }, { id: 'A2' }] },
      }));

      const result = await client.listAlphas({ status: 'UNSUBMITTED', limit: 2 });

      expect(service.requestsTo('get', '/users/self/alphas')[0].params).toEqual({
        limit: 2,
        offset: 0,
        order: '-dateCreated',
        hidden: 'false',
        status: 'UNSUBMITTED',
      });
      expect(result.ok && result.value.count).toBe(7);
      expect(result.ok && result.value.results.map((a) => a.id)).toEqual(['A1', 'A2']);
    });
  });

  describe('reference data', () => {
    it('follows count/offset pagination for data fields', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('get', '/data-fields', (request) =>
        request.params.offset === 2
          ? { status: 200, body: { count: 3, results: [{ id: 'volume' }] } }
          : { status: 200, body: { count: 3, results: [{ id: 'close' }, { id: 'open' }] } }
      );

      const result = await client.getDataFields({ region: 'USA', datasetId: 'pv1' });

      expect(result.ok && result.value.map((f) => f.id)).toEqual(['close', 'open', 'volume']);
      expect(service.requestsTo('get', '/data-fields')[0].params).toEqual({
        instrumentType: 'EQUITY',
        region: 'USA',
        delay: 1,
        universe: 'TOP3000',
        limit: 50,
        'dataset.id': 'pv1',
      });
    });

    it('stops paginating at an empty page', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('get', '/data-fields', (request) =>
        request.params.offset === undefined
          ? { status: 200, body: { count: 5, results: [{ id: 'close' }, { id: 'open' }] } }
          : { status: 200, body: { count: 5, results: [] } }
      );

      const result = await client.getDataFields();

      expect(result.ok && result.value).toHaveLength(2);
      expect(service.requestsTo('get', '/data-fields')).toHaveLength(2);
    });

    it('accepts operators wrapped in results', async () => {
      const { service, client } = setup();
      service.acceptLogins().on('get', '/operators', () => ({
        status: 200,
        body: { results: [{ name: 'rank' }, 'junk'] },
      }));

      expect(await client.getOperators()).toEqual({ ok: true, value: [{ name: 'rank' }] });
    });
  });

  describe('client-side pacing', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('waits for the window when the request budget is used up', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      const { service, sleep, client } = setup({ rateLimiter: { maxRequests: 1, windowMs: 1000 } });
      sleep.mockImplementation(async (ms: number) => {
        vi.setSystemTime(Date.now() + ms);
      });
      service.acceptLogins().on('get', '/operators', () => ({ status: 200, body: [] }));

      await client.getOperators();

      expect(sleep.mock.calls).toEqual([[1000]]);
      expect(service.requests).toHaveLength(2);
    });
  });
});
