/**
 * Tests for the mining, polishing and generation workflows
 */

import { describe, it, expect, vi } from 'vitest';
import { createSimulationSettings, failure, ok, type TextGenerationRequest } from '@alphaminer/core';
import { ReferenceDataCache, type DataFieldQuery } from '@alphaminer/api-clients';
import { BatchOrchestrator } from '../../src/simulation/BatchOrchestrator';
import { mineVariations } from '../../src/mining/mineVariations';
import { polishExpression } from '../../src/mining/polishExpression';
import { generateExpressions } from '../../src/mining/generateExpressions';
import { FakeGateway, createTestContext, metricSet, noSleep, type JobScript } from '../helpers/fake-gateway';

const settings = createSimulationSettings();

function setup(byExpression: Record<string, JobScript>) {
  const gateway = new FakeGateway((expression) => byExpression[expression] ?? {});
  const ctx = createTestContext();
  const orchestrator = new BatchOrchestrator({
    gateway,
    sleep: noSleep,
    reports: ctx.reports,
    ids: ctx.ids,
    maxConcurrency: 2,
  });
  return { gateway, ctx, orchestrator };
}

describe('mineVariations', () => {
  it('simulates the variations and keeps the passing ones, best first', async () => {
    const { ctx, orchestrator } = setup({
      'ts_mean(close, 10)': { metrics: metricSet({ sharpe: 1.3 }) },
      'ts_mean(close, 5)': { metrics: metricSet({ sharpe: 1.0 }) },
      'ts_mean(close, 15)': { metrics: metricSet({ sharpe: 1.9 }) },
    });

    const result = await mineVariations(orchestrator, { expression: 'ts_mean(close, 10)', settings }, {}, ctx);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.variations).toEqual(['ts_mean(close, 10)', 'ts_mean(close, 5)', 'ts_mean(close, 15)']);
    expect(result.value.batch?.entries).toHaveLength(3);
    expect(result.value.best.map((b) => b.expression)).toEqual(['ts_mean(close, 15)', 'ts_mean(close, 10)']);
    expect(ctx.reports.prefixes()).toEqual(['variations', 'variation_results', 'best_variations']);
    expect(ctx.reports.written[0].data).toEqual({
      baseExpression: 'ts_mean(close, 10)',
      variations: ['ts_mean(close, 10)', 'ts_mean(close, 5)', 'ts_mean(close, 15)'],
    });
    expect(result.value.bestPath).toBe('memory/best_variations.json');
  });

  it('only saves the variations when simulation is skipped', async () => {
    const { gateway, ctx, orchestrator } = setup({});

    const result = await mineVariations(
      orchestrator,
      { expression: 'ts_mean(close, 10)', settings },
      { skipSimulation: true },
      ctx
    );

    expect(result.ok && result.value.batch).toBeNull();
    expect(gateway.submitted).toEqual([]);
    expect(ctx.reports.prefixes()).toEqual(['variations']);
  });

  it('writes no best report when nothing passes', async () => {
    const { ctx, orchestrator } = setup({});

    const result = await mineVariations(
      orchestrator,
      { expression: 'ts_mean(close, 10)', settings },
      { criteria: { minSharpe: 5 } },
      ctx
    );

    expect(result.ok && result.value.best).toEqual([]);
    expect(result.ok && result.value.bestPath).toBeNull();
  });

  it('rejects an invalid base expression', async () => {
    const { ctx, orchestrator } = setup({});

    const result = await mineVariations(orchestrator, { expression: 'ts_mean(close, 10', settings }, {}, ctx);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'validation', message: 'Invalid base expression: Unbalanced parentheses' },
    });
  });
});

describe('polishExpression', () => {
  const request = { expression: 'ts_mean(close, 10)', settings };

  it('compares the rewrite against the original', async () => {
    const { ctx, orchestrator } = setup({
      'ts_mean(close, 10)': { metrics: metricSet({ sharpe: 1.0, turnover: 0.9 }) },
      'ts_mean(close, 20)': { metrics: metricSet({ sharpe: 1.3, turnover: 0.5 }) },
    });
    const generator = vi.fn(async (_request: TextGenerationRequest) => ['  ts_mean(close, 20)  ']);

    const result = await polishExpression(orchestrator, request, generator, { requirements: 'lower turnover' }, ctx);

    expect(generator).toHaveBeenCalledWith({
      task: 'polish',
      context: { expression: 'ts_mean(close, 10)', requirements: 'lower turnover' },
      count: 1,
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.polished.expression).toBe('ts_mean(close, 20)');
    expect(result.value.improvements.overallImproved).toBe(true);
    expect(result.value.improvements.changes.turnover?.improved).toBe(true);
    expect(result.value.reportPath).toBe('memory/polish_results.json');
  });

  it('rejects an invalid rewrite without simulating it', async () => {
    const { gateway, ctx, orchestrator } = setup({});

    const result = await polishExpression(orchestrator, request, async () => ['rank(close'], {}, ctx);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'validation', message: 'Invalid polished expression: Unbalanced parentheses' },
    });
    expect(gateway.submitted).toHaveLength(1);
  });

  it('reports a generator that returns nothing', async () => {
    const { ctx, orchestrator } = setup({});

    const result = await polishExpression(orchestrator, request, async () => ['   '], {}, ctx);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'validation', message: 'Text generator returned no expression' },
    });
  });

  it('turns a generator error into a failure', async () => {
    const { ctx, orchestrator } = setup({});
    const generator = async (): Promise<string[]> => {
      throw new Error('generator offline');
    };

    const result = await polishExpression(orchestrator, request, generator, {}, ctx);

    expect(result).toEqual({ ok: false, error: { kind: 'transient', message: 'generator offline' } });
  });

  it('stops when the original cannot be simulated', async () => {
    const { ctx, orchestrator } = setup({
      'ts_mean(close, 10)': { submitFailure: failure('auth', 'Login attempts exhausted for this client') },
    });
    const generator = vi.fn(async () => ['ts_mean(close, 20)']);

    const result = await polishExpression(orchestrator, request, generator, {}, ctx);

    expect(result.ok).toBe(false);
    expect(generator).not.toHaveBeenCalled();
  });
});

describe('generateExpressions', () => {
  it('keeps valid, unique candidates in order', async () => {
    const generator = vi.fn(async (_request: TextGenerationRequest) => [
      'rank(close)',
      ' rank(close) ',
      'close',
      'ts_mean(volume, 5)',
    ]);

    const result = await generateExpressions(generator, { strategyType: 'momentum' }, createTestContext());

    expect(result).toEqual({ ok: true, value: ['rank(close)', 'ts_mean(volume, 5)'] });
    expect(generator.mock.calls[0][0]).toMatchObject({ task: 'generate', count: 5, context: { strategyType: 'momentum' } });
  });

  it('fills operators and data fields from the reference cache', async () => {
    const getDataFields = vi.fn(async (query?: DataFieldQuery) =>
      ok([{ id: `close_${query?.region ?? 'USA'}` }, { id: 'volume' }, { description: 'no id' }])
    );
    const cache = new ReferenceDataCache({
      getOperators: async () => ok([{ name: 'rank' }, { name: 'ts_mean' }]),
      getDataFields,
    });
    const generator = vi.fn(async (_request: TextGenerationRequest) => ['rank(close_CHN)']);

    const result = await generateExpressions(generator, { region: 'CHN' }, createTestContext(), cache);

    expect(result).toEqual({ ok: true, value: ['rank(close_CHN)'] });
    expect(generator.mock.calls[0][0].context).toMatchObject({
      operators: ['rank', 'ts_mean'],
      dataFields: ['close_CHN', 'volume'],
    });
    expect(getDataFields).toHaveBeenCalledWith({ region: 'CHN', universe: undefined, delay: undefined });
  });

  it('prefers operators given in the request over the cache', async () => {
    const getOperators = vi.fn(async () => ok([{ name: 'rank' }]));
    const cache = new ReferenceDataCache({ getOperators, getDataFields: async () => ok([]) });
    const generator = vi.fn(async (_request: TextGenerationRequest) => ['ts_sum(close, 3)']);

    await generateExpressions(generator, { operators: ['ts_sum'] }, createTestContext(), cache);

    expect(generator.mock.calls[0][0].context).toMatchObject({ operators: ['ts_sum'], dataFields: [] });
    expect(getOperators).not.toHaveBeenCalled();
  });

  it('turns a generator error into a failure', async () => {
    const result = await generateExpressions(
      async () => {
        throw new Error('quota exceeded');
      },
      {},
      createTestContext()
    );

    expect(result).toEqual({ ok: false, error: { kind: 'transient', message: 'quota exceeded' } });
  });
});
