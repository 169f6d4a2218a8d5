/**
 * Tests for reference-cache.ts
 */

import { describe, it, expect, vi } from 'vitest';
import { ok, err, failure, type Result } from '@alphaminer/core';
import { ReferenceDataCache, type ReferenceDataSource } from '../../src/reference-cache';
import type { DataFieldQuery, ReferenceRecord } from '../../src/brain-client';

function createSource() {
  const getOperators = vi.fn(
    async (): Promise<Result<ReferenceRecord[]>> => ok([{ name: 'rank' }, { name: 'ts_mean' }])
  );
  const getDataFields = vi.fn(
    async (query?: DataFieldQuery): Promise<Result<ReferenceRecord[]>> =>
      ok([{ id: `close_${query?.region ?? 'USA'}` }])
  );
  const source: ReferenceDataSource = { getOperators, getDataFields };
  return { source, getOperators, getDataFields };
}

describe('ReferenceDataCache', () => {
  it('fetches operators once and serves them from the cache', async () => {
    const { source, getOperators } = createSource();
    const cache = new ReferenceDataCache(source);

    await cache.getOperators();
    const second = await cache.getOperators();

    expect(second).toEqual([{ name: 'rank' }, { name: 'ts_mean' }]);
    expect(getOperators).toHaveBeenCalledTimes(1);
  });

  it('refetches when refresh is requested', async () => {
    const { source, getOperators } = createSource();
    const cache = new ReferenceDataCache(source);

    await cache.getOperators();
    await cache.getOperators(true);

    expect(getOperators).toHaveBeenCalledTimes(2);
  });

  it('caches an empty list after a failed fetch', async () => {
    const { source, getOperators } = createSource();
    getOperators.mockResolvedValueOnce(err(failure('transient', 'down')));
    const cache = new ReferenceDataCache(source);

    expect(await cache.getOperators()).toEqual([]);
    expect(await cache.getOperators()).toEqual([]);
    expect(getOperators).toHaveBeenCalledTimes(1);
  });

  it('keys data fields by region, universe and delay', async () => {
    const { source, getDataFields } = createSource();
    const cache = new ReferenceDataCache(source);

    const usa = await cache.getDataFields({ region: 'USA' });
    const usaAgain = await cache.getDataFields({ region: 'usa', universe: 'top3000' });
    const eur = await cache.getDataFields({ region: 'EUR' });

    expect(usa).toEqual([{ id: 'close_USA' }]);
    expect(usaAgain).toBe(usa);
    expect(eur).toEqual([{ id: 'close_EUR' }]);
    expect(getDataFields).toHaveBeenCalledTimes(2);
  });

  it('keeps searches in the same region apart', async () => {
    const { source, getDataFields } = createSource();
    getDataFields.mockImplementation(async (query?: DataFieldQuery) =>
      ok([{ id: query?.search ?? 'all' }])
    );
    const cache = new ReferenceDataCache(source);

    const close = await cache.getDataFields({ region: 'USA', search: 'close' });
    const volume = await cache.getDataFields({ region: 'USA', search: 'volume' });
    const byDataset = await cache.getDataFields({ region: 'USA', datasetId: 'pv1' });
    const closeAgain = await cache.getDataFields({ region: 'USA', search: 'close' });

    expect(close).toEqual([{ id: 'close' }]);
    expect(volume).toEqual([{ id: 'volume' }]);
    expect(byDataset).toEqual([{ id: 'all' }]);
    expect(closeAgain).toBe(close);
    expect(getDataFields).toHaveBeenCalledTimes(3);
  });

  it('forgets everything on clear', async () => {
    const { source, getOperators } = createSource();
    const cache = new ReferenceDataCache(source);

    await cache.getOperators();
    cache.clear();
    await cache.getOperators();

    expect(getOperators).toHaveBeenCalledTimes(2);
  });
});
