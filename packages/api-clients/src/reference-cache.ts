/**
 * Reference Data Cache
 * ====================
 *
 * In-memory cache of the operator catalogue and data fields so generation
 * and polishing do not refetch them per call. Entries stay until `refresh`
 * is requested.
 *
 * Data field key: every query field the client sends, defaults filled in
 */

import { createPackageLogger, LogHelpers } from '@alphaminer/utils';
import type { DataFieldQuery, ReferenceRecord } from './brain-client';
import type { Result } from '@alphaminer/core';

const logger = createPackageLogger('@alphaminer/api-clients');

/**
 * Client capabilities the cache fetches through
 */
export interface ReferenceDataSource {
  getOperators(): Promise<Result<ReferenceRecord[]>>;
  getDataFields(query?: DataFieldQuery): Promise<Result<ReferenceRecord[]>>;
}

export class ReferenceDataCache {
  private operators: ReferenceRecord[] | null = null;
  private readonly dataFields: Map<string, ReferenceRecord[]> = new Map();

  constructor(private readonly source: ReferenceDataSource) {}

  /**
   * Operator catalogue. A failed fetch is logged and cached as empty.
   */
  async getOperators(refresh: boolean = false): Promise<ReferenceRecord[]> {
    if (this.operators && !refresh) {
      LogHelpers.cache(logger, 'hit', 'operators');
      return this.operators;
    }

    LogHelpers.cache(logger, refresh ? 'refresh' : 'miss', 'operators');
    const result = await this.source.getOperators();
    if (result.ok) {
      this.operators = result.value;
    } else {
      logger.warn('Failed to fetch operators, caching empty list', { error: result.error.message });
      this.operators = [];
    }
    return this.operators;
  }

  /**
   * Data fields for a region/universe/delay. A failed fetch is logged and
   * cached as empty.
   */
  async getDataFields(query: DataFieldQuery = {}, refresh: boolean = false): Promise<ReferenceRecord[]> {
    const key = this.getCacheKey(query);
    const cached = this.dataFields.get(key);
    if (cached && !refresh) {
      LogHelpers.cache(logger, 'hit', key);
      return cached;
    }

    LogHelpers.cache(logger, refresh ? 'refresh' : 'miss', key);
    const result = await this.source.getDataFields(query);
    const fields = result.ok ? result.value : [];
    if (!result.ok) {
      logger.warn('Failed to fetch data fields, caching empty list', {
        key,
        error: result.error.message,
      });
    }
    this.dataFields.set(key, fields);
    return fields;
  }

  clear(): void {
    this.operators = null;
    this.dataFields.clear();
  }

  private getCacheKey(query: DataFieldQuery): string {
    const region = (query.region ?? 'USA').toUpperCase();
    const universe = (query.universe ?? 'TOP3000').toUpperCase();
    const delay = query.delay ?? 1;
    const instrumentType = query.instrumentType ?? 'EQUITY';
    const limit = query.limit ?? 50;
    const dataset = query.datasetId ?? '';
    const search = query.search ?? '';
    return [instrumentType, region, universe, delay, limit, dataset, search].join(':');
  }
}
