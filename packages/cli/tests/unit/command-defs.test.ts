/**
 * Tests for command-defs/*.ts and the validation pipeline
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@alphaminer/utils';
import { regionsSchema, settingsFromArgs, simulateSchema } from '../../src/command-defs/simulation';
import { criteriaFromArgs, mineSchema } from '../../src/command-defs/mining';
import { submitSchema, tagSchema } from '../../src/command-defs/submission';
import { normalizeOptions, validateAndCoerceArgs } from '../../src/core/validation-pipeline';

describe('simulateSchema', () => {
  it('applies setting defaults and coerces string options', () => {
    const args = simulateSchema.parse({
      expressions: ['rank(close)'],
      region: 'chn',
      delay: '0',
      neutralization: 'sector',
    });

    expect(args).toEqual({
      expressions: ['rank(close)'],
      region: 'CHN',
      universe: 'TOP3000',
      delay: 0,
      decay: 0,
      neutralization: 'SECTOR',
      truncation: 0.08,
      format: 'table',
      reportPrefix: 'simulation_results',
    });
  });

  it('rejects an unknown neutralization', () => {
    const parsed = simulateSchema.safeParse({ expressions: ['rank(close)'], neutralization: 'country' });
    expect(parsed.success).toBe(false);
  });

  it('rejects truncation outside [0, 1]', () => {
    expect(simulateSchema.safeParse({ expressions: ['rank(close)'], truncation: '1.5' }).success).toBe(false);
  });

  it('builds frozen settings from the options', () => {
    const settings = settingsFromArgs(simulateSchema.parse({ expressions: ['rank(close)'], decay: '4' }));
    expect(settings.region).toBe('USA');
    expect(settings.decay).toBe(4);
    expect(Object.isFrozen(settings)).toBe(true);
  });
});

describe('regionsSchema', () => {
  it('splits, trims and upper-cases the region list', () => {
    const args = regionsSchema.parse({ expressions: ['rank(close)'], regions: ' usa, chn ,' });
    expect(args.regions).toEqual(['USA', 'CHN']);
    expect(args.reportPrefix).toBe('multi_region');
  });

  it('requires at least one region', () => {
    expect(regionsSchema.safeParse({ expressions: ['rank(close)'], regions: ' , ' }).success).toBe(false);
  });
});

describe('mineSchema', () => {
  it('defaults the variation bounds', () => {
    const args = mineSchema.parse({ expression: 'ts_mean(close, 10)' });
    expect(args).toMatchObject({ range: 0.5, minPerParam: 3, maxPerParam: 5, maxVariations: 20, skipSimulation: false });
  });

  it('keeps only the criteria that were given', () => {
    expect(criteriaFromArgs(mineSchema.parse({ expression: 'rank(close)', minSharpe: '2' }))).toEqual({ minSharpe: 2 });
  });
});

describe('submission schemas', () => {
  it('defaults submit options', () => {
    expect(submitSchema.parse({})).toEqual({
      maxResults: 100,
      maxAgeDays: 30,
      validate: true,
      dryRun: false,
      format: 'table',
    });
  });

  it('splits comma-separated tags', () => {
    expect(tagSchema.parse({ alphaId: 'a1', tags: 'momentum, usa,' }).tags).toEqual(['momentum', 'usa']);
  });

  it('requires at least one property when tagging', () => {
    expect(tagSchema.safeParse({ alphaId: 'a1' }).success).toBe(false);
  });
});

describe('validateAndCoerceArgs', () => {
  it('drops undefined options so defaults apply', () => {
    expect(normalizeOptions({ a: 1, b: undefined })).toEqual({ a: 1 });
    expect(validateAndCoerceArgs(submitSchema, { maxResults: undefined }).maxResults).toBe(100);
  });

  it('throws a ValidationError naming each invalid option', () => {
    expect(() => validateAndCoerceArgs(simulateSchema, { expressions: [] })).toThrow(ValidationError);
    expect(() => validateAndCoerceArgs(simulateSchema, { expressions: [] })).toThrow(
      'Invalid arguments: expressions: At least one expression is required'
    );
  });
});
