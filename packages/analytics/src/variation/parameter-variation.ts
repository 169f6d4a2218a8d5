/**
 * Parameter Variation Engine
 * ==========================
 * Expands one expression into a bounded family of variants by perturbing its
 * integer literals (lookback windows, decay lengths and the like).
 *
 * Variant zero is always the unmodified expression. Unchanged values are
 * written back with their original text, so substituting the extracted
 * values reproduces the input exactly.
 */

import { createPackageLogger } from '@alphaminer/utils';

const logger = createPackageLogger('@alphaminer/analytics');

/**
 * An integer literal found in an expression. Offsets are [start, end).
 */
export interface ParameterSite {
  value: number;
  start: number;
  end: number;
  raw: string;
}

export interface VariationOptions {
  /** Relative half-width of the search range around each value */
  rangePercent: number;
  /** Candidates per parameter when the value is at most 20 */
  minPerParam: number;
  /** Candidates per parameter when the value is above 20 */
  maxPerParam: number;
  /** Upper bound on returned variants, the original included */
  maxVariations: number;
}

export const DEFAULT_VARIATION_OPTIONS: Readonly<VariationOptions> = Object.freeze({
  rangePercent: 0.5,
  minPerParam: 3,
  maxPerParam: 5,
  maxVariations: 20,
});

const SMALL_VALUE_LIMIT = 20;

// Digits not touching identifier characters or a decimal point
const INTEGER_LITERAL = /(?<![A-Za-z0-9_.])\d+(?![A-Za-z0-9_.])/g;

export function extractParameters(expression: string): ParameterSite[] {
  const sites: ParameterSite[] = [];
  for (const match of expression.matchAll(INTEGER_LITERAL)) {
    const value = Number.parseInt(match[0], 10);
    // Too large to vary and write back as plain digits
    if (!Number.isSafeInteger(value)) continue;
    const start = match.index ?? 0;
    sites.push({
      value,
      start,
      end: start + match[0].length,
      raw: match[0],
    });
  }
  return sites;
}

/**
 * Replace each site with the value at the same index. Replacements run from
 * the last site backwards so earlier offsets stay valid.
 */
export function substituteParameters(
  expression: string,
  sites: readonly ParameterSite[],
  values: readonly number[]
): string {
  if (sites.length !== values.length) {
    throw new RangeError(`Expected ${sites.length} values, got ${values.length}`);
  }

  const order = sites.map((_, index) => index).sort((a, b) => sites[b].start - sites[a].start);
  let result = expression;
  for (const index of order) {
    const site = sites[index];
    const value = values[index];
    const text = value === site.value ? site.raw : String(value);
    result = result.slice(0, site.start) + text + result.slice(site.end);
  }
  return result;
}

function resolveOptions(options: Partial<VariationOptions>): VariationOptions {
  const resolved = { ...DEFAULT_VARIATION_OPTIONS, ...options };
  if (!(resolved.rangePercent >= 0)) {
    throw new RangeError(`rangePercent must be non-negative, got ${resolved.rangePercent}`);
  }
  for (const key of ['minPerParam', 'maxPerParam', 'maxVariations'] as const) {
    if (!Number.isInteger(resolved[key]) || resolved[key] < 1) {
      throw new RangeError(`${key} must be a positive integer, got ${resolved[key]}`);
    }
  }
  return resolved;
}

/**
 * Sorted candidate values for one parameter, always including the original
 */
export function candidateValues(value: number, options: Partial<VariationOptions> = {}): number[] {
  const { rangePercent, minPerParam, maxPerParam } = resolveOptions(options);
  const lower = Math.max(1, Math.floor(value * (1 - rangePercent)));
  const upper = Math.max(lower, Math.ceil(value * (1 + rangePercent)));
  const count = value <= SMALL_VALUE_LIMIT ? minPerParam : maxPerParam;

  const values = new Set<number>();
  if (upper - lower + 1 <= count) {
    for (let v = lower; v <= upper; v++) values.add(v);
  } else if (count === 1) {
    values.add(lower);
  } else {
    for (let i = 0; i < count; i++) {
      values.add(lower + Math.round((i * (upper - lower)) / (count - 1)));
    }
  }
  values.add(value);

  return [...values].sort((a, b) => a - b);
}

function product(lists: readonly number[][]): number {
  return lists.reduce((acc, list) => acc * list.length, 1);
}

/**
 * Drop candidates until the combination count fits, always from the
 * parameter with the most candidates and always the one farthest from the
 * original value. No parameter goes below two candidates.
 */
function shrinkCandidates(candidates: number[][], originals: readonly number[], maxVariations: number): void {
  while (product(candidates) > maxVariations && candidates.some((list) => list.length > 2)) {
    let widest = 0;
    candidates.forEach((list, index) => {
      if (list.length > candidates[widest].length) widest = index;
    });

    const original = originals[widest];
    const list = candidates[widest];
    let farthest = -1;
    list.forEach((v, index) => {
      if (v === original) return;
      if (farthest === -1 || Math.abs(v - original) > Math.abs(list[farthest] - original)) {
        farthest = index;
      }
    });
    if (farthest === -1) break;
    list.splice(farthest, 1);
  }
}

/**
 * Generate variants of an expression. Entry zero is the expression itself;
 * the rest follow the Cartesian product of candidates with the last parameter
 * varying fastest, skipping duplicates, truncated to `maxVariations`.
 */
export function generateVariations(
  expression: string,
  options: Partial<VariationOptions> = {}
): string[] {
  const resolved = resolveOptions(options);
  const sites = extractParameters(expression);

  if (sites.length === 0) {
    logger.warn('No numeric parameters found in expression', { expression });
    return [expression];
  }

  const originals = sites.map((site) => site.value);
  const candidates = originals.map((value) => candidateValues(value, resolved));
  const fullCount = product(candidates);
  if (fullCount > resolved.maxVariations) {
    logger.debug('Too many combinations, shrinking candidate lists', {
      combinations: fullCount,
      maxVariations: resolved.maxVariations,
    });
    shrinkCandidates(candidates, originals, resolved.maxVariations);
  }

  const variations = [expression];
  const seen = new Set(variations);
  const cursor = candidates.map(() => 0);

  // Odometer over candidate indices, last position fastest
  while (variations.length < resolved.maxVariations) {
    const values = cursor.map((position, k) => candidates[k][position]);
    if (values.some((v, k) => v !== originals[k])) {
      const variant = substituteParameters(expression, sites, values);
      if (!seen.has(variant)) {
        seen.add(variant);
        variations.push(variant);
      }
    }

    let k = cursor.length - 1;
    while (k >= 0) {
      cursor[k] += 1;
      if (cursor[k] < candidates[k].length) break;
      cursor[k] = 0;
      k -= 1;
    }
    if (k < 0) break;
  }

  logger.info('Generated parameter variations', {
    parameters: sites.length,
    variations: variations.length,
  });
  return variations;
}
