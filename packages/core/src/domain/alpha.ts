/**
 * Alpha Record
 *
 * A completed simulation produces an alpha on the remote service. This is the
 * parsed view of `GET /alphas/{id}` (and of the entries in alpha listings).
 */

import { fromWireSettings, type SimulationSettings } from './settings';
import { parseMetricSet, type MetricSet } from './metrics';

export interface AlphaRecord {
  id: string;
  expression: string;
  name: string | null;
  settings: SimulationSettings;
  metrics: MetricSet | null;
  status: string;
  grade: string;
  tags: string[];
  color: string | null;
  description: string | null;
  dateCreated: Date | null;
  dateSubmitted: Date | null;
}

/**
 * Fields accepted by `PATCH /alphas/{id}`. Only provided fields are sent.
 */
export interface AlphaProperties {
  name?: string;
  color?: string;
  tags?: string[];
  description?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== 'string' || value.length === 0) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function parseAlphaRecord(data: Record<string, unknown>): AlphaRecord {
  const regular = isRecord(data.regular) ? data.regular : {};
  const settings = isRecord(data.settings) ? data.settings : undefined;
  const inSample = isRecord(data.is) ? data.is : null;

  return {
    id: typeof data.id === 'string' ? data.id : '',
    expression: typeof regular.code === 'string' ? regular.code : '',
    name: stringOrNull(data.name),
    settings: fromWireSettings(settings),
    metrics: inSample ? parseMetricSet(inSample) : null,
    status: typeof data.status === 'string' ? data.status : 'UNSUBMITTED',
    grade: typeof data.grade === 'string' ? data.grade : 'UNKNOWN',
    tags: Array.isArray(data.tags)
      ? data.tags.filter((t): t is string => typeof t === 'string')
      : [],
    color: stringOrNull(data.color),
    description: stringOrNull(regular.description),
    dateCreated: parseDate(data.dateCreated),
    dateSubmitted: parseDate(data.dateSubmitted),
  };
}
