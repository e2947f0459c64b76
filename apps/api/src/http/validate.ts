import type { SnapshotInput } from '../types/growth';
import type { DbType, SourceOptions } from '../sources/types';
import type { QualityThresholds } from '../quality/severity';
import { DEFAULT_THRESHOLDS } from '../quality/severity';
import { detectDbType } from '../sources';
import { ValidationError } from '../utils/errors';

const DB_TYPES: DbType[] = ['postgres', 'mysql', 'sqlite'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isDbType = (value: unknown): value is DbType => DB_TYPES.some(t => t === value);

const optionalString = (body: Record<string, unknown>, key: string) => {
  const value = body[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${key} must be a string`);
  return value;
};

const requiredNumber = (body: Record<string, unknown>, key: string) => {
  const value = body[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) throw new ValidationError(`${key} must be a number`);
  return value;
};

const asRecord = (value: unknown, what: string) => {
  if (!isRecord(value)) throw new ValidationError(`${what} must be a JSON object`);
  return value;
};

export type SourceDefaults = {
  queryTimeoutMs: number;
  databaseUrl?: string;
};

/** The body's `connectionString` wins; `DATABASE_URL` is the fallback. */
export const parseSourceRequest = (raw: unknown, defaults: SourceDefaults): SourceOptions => {
  const body = asRecord(raw ?? {}, 'Request body');
  const connectionString = optionalString(body, 'connectionString') ?? defaults.databaseUrl;
  if (!connectionString) throw new ValidationError('connectionString is required');
  const dbType = body.dbType === undefined ? detectDbType(connectionString) : body.dbType;
  if (!isDbType(dbType)) throw new ValidationError(`dbType must be one of ${DB_TYPES.join(', ')}`);
  return {
    dbType,
    connectionString,
    schema: optionalString(body, 'schema'),
    queryTimeoutMs: defaults.queryTimeoutMs
  };
};

const isThresholdKey = (key: string): key is keyof QualityThresholds => Object.hasOwn(DEFAULT_THRESHOLDS, key);

type ThresholdKind = 'ratio' | 'count' | 'hours';

const THRESHOLD_KINDS: Record<keyof QualityThresholds, ThresholdKind> = {
  controlledValueMaxCardinality: 'count',
  distinctValueDisplayLimit: 'count',
  formatSampleSize: 'count',
  formatDominantMinRatio: 'ratio',
  lateArrivalWarningHours: 'hours',
  lateArrivalSevereHours: 'hours',
  trivialLagHours: 'hours',
  lagPercentile: 'ratio',
  lookbackFloorDays: 'count',
  lagSampleSize: 'count',
  orphanSampleSize: 'count'
};

const thresholdError = (key: keyof QualityThresholds, value: number): string | null => {
  switch (THRESHOLD_KINDS[key]) {
    case 'ratio':
      return value >= 0 && value <= 1 ? null : `Threshold '${key}' must be between 0 and 1`;
    case 'count':
      return Number.isInteger(value) && value >= 1 ? null : `Threshold '${key}' must be a whole number of at least 1`;
    case 'hours':
      return value >= 0 ? null : `Threshold '${key}' must be a non-negative number`;
  }
};

/** Known threshold keys only, each within its range: ratios in [0, 1], counts whole and positive. */
export const parseThresholds = (raw: unknown): Partial<QualityThresholds> => {
  if (raw === undefined || raw === null) return {};
  const body = asRecord(raw, 'thresholds');
  const parsed: Partial<QualityThresholds> = {};
  for (const [key, value] of Object.entries(body)) {
    if (!isThresholdKey(key)) throw new ValidationError(`Unknown threshold '${key}'`);
    if (typeof value !== 'number' || !Number.isFinite(value)) throw new ValidationError(`Threshold '${key}' must be a number`);
    const problem = thresholdError(key, value);
    if (problem) throw new ValidationError(problem);
    parsed[key] = value;
  }
  return parsed;
};

export const parseSnapshot = (raw: unknown): SnapshotInput => {
  const body = asRecord(raw ?? {}, 'Request body');
  const table = optionalString(body, 'table');
  if (!table) throw new ValidationError('table is required');
  const churn = asRecord(body.churn ?? { inserts: 0, updates: 0, deletes: 0 }, 'churn');
  const avg = body.avg_row_size_bytes;
  if (avg !== undefined && avg !== null && (typeof avg !== 'number' || !Number.isFinite(avg))) {
    throw new ValidationError('avg_row_size_bytes must be a number');
  }
  return {
    table,
    schema: optionalString(body, 'schema'),
    size_bytes: requiredNumber(body, 'size_bytes'),
    row_count: requiredNumber(body, 'row_count'),
    avg_row_size_bytes: typeof avg === 'number' ? avg : null,
    churn: {
      inserts: requiredNumber(churn, 'inserts'),
      updates: requiredNumber(churn, 'updates'),
      deletes: requiredNumber(churn, 'deletes')
    },
    captured_at: optionalString(body, 'captured_at')
  };
};

/** `?horizons=6,12,24`; positive whole months. */
export const parseHorizons = (raw: unknown): number[] | undefined => {
  if (raw === undefined || raw === '') return undefined;
  if (typeof raw !== 'string') throw new ValidationError('horizons must be a comma-separated list');
  const horizons = raw.split(',').map(part => Number(part.trim()));
  if (!horizons.length || horizons.some(h => !Number.isInteger(h) || h <= 0)) {
    throw new ValidationError('horizons must be positive whole numbers of months');
  }
  return horizons;
};
