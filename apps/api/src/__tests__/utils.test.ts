import { describe, it, expect } from 'vitest';
import { formatBytes, linearSlope, quantile, toNumber } from '../utils/stats';
import { nameSimilarity, singularize, tableNameForms } from '../utils/similarity';
import { parseHorizons, parseSnapshot, parseSourceRequest, parseThresholds } from '../http/validate';
import { InsufficientHistoryError, ValidationError } from '../utils/errors';

describe('stats', () => {
  it('interpolates quantiles', () => {
    expect(quantile([200, 1, 30, 2], 0.95)).toBeCloseTo(174.5);
    expect(quantile([], 0.5)).toBe(0);
  });

  it('needs two points for a slope', () => {
    expect(linearSlope([0, 1, 2], [5, 7, 9])).toBe(2);
    expect(() => linearSlope([0], [5], 'orders')).toThrow(InsufficientHistoryError);
  });

  it('formats byte counts', () => {
    expect(formatBytes(512)).toBe('512.0 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(-1)).toBe('0 B');
  });

  it('coerces driver values to numbers', () => {
    expect(toNumber('42')).toBe(42);
    expect(toNumber(BigInt(7))).toBe(7);
    expect(toNumber('n/a')).toBeNull();
    expect(toNumber(null)).toBeNull();
  });
});

describe('similarity', () => {
  it('covers plural table spellings', () => {
    expect([...tableNameForms('category')]).toEqual(['category', 'categorys', 'categoryes', 'categories']);
    expect(singularize('Addresses')).toBe('address');
  });

  it('scores names by edit distance', () => {
    expect(nameSimilarity('customer', 'Customer')).toBe(1);
    expect(nameSimilarity('order', '')).toBe(0);
  });
});

describe('request validation', () => {
  it('detects the dialect from the connection string', () => {
    expect(parseSourceRequest({ connectionString: 'mysql://ro@db/shop' }, { queryTimeoutMs: 500 })).toEqual({
      dbType: 'mysql',
      connectionString: 'mysql://ro@db/shop',
      schema: undefined,
      queryTimeoutMs: 500
    });
  });

  it('falls back to the configured database URL', () => {
    const options = parseSourceRequest({}, { queryTimeoutMs: 500, databaseUrl: 'postgres://ro:test-secret@db/shop' });
    expect(options.dbType).toBe('postgres');
    expect(options.connectionString).toBe('postgres://ro:test-secret@db/shop');
  });

  it('keeps thresholds within their ranges', () => {
    expect(parseThresholds({ lagPercentile: 0.9, formatSampleSize: 50, trivialLagHours: 0.5 })).toEqual({
      lagPercentile: 0.9,
      formatSampleSize: 50,
      trivialLagHours: 0.5
    });
    expect(() => parseThresholds({ lagPercentile: 5 })).toThrow("Threshold 'lagPercentile' must be between 0 and 1");
    expect(() => parseThresholds({ formatDominantMinRatio: 1.5 })).toThrow(
      "Threshold 'formatDominantMinRatio' must be between 0 and 1"
    );
    expect(() => parseThresholds({ orphanSampleSize: 2.5 })).toThrow(
      "Threshold 'orphanSampleSize' must be a whole number of at least 1"
    );
    expect(() => parseThresholds({ lateArrivalWarningHours: -1 })).toThrow(
      "Threshold 'lateArrivalWarningHours' must be a non-negative number"
    );
    expect(() => parseThresholds({ lagSampleSize: '10' })).toThrow("Threshold 'lagSampleSize' must be a number");
  });

  it('rejects an unknown dialect', () => {
    expect(() =>
      parseSourceRequest({ connectionString: 'postgres://db/shop', dbType: 'oracle' }, { queryTimeoutMs: 500 })
    ).toThrow('dbType must be one of postgres, mysql, sqlite');
  });

  it('defaults churn to zero', () => {
    expect(parseSnapshot({ table: 'orders', size_bytes: 10, row_count: 1 }).churn).toEqual({
      inserts: 0,
      updates: 0,
      deletes: 0
    });
  });

  it('parses horizons', () => {
    expect(parseHorizons('3, 6')).toEqual([3, 6]);
    expect(parseHorizons(undefined)).toBeUndefined();
    expect(() => parseHorizons('0')).toThrow(ValidationError);
  });
});
