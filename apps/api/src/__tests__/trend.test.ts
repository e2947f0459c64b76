import { describe, it, expect } from 'vitest';
import { churnBetween, classifyWriteProfile, estimateTrend } from '../growth/trend';
import type { SizeSnapshot } from '../types/growth';

const DAY_MS = 86_400_000;
const start = Date.parse('2024-01-01T00:00:00Z');

const snapshot = (day: number, overrides: Partial<SizeSnapshot> = {}): SizeSnapshot => ({
  id: day + 1,
  table: 'orders',
  schema: 'public',
  captured_at: new Date(start + day * DAY_MS).toISOString(),
  size_bytes: 8192,
  row_count: 100,
  avg_row_size_bytes: null,
  inserts: 0,
  updates: 0,
  deletes: 0,
  ...overrides
});

describe('classifyWriteProfile', () => {
  it('maps churn ratios onto profiles', () => {
    expect(classifyWriteProfile({ inserts: 100, updates: 0, deletes: 0 })).toBe('append_only');
    expect(classifyWriteProfile({ inserts: 10, updates: 80, deletes: 10 })).toBe('update_heavy');
    expect(classifyWriteProfile({ inserts: 50, updates: 10, deletes: 40 })).toBe('delete_heavy');
    expect(classifyWriteProfile({ inserts: 50, updates: 30, deletes: 20 })).toBe('mixed');
    expect(classifyWriteProfile({ inserts: 0, updates: 0, deletes: 0 })).toBe('unknown');
  });
});

describe('churnBetween', () => {
  it('treats a counter drop as a reset', () => {
    const churn = churnBetween([snapshot(0, { inserts: 100 }), snapshot(1, { inserts: 150 }), snapshot(2, { inserts: 20 })]);
    expect(churn).toEqual({ inserts: 70, updates: 0, deletes: 0 });
  });
});

describe('estimateTrend', () => {
  it('sees steady inserts as append-only growth', () => {
    const snapshots = [0, 1, 2, 3].map(i =>
      snapshot(i * 30, { row_count: 1000 + i * 100, inserts: i * 100, size_bytes: 10_000 + i * 1000 })
    );

    const trend = estimateTrend('orders', snapshots);

    expect(trend.write_profile).toBe('append_only');
    expect(trend.trend_direction).toBe('increasing');
    expect(trend.source).toBe('snapshots');
    expect(trend.data_points).toBe(4);
    expect(trend.monthly_row_growth).toBe(101.46);
    expect(trend.churn_rate).toEqual({ inserts_per_day: 3.33, updates_per_day: 0, deletes_per_day: 0 });
  });

  it('infers inserts from row growth when counters are missing', () => {
    const trend = estimateTrend('orders', [snapshot(0, { row_count: 10 }), snapshot(30, { row_count: 40 })]);
    expect(trend.write_profile).toBe('append_only');
  });

  it('calls flat and shrinking series what they are', () => {
    const flat = estimateTrend('orders', [0, 30, 60].map(d => snapshot(d, { row_count: 1000 })));
    const shrinking = estimateTrend('orders', [0, 30, 60].map((d, i) => snapshot(d, { row_count: 1000 - i * 200 })));
    expect(flat.trend_direction).toBe('stable');
    expect(shrinking.trend_direction).toBe('decreasing');
  });

  it('degrades to unknown with a single snapshot', () => {
    const trend = estimateTrend('orders', [snapshot(0, { row_count: 100, size_bytes: 8192, avg_row_size_bytes: 40 })]);

    expect(trend).toEqual({
      table: 'orders',
      source: 'none',
      data_points: 1,
      current_rows: 100,
      current_size_bytes: 8192,
      churn_rate: null,
      write_profile: 'unknown',
      bloat_ratio: 2.05,
      monthly_row_growth: null,
      monthly_size_growth: null,
      trend_direction: 'unknown'
    });
  });

  it('falls back to monthly history', () => {
    const history = [
      { table: 'orders', month: '2024-01', row_count: 100 },
      { table: 'orders', month: '2024-02', row_count: 200 },
      { table: 'orders', month: '2024-03', row_count: 300 }
    ];

    const trend = estimateTrend('orders', [snapshot(0, { row_count: 100, size_bytes: 8192 })], history);

    expect(trend.source).toBe('growth_history');
    expect(trend.data_points).toBe(3);
    expect(trend.monthly_row_growth).toBe(100);
    expect(trend.monthly_size_growth).toBe(8192);
    expect(trend.trend_direction).toBe('increasing');
  });

  it('returns unknown rather than throwing with no data at all', () => {
    const trend = estimateTrend('ghost', []);
    expect(trend.trend_direction).toBe('unknown');
    expect(trend.current_rows).toBe(0);
    expect(trend.bloat_ratio).toBeNull();
  });
});
