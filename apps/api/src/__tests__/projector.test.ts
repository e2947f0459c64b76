import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { openSnapshotStore } from '../growth/store';
import type { SnapshotStore } from '../growth/store';
import { buildCapacityReport, project, projectEstimate } from '../growth/projector';
import type { TrendEstimate } from '../types/growth';

const estimate = (overrides: Partial<TrendEstimate> = {}): TrendEstimate => ({
  table: 'orders',
  source: 'snapshots',
  data_points: 2,
  current_rows: 100,
  current_size_bytes: 1024,
  churn_rate: null,
  write_profile: 'unknown',
  bloat_ratio: null,
  monthly_row_growth: null,
  monthly_size_growth: null,
  trend_direction: 'unknown',
  ...overrides
});

describe('projectEstimate', () => {
  it('holds size flat when growth is unknown', () => {
    const [six] = projectEstimate(estimate(), [6]);
    expect(six).toEqual({
      table: 'orders',
      horizon_months: 6,
      projected_rows: 100,
      projected_size_bytes: 1024,
      projected_size_human: '1.0 KB',
      trend_direction: 'unknown'
    });
  });

  it('never projects below zero', () => {
    const projections = projectEstimate(
      estimate({ monthly_row_growth: -50, monthly_size_growth: -300, trend_direction: 'decreasing' }),
      [1, 6]
    );
    expect(projections.map(p => p.projected_rows)).toEqual([50, 0]);
    expect(projections.map(p => p.projected_size_bytes)).toEqual([724, 0]);
  });
});

describe('capacity projections from the store', () => {
  let store: SnapshotStore;

  beforeEach(async () => {
    store = openSnapshotStore({ file: ':memory:' });
    // Exactly one average month apart.
    await store.recordSnapshot({
      table: 'orders',
      size_bytes: 10_000,
      row_count: 1000,
      avg_row_size_bytes: 10,
      churn: { inserts: 0, updates: 0, deletes: 0 },
      captured_at: '2024-01-01T00:00:00.000Z'
    });
    await store.recordSnapshot({
      table: 'orders',
      size_bytes: 11_000,
      row_count: 1100,
      avg_row_size_bytes: 10,
      churn: { inserts: 100, updates: 0, deletes: 0 },
      captured_at: '2024-01-31T10:30:00.000Z'
    });
    await store.recordSnapshot({
      table: 'audit_log',
      size_bytes: 50_000,
      row_count: 500,
      churn: { inserts: 0, updates: 0, deletes: 0 },
      captured_at: '2024-01-31T10:30:00.000Z'
    });
  });

  afterEach(async () => {
    await store.close();
  });

  it('extrapolates the fitted monthly growth', async () => {
    const projections = await project(store, 'orders');

    expect(projections.map(p => [p.horizon_months, p.projected_rows, p.projected_size_bytes])).toEqual([
      [6, 1700, 17_000],
      [12, 2300, 23_000],
      [24, 3500, 35_000]
    ]);
    expect(projections[0].projected_size_human).toBe('16.6 KB');
    expect(projections.every(p => p.trend_direction === 'increasing')).toBe(true);
  });

  it('gives the same answer twice without writing anything', async () => {
    const first = await project(store, 'orders', { horizons: [3] });
    const second = await project(store, 'orders', { horizons: [3] });

    expect(second).toEqual(first);
    expect(await store.listSnapshots('orders')).toHaveLength(2);
  });

  it('rolls tables up into a capacity report', async () => {
    const report = await buildCapacityReport(store, {
      horizons: [6],
      generatedAt: new Date('2024-02-01T00:00:00.000Z')
    });

    expect(report.generated_at).toBe('2024-02-01T00:00:00.000Z');
    expect(report.tables.map(t => t.table)).toEqual(['audit_log', 'orders']);
    expect(report.summary).toEqual({
      tables_analyzed: 2,
      current_total_size_bytes: 61_000,
      current_total_size_human: '59.6 KB',
      projected_total_size_bytes: { '6': 67_000 },
      fastest_growing_tables: [{ table: 'orders', monthly_row_growth: 100 }],
      largest_tables: [
        { table: 'audit_log', size_bytes: 50_000, size_human: '48.8 KB' },
        { table: 'orders', size_bytes: 11_000, size_human: '10.7 KB' }
      ]
    });

    const orders = report.tables[1];
    expect(orders.current).toEqual({
      row_count: 1100,
      size_bytes: 11_000,
      size_human: '10.7 KB',
      bloat_ratio: 1,
      write_profile: 'append_only'
    });
    expect(orders.growth.source).toBe('snapshots');
    expect(report.tables[0].growth.trend_direction).toBe('unknown');
  });
});
