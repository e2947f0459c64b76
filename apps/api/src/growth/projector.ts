import type { CapacityProjection, CapacityReport, TableCapacity, TrendEstimate } from '../types/growth';
import type { SnapshotStore } from './store';
import { estimateTrend } from './trend';
import type { TrendThresholds } from './trend';
import { formatBytes } from '../utils/stats';

export const DEFAULT_HORIZONS = [6, 12, 24];
const ROLLUP_SIZE = 5;

/** Linear extrapolation of the fitted monthly growth, clamped at zero. */
export const projectEstimate = (estimate: TrendEstimate, horizons: number[] = DEFAULT_HORIZONS): CapacityProjection[] =>
  horizons.map(h => {
    const rows = Math.max(0, Math.round(estimate.current_rows + (estimate.monthly_row_growth ?? 0) * h));
    const size = Math.max(0, Math.round(estimate.current_size_bytes + (estimate.monthly_size_growth ?? 0) * h));
    return {
      table: estimate.table,
      horizon_months: h,
      projected_rows: rows,
      projected_size_bytes: size,
      projected_size_human: formatBytes(size),
      trend_direction: estimate.trend_direction
    };
  });

export type ProjectOptions = {
  horizons?: number[];
  thresholds?: Partial<TrendThresholds>;
};

export const estimateFromStore = async (store: SnapshotStore, table: string, thresholds?: Partial<TrendThresholds>) => {
  const [snapshots, history] = await Promise.all([store.listSnapshots(table), store.listGrowthHistory(table)]);
  return estimateTrend(table, snapshots, history, thresholds);
};

/** Projections for one table from whatever the store holds for it. Reads only. */
export const project = async (store: SnapshotStore, table: string, options: ProjectOptions = {}) =>
  projectEstimate(await estimateFromStore(store, table, options.thresholds), options.horizons);

export const toTableCapacity = (estimate: TrendEstimate, horizons: number[]): TableCapacity => ({
  table: estimate.table,
  current: {
    row_count: estimate.current_rows,
    size_bytes: estimate.current_size_bytes,
    size_human: formatBytes(estimate.current_size_bytes),
    bloat_ratio: estimate.bloat_ratio,
    write_profile: estimate.write_profile
  },
  growth: {
    monthly_row_growth: estimate.monthly_row_growth,
    monthly_size_growth: estimate.monthly_size_growth,
    trend_direction: estimate.trend_direction,
    source: estimate.source,
    data_points: estimate.data_points
  },
  projections: projectEstimate(estimate, horizons)
});

/** Per-table capacity plus the database-level rollup. */
export const summarizeCapacity = (tables: TableCapacity[], horizons: number[], generatedAt: Date): CapacityReport => {
  const currentTotal = tables.reduce((sum, t) => sum + t.current.size_bytes, 0);
  const projectedTotals: Record<string, number> = {};
  for (const h of horizons) {
    projectedTotals[String(h)] = tables.reduce(
      (sum, t) => sum + (t.projections.find(p => p.horizon_months === h)?.projected_size_bytes ?? 0),
      0
    );
  }

  const fastest = tables
    .filter(t => t.growth.monthly_row_growth !== null && t.growth.monthly_row_growth > 0)
    .map(t => ({ table: t.table, monthly_row_growth: t.growth.monthly_row_growth ?? 0 }))
    .sort((a, b) => b.monthly_row_growth - a.monthly_row_growth || a.table.localeCompare(b.table))
    .slice(0, ROLLUP_SIZE);

  const largest = [...tables]
    .sort((a, b) => b.current.size_bytes - a.current.size_bytes || a.table.localeCompare(b.table))
    .slice(0, ROLLUP_SIZE)
    .map(t => ({ table: t.table, size_bytes: t.current.size_bytes, size_human: t.current.size_human }));

  return {
    generated_at: generatedAt.toISOString(),
    horizons,
    summary: {
      tables_analyzed: tables.length,
      current_total_size_bytes: currentTotal,
      current_total_size_human: formatBytes(currentTotal),
      projected_total_size_bytes: projectedTotals,
      fastest_growing_tables: fastest,
      largest_tables: largest
    },
    tables
  };
};

export const buildCapacityReport = async (
  store: SnapshotStore,
  options: ProjectOptions & { generatedAt?: Date } = {}
): Promise<CapacityReport> => {
  const horizons = options.horizons ?? DEFAULT_HORIZONS;
  const tables: TableCapacity[] = [];
  for (const table of await store.listTables()) {
    tables.push(toTableCapacity(await estimateFromStore(store, table, options.thresholds), horizons));
  }
  return summarizeCapacity(tables, horizons, options.generatedAt ?? new Date());
};
