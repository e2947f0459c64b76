import type {
  Churn,
  ChurnRate,
  GrowthHistoryPoint,
  SizeSnapshot,
  TrendDirection,
  TrendEstimate,
  TrendSource,
  WriteProfile
} from '../types/growth';
import { InsufficientHistoryError } from '../utils/errors';
import { linearSlope, mean, round } from '../utils/stats';

export type TrendThresholds = {
  stableSlopeRatio: number; // |slope| at or below this share of mean rows is noise
  appendOnlyMaxChurnRatio: number;
  updateHeavyMinRatio: number;
  deleteHeavyMinRatio: number;
};

export const DEFAULT_TREND_THRESHOLDS: TrendThresholds = {
  stableSlopeRatio: 0.01,
  appendOnlyMaxChurnRatio: 0.2,
  updateHeavyMinRatio: 0.5,
  deleteHeavyMinRatio: 0.3
};

const DAY_MS = 86_400_000;
const DAYS_PER_MONTH = 365.25 / 12;

const delta = (later: number, earlier: number) => (later >= earlier ? later - earlier : later);

/** Sums counter deltas between consecutive snapshots. A drop means the counter was reset. */
export const churnBetween = (snapshots: SizeSnapshot[]): Churn => {
  const total: Churn = { inserts: 0, updates: 0, deletes: 0 };
  for (let i = 1; i < snapshots.length; i++) {
    const prev = snapshots[i - 1];
    const cur = snapshots[i];
    total.inserts += delta(cur.inserts, prev.inserts);
    total.updates += delta(cur.updates, prev.updates);
    total.deletes += delta(cur.deletes, prev.deletes);
  }
  return total;
};

export const classifyWriteProfile = (churn: Churn, t: TrendThresholds = DEFAULT_TREND_THRESHOLDS): WriteProfile => {
  const total = churn.inserts + churn.updates + churn.deletes;
  if (total <= 0) return 'unknown';
  if ((churn.updates + churn.deletes) / total <= t.appendOnlyMaxChurnRatio) return 'append_only';
  if (churn.updates / total > t.updateHeavyMinRatio) return 'update_heavy';
  if (churn.deletes / total > t.deleteHeavyMinRatio) return 'delete_heavy';
  return 'mixed';
};

export const bloatRatio = (snapshot: SizeSnapshot | undefined) => {
  if (!snapshot?.avg_row_size_bytes || snapshot.row_count <= 0) return null;
  return round(snapshot.size_bytes / (snapshot.row_count * snapshot.avg_row_size_bytes), 2);
};

export const trendDirection = (slope: number, series: number[], t: TrendThresholds): TrendDirection => {
  const noise = Math.abs(mean(series)) * t.stableSlopeRatio;
  if (Math.abs(slope) <= noise) return 'stable';
  return slope > 0 ? 'increasing' : 'decreasing';
};

const monthIndex = (month: string) => {
  const [year, mon] = month.split('-').map(Number);
  return year * 12 + (mon - 1);
};

type GrowthFit = {
  source: TrendSource;
  data_points: number;
  monthly_row_growth: number | null;
  monthly_size_growth: number | null;
  trend_direction: TrendDirection;
};

const fitSnapshots = (table: string, snapshots: SizeSnapshot[], t: TrendThresholds): GrowthFit => {
  const start = new Date(snapshots[0]?.captured_at ?? 0).valueOf();
  const months = snapshots.map(s => (new Date(s.captured_at).valueOf() - start) / DAY_MS / DAYS_PER_MONTH);
  // Snapshots taken at the same instant carry no time signal.
  if (new Set(months).size < 2) throw new InsufficientHistoryError(table, new Set(months).size);
  const rows = snapshots.map(s => s.row_count);
  const rowSlope = linearSlope(months, rows, table);
  const sizeSlope = linearSlope(months, snapshots.map(s => s.size_bytes), table);
  return {
    source: 'snapshots',
    data_points: snapshots.length,
    monthly_row_growth: round(rowSlope, 2),
    monthly_size_growth: round(sizeSlope, 2),
    trend_direction: trendDirection(rowSlope, rows, t)
  };
};

const fitHistory = (table: string, history: GrowthHistoryPoint[], latest: SizeSnapshot | undefined, t: TrendThresholds): GrowthFit => {
  const rows = history.map(p => p.row_count);
  const rowSlope = linearSlope(history.map(p => monthIndex(p.month)), rows, table);
  const bytesPerRow = latest && latest.row_count > 0 ? latest.size_bytes / latest.row_count : null;
  return {
    source: 'growth_history',
    data_points: history.length,
    monthly_row_growth: round(rowSlope, 2),
    monthly_size_growth: bytesPerRow === null ? null : round(rowSlope * bytesPerRow, 2),
    trend_direction: trendDirection(rowSlope, rows, t)
  };
};

const UNKNOWN_FIT: GrowthFit = {
  source: 'none',
  data_points: 0,
  monthly_row_growth: null,
  monthly_size_growth: null,
  trend_direction: 'unknown'
};

const fitGrowth = (table: string, snapshots: SizeSnapshot[], history: GrowthHistoryPoint[], t: TrendThresholds) => {
  try {
    return fitSnapshots(table, snapshots, t);
  } catch (err) {
    if (!(err instanceof InsufficientHistoryError)) throw err;
  }
  try {
    return fitHistory(table, history, snapshots[snapshots.length - 1], t);
  } catch (err) {
    if (!(err instanceof InsufficientHistoryError)) throw err;
  }
  return { ...UNKNOWN_FIT, data_points: Math.max(snapshots.length, history.length) };
};

const sortByCapture = (snapshots: SizeSnapshot[]) =>
  [...snapshots].sort((a, b) => Date.parse(a.captured_at) - Date.parse(b.captured_at) || a.id - b.id);

/**
 * Growth, churn and bloat for one table. Snapshots drive the fit when there
 * are at least two distinct capture times; monthly history is the fallback.
 * With neither, growth degrades to `unknown` and nulls.
 */
export const estimateTrend = (
  table: string,
  snapshots: SizeSnapshot[],
  history: GrowthHistoryPoint[] = [],
  thresholds: Partial<TrendThresholds> = {}
): TrendEstimate => {
  const t = { ...DEFAULT_TREND_THRESHOLDS, ...thresholds };
  const ordered = sortByCapture(snapshots);
  const sortedHistory = [...history].sort((a, b) => a.month.localeCompare(b.month));
  const first = ordered[0];
  const latest = ordered[ordered.length - 1];

  let churnRate: ChurnRate | null = null;
  let writeProfile: WriteProfile = 'unknown';
  if (ordered.length >= 2 && first && latest) {
    const churn = churnBetween(ordered);
    // Sources without churn counters still show inserts as row growth.
    if (churn.inserts + churn.updates + churn.deletes === 0) {
      churn.inserts = Math.max(0, latest.row_count - first.row_count);
    }
    writeProfile = classifyWriteProfile(churn, t);
    const days = (new Date(latest.captured_at).valueOf() - new Date(first.captured_at).valueOf()) / DAY_MS;
    if (days > 0) {
      churnRate = {
        inserts_per_day: round(churn.inserts / days, 2),
        updates_per_day: round(churn.updates / days, 2),
        deletes_per_day: round(churn.deletes / days, 2)
      };
    }
  }

  const fit = fitGrowth(table, ordered, sortedHistory, t);

  return {
    table,
    current_rows: latest?.row_count ?? sortedHistory[sortedHistory.length - 1]?.row_count ?? 0,
    current_size_bytes: latest?.size_bytes ?? 0,
    churn_rate: churnRate,
    write_profile: writeProfile,
    bloat_ratio: bloatRatio(latest),
    ...fit
  };
};
