import type { FindingOf, LagStats, Row } from '../../types/quality';
import { findColumnByNames } from '../patterns';
import { recommend, recommendedLookbackDays, severityPolicy } from '../severity';
import type { QualityThresholds } from '../severity';
import { mean, quantile, round, toDate } from '../../utils/stats';
import type { CheckContext } from './types';

const HOUR_MS = 3_600_000;

/** Lag in hours from business event to insertion; rows arriving "early" are dropped. */
export const lagHours = (rows: Row[], businessColumn: string, systemColumn: string) => {
  const lags: number[] = [];
  for (const row of rows) {
    const business = toDate(row[businessColumn]);
    const system = toDate(row[systemColumn]);
    if (!business || !system) continue;
    const lag = (system.getTime() - business.getTime()) / HOUR_MS;
    if (lag >= 0) lags.push(lag);
  }
  return lags;
};

export const computeLagStats = (lags: number[], thresholds: QualityThresholds): LagStats => ({
  total_rows_compared: lags.length,
  min_lag_hours: round(lags.length ? Math.min(...lags) : 0),
  avg_lag_hours: round(mean(lags)),
  p95_lag_hours: round(quantile(lags, thresholds.lagPercentile)),
  max_lag_hours: round(lags.length ? Math.max(...lags) : 0),
  rows_late_over_1d: lags.filter(l => l > thresholds.lateArrivalWarningHours).length,
  rows_late_over_7d: lags.filter(l => l > thresholds.lateArrivalSevereHours).length
});

export const checkLateArrivingData = async ({ table, query, patterns, thresholds }: CheckContext) => {
  const findings: FindingOf<'late_arriving_data'>[] = [];
  if (table.row_count === 0) return findings;

  const business = findColumnByNames(table.columns, patterns.businessDate);
  const system = findColumnByNames(table.columns, patterns.systemTimestamp);
  if (!business || !system) return findings;

  const rows = await query.sampleRows(table.name, [business.name, system.name], thresholds.lagSampleSize);
  const lags = lagHours(rows, business.name, system.name);
  if (!lags.length) return findings;

  const stats = computeLagStats(lags, thresholds);
  const lookbackDays = recommendedLookbackDays(stats.p95_lag_hours, thresholds);
  const trivial = stats.max_lag_hours <= thresholds.trivialLagHours;
  const watermark = trivial ? business.name : system.name;

  const detail =
    `Lag between '${business.name}' and '${system.name}' over ${stats.total_rows_compared} sampled row(s): ` +
    `max ${stats.max_lag_hours.toFixed(1)}h, avg ${stats.avg_lag_hours.toFixed(1)}h, P95 ${stats.p95_lag_hours.toFixed(1)}h. ` +
    `${stats.rows_late_over_1d} row(s) arrived >24h late, ${stats.rows_late_over_7d} >7 days late.`;

  findings.push({
    table: table.name,
    column: business.name,
    check: 'late_arriving_data',
    severity: severityPolicy.lateArrivingData(stats.max_lag_hours, thresholds),
    detail,
    recommendation: recommend.lateArrivingData(watermark, business.name, lookbackDays, trivial),
    evidence: {
      business_date_column: business.name,
      system_ts_column: system.name,
      lag_stats: stats,
      recommended_lookback_days: lookbackDays,
      watermark_column: watermark
    }
  });

  return findings;
};
