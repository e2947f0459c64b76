import type { DeleteStrategy, FormatPattern, RangeViolationType, Severity, SoftDeleteType } from '../types/quality';

export type QualityThresholds = {
  controlledValueMaxCardinality: number;
  distinctValueDisplayLimit: number;
  formatSampleSize: number;
  formatDominantMinRatio: number; // exclusive
  lateArrivalWarningHours: number;
  lateArrivalSevereHours: number;
  trivialLagHours: number;
  lagPercentile: number;
  lookbackFloorDays: number;
  lagSampleSize: number;
  orphanSampleSize: number;
};

export const DEFAULT_THRESHOLDS: QualityThresholds = {
  controlledValueMaxCardinality: 20,
  distinctValueDisplayLimit: 10,
  formatSampleSize: 200,
  formatDominantMinRatio: 0.5,
  lateArrivalWarningHours: 24,
  lateArrivalSevereHours: 168,
  trivialLagHours: 1,
  lagPercentile: 0.95,
  lookbackFloorDays: 1,
  lagSampleSize: 5000,
  orphanSampleSize: 10
};

export const resolveThresholds = (overrides: Partial<QualityThresholds> = {}): QualityThresholds => ({
  ...DEFAULT_THRESHOLDS,
  ...overrides
});

export const SEVERITY_ORDER: Record<Severity, number> = { critical: 0, warning: 1, info: 2 };

export const severityPolicy = {
  controlledValueCandidate: (): Severity => 'warning',
  nullableButNeverNull: (): Severity => 'info',
  missingPrimaryKey: (): Severity => 'critical',
  missingForeignKey: (orphanCount: number | null): Severity => (orphanCount && orphanCount > 0 ? 'critical' : 'warning'),
  formatInconsistency: (): Severity => 'warning',
  rangeViolation: (): Severity => 'warning',
  deleteManagement: (strategy: DeleteStrategy): Severity => (strategy === 'hard_delete' ? 'warning' : 'info'),
  lateArrivingData: (maxLagHours: number, t: QualityThresholds): Severity =>
    maxLagHours > t.lateArrivalWarningHours ? 'warning' : 'info',
  timezone: (tableTimezones: number, databaseTimezones: number): Severity =>
    tableTimezones > 1 || databaseTimezones > 1 ? 'warning' : 'info'
};

/** Smallest whole-day window covering the lag percentile, never below the floor. */
export const recommendedLookbackDays = (p95LagHours: number, t: QualityThresholds) =>
  Math.max(t.lookbackFloorDays, Math.ceil(p95LagHours / 24));

export const recommend = {
  controlledValueCandidate: () =>
    'Add a CHECK constraint, convert to an ENUM type, or create a lookup/reference table to prevent invalid values',
  nullableButNeverNull: () => 'Consider adding a NOT NULL constraint if the column should always have a value',
  missingPrimaryKey: () => 'Add a primary key to ensure row uniqueness and enable efficient lookups',
  missingForeignKey: (table: string, column: string, orphanCount: number | null) =>
    orphanCount && orphanCount > 0
      ? `Clean up or quarantine the ${orphanCount} orphaned value(s), then add a FOREIGN KEY constraint referencing ${table}(${column})`
      : `Add FOREIGN KEY constraint referencing ${table}(${column}) to enforce referential integrity`,
  formatInconsistency: (pattern: FormatPattern) =>
    `Add validation to ensure consistent ${pattern} format, or separate non-conforming values`,
  rangeViolation: (type: RangeViolationType) =>
    type === 'negative_pricing'
      ? 'Add CHECK constraint (value >= 0) or verify negatives represent valid adjustments (refunds, credits)'
      : 'Add CHECK constraint (value >= 0) if negative quantities are not expected',
  deleteManagement: (strategy: DeleteStrategy, column: string | null, type: SoftDeleteType | null) => {
    if (strategy === 'soft_delete' && column) {
      if (type === 'active_flag') {
        return `Filter on "${column}" = true for current records during ingestion. Ingest all rows if you need deletion history downstream.`;
      }
      if (type === 'timestamp') {
        return `Use "${column}" IS NULL for active records. This column can also serve as a watermark for incremental delete detection.`;
      }
      return `Filter on "${column}" = false for active records, or ingest all rows for full history.`;
    }
    if (strategy === 'hard_delete_with_cdc') {
      return 'Use CDC (e.g. Debezium, pgoutput) to capture DELETE events instead of periodic full loads.';
    }
    return 'Add a soft-delete column (e.g. deleted_at), enable CDC, or plan periodic full-load syncs to detect deletions.';
  },
  lateArrivingData: (watermark: string, businessColumn: string, lookbackDays: number, lagIsTrivial: boolean) =>
    lagIsTrivial
      ? `Data arrives promptly. Either '${businessColumn}' or '${watermark}' can serve as the incremental watermark.`
      : `Use '${watermark}' as the incremental watermark. If '${businessColumn}' must be used, apply a ${lookbackDays}-day lookback window.`,
  timezone: (mixed: boolean, timezones: string[]) =>
    mixed
      ? 'Standardize date/time columns to a single timezone (preferably UTC with timestamptz) and document per-table assumptions for ingestion.'
      : `Treat all timestamps as '${timezones[0] ?? 'unknown'}' during ingestion and convert to UTC.`
};
