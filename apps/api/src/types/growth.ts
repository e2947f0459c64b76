export type Churn = {
  inserts: number;
  updates: number;
  deletes: number;
};

// Churn counters are cumulative since the source last reset its statistics.
export type SizeSnapshot = Churn & {
  id: number;
  table: string;
  schema: string;
  captured_at: string;
  size_bytes: number;
  row_count: number;
  avg_row_size_bytes: number | null;
};

export type SnapshotInput = {
  table: string;
  schema?: string;
  size_bytes: number;
  row_count: number;
  churn: Churn;
  avg_row_size_bytes?: number | null;
  captured_at?: string;
};

export type GrowthHistoryPoint = {
  table: string;
  month: string; // YYYY-MM
  row_count: number; // cumulative rows at the end of the month
};

export type WriteProfile = 'append_only' | 'update_heavy' | 'delete_heavy' | 'mixed' | 'unknown';
export type TrendDirection = 'increasing' | 'stable' | 'decreasing' | 'unknown';
export type TrendSource = 'snapshots' | 'growth_history' | 'none';

export type ChurnRate = {
  inserts_per_day: number;
  updates_per_day: number;
  deletes_per_day: number;
};

export type TrendEstimate = {
  table: string;
  source: TrendSource;
  data_points: number;
  current_rows: number;
  current_size_bytes: number;
  churn_rate: ChurnRate | null;
  write_profile: WriteProfile;
  bloat_ratio: number | null;
  monthly_row_growth: number | null;
  monthly_size_growth: number | null;
  trend_direction: TrendDirection;
};

export type CapacityProjection = {
  table: string;
  horizon_months: number;
  projected_rows: number;
  projected_size_bytes: number;
  projected_size_human: string;
  trend_direction: TrendDirection;
};

export type TableCapacity = {
  table: string;
  current: {
    row_count: number;
    size_bytes: number;
    size_human: string;
    bloat_ratio: number | null;
    write_profile: WriteProfile;
  };
  growth: {
    monthly_row_growth: number | null;
    monthly_size_growth: number | null;
    trend_direction: TrendDirection;
    source: TrendSource;
    data_points: number;
  };
  projections: CapacityProjection[];
};

export type CapacityReport = {
  generated_at: string;
  horizons: number[];
  summary: {
    tables_analyzed: number;
    current_total_size_bytes: number;
    current_total_size_human: string;
    projected_total_size_bytes: Record<string, number>;
    fastest_growing_tables: Array<{ table: string; monthly_row_growth: number }>;
    largest_tables: Array<{ table: string; size_bytes: number; size_human: string }>;
  };
  tables: TableCapacity[];
};
