export type Severity = 'critical' | 'warning' | 'info';

export const CHECK_KINDS = [
  'controlled_value_candidate',
  'nullable_but_never_null',
  'missing_primary_key',
  'missing_foreign_key',
  'format_inconsistency',
  'range_violation',
  'delete_management',
  'late_arriving_data',
  'timezone'
] as const;

export type CheckKind = (typeof CHECK_KINDS)[number];

export type Row = Record<string, unknown>;

export type ColumnStats = {
  cardinality: number | null;
  null_count: number | null;
  distinct_values: string[]; // top-K sample, not exhaustive
  min: string | number | null;
  max: string | number | null;
};

export type ColumnFact = ColumnStats & {
  table: string;
  name: string;
  type: string; // lower-cased source type, e.g. "character varying", "timestamptz"
  nullable: boolean;
  is_unique: boolean;
  has_check_constraint: boolean;
  enum_values: string[] | null;
  detected_timezone: string | null;
};

export type ForeignKeyFact = {
  column: string;
  ref_table: string;
  ref_column: string;
};

export type TableFact = {
  schema: string;
  name: string;
  row_count: number;
  primary_keys: string[];
  foreign_keys: ForeignKeyFact[];
  columns: ColumnFact[];
  cdc_enabled?: boolean | null;
};

export type DeleteStrategy = 'soft_delete' | 'hard_delete_with_cdc' | 'hard_delete';
export type SoftDeleteType = 'timestamp' | 'boolean' | 'active_flag';
export type FormatPattern = 'email' | 'phone' | 'date_as_text' | 'url' | 'numeric_as_text';
export type RangeViolationType = 'negative_pricing' | 'negative_quantity';

export type LagStats = {
  total_rows_compared: number;
  min_lag_hours: number;
  avg_lag_hours: number;
  p95_lag_hours: number;
  max_lag_hours: number;
  rows_late_over_1d: number;
  rows_late_over_7d: number;
};

export type TimezoneColumn = {
  column: string;
  type: string;
  effective_timezone: string;
  is_tz_aware: boolean;
};

export type EvidenceByCheck = {
  controlled_value_candidate: {
    distinct_values: string[];
    cardinality: number;
  };
  nullable_but_never_null: {
    row_count: number;
    null_count: number;
  };
  missing_primary_key: {
    row_count: number;
  };
  missing_foreign_key: {
    target_table: string;
    target_column: string;
    orphan_count: number | null; // null when orphan detection was not possible
    orphaned_values: string[];
  };
  format_inconsistency: {
    pattern: FormatPattern;
    sampled: number;
    matched: number;
    match_ratio: number;
    non_conforming_ratio: number;
    non_matching_samples: string[];
  };
  range_violation: {
    violation_type: RangeViolationType;
    min: number;
  };
  delete_management: {
    delete_strategy: DeleteStrategy;
    soft_delete_column: string | null;
    soft_delete_type: SoftDeleteType | null;
    cdc_enabled: boolean | null;
    has_audit_trail: boolean;
    audit_trail_table: string | null;
    is_audit_table: boolean;
  };
  late_arriving_data: {
    business_date_column: string;
    system_ts_column: string;
    lag_stats: LagStats;
    recommended_lookback_days: number;
    watermark_column: string;
  };
  timezone: {
    server_timezone: string;
    columns: TimezoneColumn[];
    distinct_timezones: string[];
    database_timezones: string[];
    tz_aware_count: number;
    tz_naive_count: number;
  };
};

export type FindingOf<K extends CheckKind> = {
  readonly table: string;
  readonly column: string | null;
  readonly check: K;
  readonly severity: Severity;
  readonly detail: string;
  readonly recommendation: string;
  readonly evidence: Readonly<EvidenceByCheck[K]>;
};

export type Finding = { [K in CheckKind]: FindingOf<K> }[CheckKind];

export type CheckResults = { [K in CheckKind]: FindingOf<K>[] };

export type NoteReason = 'unsupported' | 'permission_denied' | 'timeout' | 'failed';

export type CheckNote = {
  check: CheckKind | 'statistics' | 'metadata';
  reason: NoteReason;
  message: string;
};

export type TableRunResult = {
  table: TableFact;
  results: CheckResults;
  notes: CheckNote[];
};

export type TableDataQuality = CheckResults & {
  findings: Finding[];
  notes: CheckNote[];
};

export type TableReport = TableFact & {
  data_quality: TableDataQuality;
};

export type SeverityCounts = Record<Severity, number>;

export type DataQualitySummary = SeverityCounts & {
  by_check: Record<CheckKind, number>;
  timezones: {
    server_timezone: string;
    distinct: string[];
    mixed: boolean;
  };
};

export type ReportMetadata = {
  generated_at: string;
  dialect: string;
  schema_filter: string;
  total_tables_analyzed: number;
  total_findings: number;
  reduced_confidence: boolean;
  // Run-level notes, such as a denied table listing.
  notes: CheckNote[];
};

export type ConnectionInfo = {
  db_type: string;
  target: string;
  server_timezone: string;
};

export type Report = {
  metadata: ReportMetadata;
  connection: ConnectionInfo;
  data_quality_summary: DataQualitySummary;
  tables: TableReport[];
};
