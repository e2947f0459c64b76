import type { ColumnStats, Row, TableFact } from '../types/quality';
import type { GrowthHistoryPoint } from '../types/growth';

export type DbType = 'postgres' | 'mysql' | 'sqlite';

export type DialectCapabilities = {
  supportsConstraintIntrospection: boolean;
  supportsOrphanDetection: boolean;
  supportsCdcIntrospection: boolean;
  supportsRowSampling: boolean;
  supportsServerTimezone: boolean;
  supportsSizeSnapshots: boolean;
  supportsChurnStatistics: boolean;
};

export type Capability = keyof DialectCapabilities;

export type OrphanProbe = {
  table: string;
  column: string;
  refTable: string;
  refColumn: string;
};

export type OrphanResult = {
  count: number;
  sample: string[];
};

/**
 * The scoped query capability handed to every check. One instance per run,
 * released by the caller when the run ends.
 */
export interface QueryCapability {
  readonly capabilities: DialectCapabilities;
  sampleRows(table: string, columns: string[], limit: number): Promise<Row[]>;
  countOrphans(probe: OrphanProbe, sampleLimit: number): Promise<OrphanResult>;
  isCdcEnabled(table: string): Promise<boolean>;
}

export interface MetadataProvider {
  getTables(schema: string): Promise<TableFact[]>;
  getServerTimezone(): Promise<string>;
}

export interface StatisticsSampler {
  getColumnStats(table: string, column: string, type: string): Promise<ColumnStats>;
}

export type TableSizeReading = {
  table: string;
  schema: string;
  size_bytes: number;
  row_count: number;
  avg_row_size_bytes: number | null;
  inserts: number;
  updates: number;
  deletes: number;
};

export interface SizeCollector {
  collectTableSizes(schema: string): Promise<TableSizeReading[]>;
  collectGrowthHistory(table: string, column: string, sinceMonths: number): Promise<GrowthHistoryPoint[]>;
}

export interface SourceConnection extends QueryCapability, MetadataProvider, StatisticsSampler, SizeCollector {
  readonly dbType: DbType;
  readonly schema: string;
  close(): Promise<void>;
}

export type SourceOptions = {
  dbType: DbType;
  connectionString: string;
  schema?: string;
  queryTimeoutMs?: number;
};
