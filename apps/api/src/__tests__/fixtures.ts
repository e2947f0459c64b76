import type { CheckKind, CheckNote, ColumnFact, Row, TableFact } from '../types/quality';
import type { DialectCapabilities, OrphanProbe, OrphanResult, QueryCapability } from '../sources/types';
import type { CheckContext } from '../quality/checks';
import { CAPABILITIES } from '../sources/sql';
import { resolvePatterns } from '../quality/patterns';
import { resolveThresholds } from '../quality/severity';

export const column = (table: string, name: string, overrides: Partial<ColumnFact> = {}): ColumnFact => ({
  table,
  name,
  type: 'text',
  nullable: true,
  is_unique: false,
  has_check_constraint: false,
  enum_values: null,
  detected_timezone: null,
  cardinality: null,
  null_count: null,
  distinct_values: [],
  min: null,
  max: null,
  ...overrides
});

export const table = (name: string, columns: ColumnFact[], overrides: Partial<TableFact> = {}): TableFact => ({
  schema: 'public',
  name,
  row_count: 100,
  primary_keys: ['id'],
  foreign_keys: [],
  columns,
  ...overrides
});

export type FakeQueryOptions = {
  capabilities?: Partial<DialectCapabilities>;
  rows?: Record<string, Row[]>;
  orphans?: (probe: OrphanProbe) => OrphanResult;
  cdc?: boolean;
};

/** In-memory query capability: rows keyed by table, filtered to non-null requested columns. */
export const fakeQuery = (options: FakeQueryOptions = {}): QueryCapability & { probes: OrphanProbe[] } => {
  const probes: OrphanProbe[] = [];
  return {
    probes,
    capabilities: { ...CAPABILITIES.postgres, ...options.capabilities },
    async sampleRows(tableName, columns, limit) {
      return (options.rows?.[tableName] ?? [])
        .filter(r => columns.every(c => r[c] !== null && r[c] !== undefined))
        .slice(0, limit);
    },
    async countOrphans(probe, sampleLimit) {
      probes.push(probe);
      const result = options.orphans?.(probe) ?? { count: 0, sample: [] };
      return { count: result.count, sample: result.sample.slice(0, sampleLimit) };
    },
    async isCdcEnabled() {
      return options.cdc ?? false;
    }
  };
};

export const checkContext = (
  target: TableFact,
  query: QueryCapability = fakeQuery(),
  overrides: { catalog?: TableFact[]; serverTimezone?: string; kind?: CheckKind } = {}
): CheckContext & { notes: CheckNote[] } => {
  const notes: CheckNote[] = [];
  return {
    notes,
    table: target,
    catalog: overrides.catalog ?? [target],
    query,
    patterns: resolvePatterns(),
    thresholds: resolveThresholds(),
    serverTimezone: overrides.serverTimezone ?? 'UTC',
    note: (reason, message) => notes.push({ check: overrides.kind ?? 'missing_foreign_key', reason, message })
  };
};
