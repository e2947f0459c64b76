import { Client } from 'pg';
import type { Row, TableFact } from '../types/quality';
import type { DialectCapabilities, SourceConnection, SourceOptions, TableSizeReading } from './types';
import {
  CAPABILITIES,
  buildDistinctQuery,
  buildOrphanQueries,
  buildSampleQuery,
  buildStatsQuery,
  quoteIdent,
  quoteTable,
  SAMPLE_DISTINCT_LIMIT,
  toColumnStats
} from './sql';
import {
  addChecked,
  addForeignKey,
  addPrimaryKey,
  addUnique,
  assembleTables,
  cumulativeHistory,
  emptyKeyFacts,
  text
} from './catalog';
import type { KeyFacts, RawColumn } from './catalog';
import { ConnectivityError, classifyDriverError, getErrorMessage } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { toNumber } from '../utils/stats';

const log = createChildLogger('source:postgres');

// Per-row overhead: 23-byte tuple header padded to 24, plus a 4-byte line pointer.
const TUPLE_OVERHEAD_BYTES = 28;

const COLUMNS_SQL = `
  SELECT c.table_name, c.column_name, c.data_type, c.udt_name, c.is_nullable
  FROM information_schema.columns c
  JOIN information_schema.tables t
    ON t.table_schema = c.table_schema AND t.table_name = c.table_name
  WHERE c.table_schema = $1 AND t.table_type = 'BASE TABLE'
  ORDER BY c.table_name, c.ordinal_position`;

const KEYS_SQL = `
  SELECT tc.table_name, tc.constraint_type, kcu.column_name,
         ccu.table_name AS ref_table, ccu.column_name AS ref_column
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON kcu.constraint_name = tc.constraint_name AND kcu.table_schema = tc.table_schema
  LEFT JOIN information_schema.constraint_column_usage ccu
    ON tc.constraint_type = 'FOREIGN KEY'
   AND ccu.constraint_name = tc.constraint_name AND ccu.constraint_schema = tc.constraint_schema
  WHERE tc.table_schema = $1 AND tc.constraint_type IN ('PRIMARY KEY', 'FOREIGN KEY', 'UNIQUE')
  ORDER BY tc.table_name, kcu.ordinal_position`;

// Single-column UNIQUE constraints only; composite keys do not make a column unique.
const UNIQUE_COUNT_SQL = `
  SELECT tc.constraint_name, COUNT(*) AS n
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON kcu.constraint_name = tc.constraint_name AND kcu.table_schema = tc.table_schema
  WHERE tc.table_schema = $1 AND tc.constraint_type = 'UNIQUE'
  GROUP BY tc.constraint_name`;

const UNIQUE_SQL = `
  SELECT tc.constraint_name, kcu.table_name, kcu.column_name
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON kcu.constraint_name = tc.constraint_name AND kcu.table_schema = tc.table_schema
  WHERE tc.table_schema = $1 AND tc.constraint_type = 'UNIQUE'`;

const CHECKS_SQL = `
  SELECT DISTINCT ccu.table_name, ccu.column_name
  FROM information_schema.table_constraints tc
  JOIN information_schema.constraint_column_usage ccu
    ON ccu.constraint_name = tc.constraint_name AND ccu.constraint_schema = tc.constraint_schema
  WHERE tc.table_schema = $1 AND tc.constraint_type = 'CHECK'`;

const ENUMS_SQL = `
  SELECT t.typname, e.enumlabel
  FROM pg_type t
  JOIN pg_enum e ON e.enumtypid = t.oid
  ORDER BY t.typname, e.enumsortorder`;

const SIZES_SQL = `
  SELECT c.relname AS table_name,
         pg_total_relation_size(c.oid) AS size_bytes,
         COALESCE(s.n_tup_ins, 0) AS inserts,
         COALESCE(s.n_tup_upd, 0) AS updates,
         COALESCE(s.n_tup_del, 0) AS deletes,
         (SELECT SUM(st.avg_width) FROM pg_stats st
           WHERE st.schemaname = n.nspname AND st.tablename = c.relname) AS avg_width
  FROM pg_class c
  JOIN pg_namespace n ON n.oid = c.relnamespace
  LEFT JOIN pg_stat_user_tables s ON s.relid = c.oid
  WHERE n.nspname = $1 AND c.relkind IN ('r', 'p')
  ORDER BY c.relname`;

const CDC_SQL = `
  SELECT c.relreplident
  FROM pg_class c
  JOIN pg_namespace n ON n.oid = c.relnamespace
  WHERE n.nspname = $1 AND c.relname = $2`;

export const connectPostgres = async (options: SourceOptions): Promise<SourceConnection> => {
  const timeout = options.queryTimeoutMs ?? 0;
  const client = new Client({
    connectionString: options.connectionString,
    connectionTimeoutMillis: 10_000,
    ...(timeout > 0 ? { statement_timeout: timeout } : {})
  });
  try {
    await client.connect();
  } catch (err) {
    throw new ConnectivityError(`Could not connect to postgres: ${getErrorMessage(err)}`, err);
  }
  client.on('error', err => log.error({ err: getErrorMessage(err) }, 'Postgres client error'));

  const schema = options.schema ?? 'public';
  const capabilities: DialectCapabilities = { ...CAPABILITIES.postgres };

  const query = async (sql: string, params: unknown[], context: string): Promise<Row[]> => {
    try {
      const res = await client.query<Row>(sql, params);
      return res.rows;
    } catch (err) {
      throw classifyDriverError(err, context);
    }
  };

  const loadKeys = async (target: string): Promise<KeyFacts> => {
    const facts = emptyKeyFacts();
    const [keys, uniqueCounts, unique, checks] = [
      await query(KEYS_SQL, [target], 'key constraints'),
      await query(UNIQUE_COUNT_SQL, [target], 'unique constraints'),
      await query(UNIQUE_SQL, [target], 'unique constraints'),
      await query(CHECKS_SQL, [target], 'check constraints')
    ];
    for (const row of keys) {
      const table = text(row.table_name);
      const column = text(row.column_name);
      if (row.constraint_type === 'PRIMARY KEY') addPrimaryKey(facts, table, column);
      if (row.constraint_type === 'FOREIGN KEY' && row.ref_table) {
        addForeignKey(facts, table, { column, ref_table: text(row.ref_table), ref_column: text(row.ref_column) });
      }
    }
    const singleColumn = new Set(uniqueCounts.filter(r => toNumber(r.n) === 1).map(r => text(r.constraint_name)));
    for (const row of unique) {
      if (singleColumn.has(text(row.constraint_name))) addUnique(facts, text(row.table_name), text(row.column_name));
    }
    for (const row of checks) addChecked(facts, text(row.table_name), text(row.column_name));
    return facts;
  };

  const loadEnums = async () => {
    const enums = new Map<string, string[]>();
    for (const row of await query(ENUMS_SQL, [], 'enum types')) {
      const name = text(row.typname);
      enums.set(name, [...(enums.get(name) ?? []), text(row.enumlabel)]);
    }
    return enums;
  };

  const countRows = async (target: string, table: string) => {
    const rows = await query(`SELECT COUNT(*) AS n FROM ${quoteTable('postgres', target, table)}`, [], `row count ${table}`);
    return toNumber(rows[0]?.n) ?? 0;
  };

  return {
    dbType: 'postgres',
    schema,
    capabilities,

    async getTables(target: string): Promise<TableFact[]> {
      const columnRows = await query(COLUMNS_SQL, [target], 'column metadata');

      let facts = emptyKeyFacts();
      let enums = new Map<string, string[]>();
      try {
        facts = await loadKeys(target);
        enums = await loadEnums();
      } catch (err) {
        if (err instanceof ConnectivityError) throw err;
        capabilities.supportsConstraintIntrospection = false;
        log.warn({ schema: target, err: getErrorMessage(err) }, 'Constraint introspection unavailable');
      }

      const columns: RawColumn[] = columnRows.map(row => {
        const dataType = text(row.data_type);
        const udt = text(row.udt_name);
        return {
          table: text(row.table_name),
          name: text(row.column_name),
          type: dataType === 'USER-DEFINED' ? udt : dataType,
          nullable: row.is_nullable === 'YES',
          enum_values: enums.get(udt) ?? null
        };
      });

      const rowCounts = new Map<string, number>();
      for (const table of new Set(columns.map(c => c.table))) {
        rowCounts.set(table, await countRows(target, table));
      }
      return assembleTables(target, columns, facts, rowCounts);
    },

    async getServerTimezone() {
      const rows = await query('SHOW timezone', [], 'server timezone');
      return text(rows[0]?.TimeZone ?? rows[0]?.timezone);
    },

    async getColumnStats(table, column, type) {
      const [stats] = await query(buildStatsQuery('postgres', schema, table, column, type), [], `stats ${table}.${column}`);
      const cardinality = toNumber(stats?.cardinality);
      const distinct =
        cardinality !== null && cardinality <= SAMPLE_DISTINCT_LIMIT
          ? await query(buildDistinctQuery('postgres', schema, table, column), [], `distinct ${table}.${column}`)
          : [];
      return toColumnStats(stats, distinct);
    },

    sampleRows(table, columns, limit) {
      return query(buildSampleQuery('postgres', schema, table, columns, limit), [], `sample ${table}`);
    },

    async countOrphans(probe, sampleLimit) {
      const sql = buildOrphanQueries('postgres', schema, probe, sampleLimit);
      const [count] = await query(sql.count, [], `orphans ${probe.table}.${probe.column}`);
      const orphans = toNumber(count?.orphan_count) ?? 0;
      const sample = orphans > 0 ? await query(sql.sample, [], `orphan sample ${probe.table}.${probe.column}`) : [];
      return { count: orphans, sample: sample.map(r => text(r.value)) };
    },

    async isCdcEnabled(table) {
      const rows = await query(CDC_SQL, [schema, table], `replica identity ${table}`);
      const identity = text(rows[0]?.relreplident);
      return identity === 'f' || identity === 'i';
    },

    async collectTableSizes(target): Promise<TableSizeReading[]> {
      const rows = await query(SIZES_SQL, [target], 'table sizes');
      const readings: TableSizeReading[] = [];
      for (const row of rows) {
        const table = text(row.table_name);
        const width = toNumber(row.avg_width);
        readings.push({
          table,
          schema: target,
          size_bytes: toNumber(row.size_bytes) ?? 0,
          row_count: await countRows(target, table),
          avg_row_size_bytes: width === null ? null : width + TUPLE_OVERHEAD_BYTES,
          inserts: toNumber(row.inserts) ?? 0,
          updates: toNumber(row.updates) ?? 0,
          deletes: toNumber(row.deletes) ?? 0
        });
      }
      return readings;
    },

    async collectGrowthHistory(table, column, sinceMonths) {
      const tbl = quoteTable('postgres', schema, table);
      const col = quoteIdent('postgres', column);
      const cutoff = `date_trunc('month', now()) - make_interval(months => $1::int)`;
      const [base] = await query(`SELECT COUNT(*) AS n FROM ${tbl} WHERE ${col} < ${cutoff}`, [sinceMonths], `growth baseline ${table}`);
      const monthly = await query(
        `SELECT to_char(date_trunc('month', ${col}), 'YYYY-MM') AS month, COUNT(*) AS added
         FROM ${tbl} WHERE ${col} >= ${cutoff}
         GROUP BY 1 ORDER BY 1`,
        [sinceMonths],
        `growth history ${table}`
      );
      return cumulativeHistory(
        table,
        toNumber(base?.n) ?? 0,
        monthly.map(r => ({ month: text(r.month), added: toNumber(r.added) ?? 0 }))
      );
    },

    async close() {
      await client.end();
    }
  };
};
