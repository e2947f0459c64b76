import mysql from 'mysql2/promise';
import type { Connection, RowDataPacket } from 'mysql2/promise';
import type { Row, TableFact } from '../types/quality';
import type { DialectCapabilities, SourceConnection, SourceOptions, TableSizeReading } from './types';
import {
  CAPABILITIES,
  SAMPLE_DISTINCT_LIMIT,
  buildDistinctQuery,
  buildOrphanQueries,
  buildSampleQuery,
  buildStatsQuery,
  checkConstrainedColumns,
  parseEnumValues,
  quoteIdent,
  quoteTable,
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

const log = createChildLogger('source:mysql');

const COLUMNS_SQL = `
  SELECT c.TABLE_NAME AS table_name, c.COLUMN_NAME AS column_name, c.DATA_TYPE AS data_type,
         c.COLUMN_TYPE AS column_type, c.IS_NULLABLE AS is_nullable, c.COLUMN_KEY AS column_key
  FROM information_schema.COLUMNS c
  JOIN information_schema.TABLES t
    ON t.TABLE_SCHEMA = c.TABLE_SCHEMA AND t.TABLE_NAME = c.TABLE_NAME
  WHERE c.TABLE_SCHEMA = ? AND t.TABLE_TYPE = 'BASE TABLE'
  ORDER BY c.TABLE_NAME, c.ORDINAL_POSITION`;

const FOREIGN_KEYS_SQL = `
  SELECT TABLE_NAME AS table_name, COLUMN_NAME AS column_name,
         REFERENCED_TABLE_NAME AS ref_table, REFERENCED_COLUMN_NAME AS ref_column
  FROM information_schema.KEY_COLUMN_USAGE
  WHERE TABLE_SCHEMA = ? AND REFERENCED_TABLE_NAME IS NOT NULL`;

// Available from MySQL 8.0.16
const CHECKS_SQL = `
  SELECT tc.TABLE_NAME AS table_name, cc.CHECK_CLAUSE AS check_clause
  FROM information_schema.TABLE_CONSTRAINTS tc
  JOIN information_schema.CHECK_CONSTRAINTS cc
    ON cc.CONSTRAINT_SCHEMA = tc.CONSTRAINT_SCHEMA AND cc.CONSTRAINT_NAME = tc.CONSTRAINT_NAME
  WHERE tc.TABLE_SCHEMA = ? AND tc.CONSTRAINT_TYPE = 'CHECK'`;

const SIZES_SQL = `
  SELECT TABLE_NAME AS table_name, DATA_LENGTH + INDEX_LENGTH AS size_bytes, AVG_ROW_LENGTH AS avg_row_length
  FROM information_schema.TABLES
  WHERE TABLE_SCHEMA = ? AND TABLE_TYPE = 'BASE TABLE'
  ORDER BY TABLE_NAME`;

const databaseFromUrl = (connectionString: string) => {
  try {
    return decodeURIComponent(new URL(connectionString).pathname.replace(/^\//, ''));
  } catch {
    return '';
  }
};

export const connectMySQL = async (options: SourceOptions): Promise<SourceConnection> => {
  let conn: Connection;
  try {
    conn = await mysql.createConnection({ uri: options.connectionString, connectTimeout: 10_000 });
  } catch (err) {
    throw new ConnectivityError(`Could not connect to mysql: ${getErrorMessage(err)}`, err);
  }

  const timeout = options.queryTimeoutMs && options.queryTimeoutMs > 0 ? options.queryTimeoutMs : undefined;
  const capabilities: DialectCapabilities = { ...CAPABILITIES.mysql };

  const query = async (sql: string, values: unknown[], context: string): Promise<Row[]> => {
    try {
      const [rows] = await conn.query<RowDataPacket[]>({ sql, values, timeout });
      return rows;
    } catch (err) {
      throw classifyDriverError(err, context);
    }
  };

  let schema = options.schema ?? databaseFromUrl(options.connectionString);
  if (!schema) {
    const [row] = await query('SELECT DATABASE() AS db', [], 'current database');
    schema = text(row?.db);
  }

  // Primary and unique keys come with the column rows; only references and checks need extra queries.
  const columnKeys = (keyRows: Row[]): KeyFacts => {
    const facts = emptyKeyFacts();
    for (const row of keyRows) {
      if (row.column_key === 'PRI') addPrimaryKey(facts, text(row.table_name), text(row.column_name));
      if (row.column_key === 'UNI') addUnique(facts, text(row.table_name), text(row.column_name));
    }
    return facts;
  };

  const loadReferences = async (facts: KeyFacts, target: string, columns: RawColumn[]) => {
    for (const row of await query(FOREIGN_KEYS_SQL, [target], 'foreign keys')) {
      addForeignKey(facts, text(row.table_name), {
        column: text(row.column_name),
        ref_table: text(row.ref_table),
        ref_column: text(row.ref_column)
      });
    }
    for (const row of await query(CHECKS_SQL, [target], 'check constraints')) {
      const table = text(row.table_name);
      const names = columns.filter(c => c.table === table).map(c => c.name);
      for (const column of checkConstrainedColumns(text(row.check_clause), names)) addChecked(facts, table, column);
    }
  };

  const countRows = async (target: string, table: string) => {
    const [row] = await query(`SELECT COUNT(*) AS n FROM ${quoteTable('mysql', target, table)}`, [], `row count ${table}`);
    return toNumber(row?.n) ?? 0;
  };

  return {
    dbType: 'mysql',
    schema,
    capabilities,

    async getTables(target: string): Promise<TableFact[]> {
      const columnRows = await query(COLUMNS_SQL, [target], 'column metadata');
      const columns: RawColumn[] = columnRows.map(row => ({
        table: text(row.table_name),
        name: text(row.column_name),
        type: text(row.data_type),
        nullable: row.is_nullable === 'YES',
        enum_values: text(row.data_type).toLowerCase() === 'enum' ? parseEnumValues(text(row.column_type)) : null
      }));

      const facts = columnKeys(columnRows);
      try {
        await loadReferences(facts, target, columns);
      } catch (err) {
        if (err instanceof ConnectivityError) throw err;
        capabilities.supportsConstraintIntrospection = false;
        log.warn({ schema: target, err: getErrorMessage(err) }, 'Constraint introspection unavailable');
      }

      const rowCounts = new Map<string, number>();
      for (const table of new Set(columns.map(c => c.table))) {
        rowCounts.set(table, await countRows(target, table));
      }
      return assembleTables(target, columns, facts, rowCounts);
    },

    async getServerTimezone() {
      const [row] = await query(
        'SELECT @@session.time_zone AS session_tz, @@system_time_zone AS system_tz',
        [],
        'server timezone'
      );
      const session = text(row?.session_tz);
      return session === 'SYSTEM' ? text(row?.system_tz) : session;
    },

    async getColumnStats(table, column, type) {
      const [stats] = await query(buildStatsQuery('mysql', schema, table, column, type), [], `stats ${table}.${column}`);
      const cardinality = toNumber(stats?.cardinality);
      const distinct =
        cardinality !== null && cardinality <= SAMPLE_DISTINCT_LIMIT
          ? await query(buildDistinctQuery('mysql', schema, table, column), [], `distinct ${table}.${column}`)
          : [];
      return toColumnStats(stats, distinct);
    },

    sampleRows(table, columns, limit) {
      return query(buildSampleQuery('mysql', schema, table, columns, limit), [], `sample ${table}`);
    },

    async countOrphans(probe, sampleLimit) {
      const sql = buildOrphanQueries('mysql', schema, probe, sampleLimit);
      const [count] = await query(sql.count, [], `orphans ${probe.table}.${probe.column}`);
      const orphans = toNumber(count?.orphan_count) ?? 0;
      const sample = orphans > 0 ? await query(sql.sample, [], `orphan sample ${probe.table}.${probe.column}`) : [];
      return { count: orphans, sample: sample.map(r => text(r.value)) };
    },

    // Binlog capture is server-wide and not visible per table.
    async isCdcEnabled() {
      return false;
    },

    async collectTableSizes(target): Promise<TableSizeReading[]> {
      const readings: TableSizeReading[] = [];
      for (const row of await query(SIZES_SQL, [target], 'table sizes')) {
        const table = text(row.table_name);
        const avg = toNumber(row.avg_row_length);
        readings.push({
          table,
          schema: target,
          size_bytes: toNumber(row.size_bytes) ?? 0,
          row_count: await countRows(target, table),
          avg_row_size_bytes: avg && avg > 0 ? avg : null,
          inserts: 0,
          updates: 0,
          deletes: 0
        });
      }
      return readings;
    },

    async collectGrowthHistory(table, column, sinceMonths) {
      const tbl = quoteTable('mysql', schema, table);
      const col = quoteIdent('mysql', column);
      const cutoff = `DATE_SUB(DATE_FORMAT(NOW(), '%Y-%m-01'), INTERVAL ? MONTH)`;
      const [base] = await query(`SELECT COUNT(*) AS n FROM ${tbl} WHERE ${col} < ${cutoff}`, [sinceMonths], `growth baseline ${table}`);
      const monthly = await query(
        `SELECT DATE_FORMAT(${col}, '%Y-%m') AS month, COUNT(*) AS added
         FROM ${tbl} WHERE ${col} >= ${cutoff}
         GROUP BY month ORDER BY month`,
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
      await conn.end();
    }
  };
};
