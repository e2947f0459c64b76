import Database from 'better-sqlite3';
import type { Row, TableFact } from '../types/quality';
import type { DialectCapabilities, SourceConnection, SourceOptions } from './types';
import {
  CAPABILITIES,
  SAMPLE_DISTINCT_LIMIT,
  buildDistinctQuery,
  buildOrphanQueries,
  buildSampleQuery,
  buildStatsQuery,
  checkConstrainedColumns,
  quoteIdent,
  quoteTable,
  sqlitePath,
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
  rowsOf,
  text
} from './catalog';
import type { RawColumn } from './catalog';
import { AnalyzerError, ConnectivityError, classifyDriverError, getErrorMessage } from '../utils/errors';
import { toNumber } from '../utils/stats';

const TABLES_SQL = "SELECT name, sql FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name";

/**
 * Opens a SQLite file read-only. An already-open handle may be passed in,
 * in which case the caller keeps ownership and `close` leaves it open.
 */
export const connectSqlite = async (options: SourceOptions, handle?: Database.Database): Promise<SourceConnection> => {
  let db: Database.Database;
  if (handle) {
    db = handle;
  } else {
    try {
      db = new Database(sqlitePath(options.connectionString), { readonly: true, fileMustExist: true });
    } catch (err) {
      throw new ConnectivityError(`Could not open sqlite database: ${getErrorMessage(err)}`, err);
    }
  }

  const capabilities: DialectCapabilities = { ...CAPABILITIES.sqlite };
  const schema = 'main';

  const all = async (sql: string, params: unknown[], context: string): Promise<Row[]> => {
    try {
      return rowsOf(db.prepare(sql).all(...params));
    } catch (err) {
      throw classifyDriverError(err, context);
    }
  };
  const pragma = (name: string, arg: string, context: string) => all(`PRAGMA ${name}(${quoteIdent('sqlite', arg)})`, [], context);

  return {
    dbType: 'sqlite',
    schema,
    capabilities,

    async getTables(): Promise<TableFact[]> {
      const facts = emptyKeyFacts();
      const columns: RawColumn[] = [];
      const rowCounts = new Map<string, number>();
      const pendingRefs: Array<{ table: string; column: string; refTable: string; refColumn: string | null }> = [];

      for (const tableRow of await all(TABLES_SQL, [], 'table list')) {
        const table = text(tableRow.name);
        const info = await pragma('table_info', table, `columns ${table}`);
        const names = info.map(c => text(c.name));

        for (const col of info) {
          const pk = toNumber(col.pk) ?? 0;
          columns.push({
            table,
            name: text(col.name),
            type: text(col.type),
            nullable: toNumber(col.notnull) === 0 && pk === 0
          });
        }
        info
          .filter(c => (toNumber(c.pk) ?? 0) > 0)
          .sort((a, b) => (toNumber(a.pk) ?? 0) - (toNumber(b.pk) ?? 0))
          .forEach(c => addPrimaryKey(facts, table, text(c.name)));

        for (const fk of await pragma('foreign_key_list', table, `foreign keys ${table}`)) {
          pendingRefs.push({
            table,
            column: text(fk.from),
            refTable: text(fk.table),
            refColumn: fk.to === null || fk.to === undefined ? null : text(fk.to)
          });
        }

        for (const index of await pragma('index_list', table, `indexes ${table}`)) {
          if (toNumber(index.unique) !== 1 || index.origin === 'pk') continue;
          const parts = await pragma('index_info', text(index.name), `index ${text(index.name)}`);
          if (parts.length === 1) addUnique(facts, table, text(parts[0].name));
        }

        for (const column of checkConstrainedColumns(text(tableRow.sql), names)) addChecked(facts, table, column);

        const [count] = await all(`SELECT COUNT(*) AS n FROM ${quoteTable('sqlite', schema, table)}`, [], `row count ${table}`);
        rowCounts.set(table, toNumber(count?.n) ?? 0);
      }

      // A bare REFERENCES clause points at the referenced table's primary key.
      for (const ref of pendingRefs) {
        const refColumn = ref.refColumn ?? facts.primaryKeys.get(ref.refTable)?.[0] ?? '';
        addForeignKey(facts, ref.table, { column: ref.column, ref_table: ref.refTable, ref_column: refColumn });
      }

      return assembleTables(schema, columns, facts, rowCounts);
    },

    async getServerTimezone() {
      throw new AnalyzerError('SQLite has no server timezone');
    },

    async getColumnStats(table, column, type) {
      const [stats] = await all(buildStatsQuery('sqlite', schema, table, column, type), [], `stats ${table}.${column}`);
      const cardinality = toNumber(stats?.cardinality);
      const distinct =
        cardinality !== null && cardinality <= SAMPLE_DISTINCT_LIMIT
          ? await all(buildDistinctQuery('sqlite', schema, table, column), [], `distinct ${table}.${column}`)
          : [];
      return toColumnStats(stats, distinct);
    },

    sampleRows(table, columns, limit) {
      return all(buildSampleQuery('sqlite', schema, table, columns, limit), [], `sample ${table}`);
    },

    async countOrphans(probe, sampleLimit) {
      const sql = buildOrphanQueries('sqlite', schema, probe, sampleLimit);
      const [count] = await all(sql.count, [], `orphans ${probe.table}.${probe.column}`);
      const orphans = toNumber(count?.orphan_count) ?? 0;
      const sample = orphans > 0 ? await all(sql.sample, [], `orphan sample ${probe.table}.${probe.column}`) : [];
      return { count: orphans, sample: sample.map(r => text(r.value)) };
    },

    async isCdcEnabled() {
      return false;
    },

    async collectTableSizes() {
      throw new AnalyzerError('Size snapshots are not supported for sqlite sources');
    },

    async collectGrowthHistory(table, column, sinceMonths) {
      const tbl = quoteTable('sqlite', schema, table);
      const col = quoteIdent('sqlite', column);
      const cutoff = `date('now', 'start of month', '-' || ? || ' months')`;
      const [base] = await all(`SELECT COUNT(*) AS n FROM ${tbl} WHERE ${col} < ${cutoff}`, [sinceMonths], `growth baseline ${table}`);
      const monthly = await all(
        `SELECT strftime('%Y-%m', ${col}) AS month, COUNT(*) AS added
         FROM ${tbl} WHERE ${col} >= ${cutoff}
         GROUP BY month ORDER BY month`,
        [sinceMonths],
        `growth history ${table}`
      );
      return cumulativeHistory(
        table,
        toNumber(base?.n) ?? 0,
        monthly.filter(r => r.month !== null).map(r => ({ month: text(r.month), added: toNumber(r.added) ?? 0 }))
      );
    },

    async close() {
      if (!handle) db.close();
    }
  };
};
