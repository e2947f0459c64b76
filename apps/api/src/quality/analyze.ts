import type { CheckNote, ColumnFact, Report, TableFact, TableRunResult } from '../types/quality';
import type { SourceConnection } from '../sources/types';
import { aggregate } from './aggregate';
import { runChecks } from './engine';
import type { EngineOptions } from './engine';
import { resolvePatterns } from './patterns';
import { UNKNOWN_TIMEZONE, databaseTimezones } from './checks/timezone';
import { ConnectivityError, getErrorMessage, noteReasonFor } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('quality');

export type AnalyzeOptions = Omit<EngineOptions, 'catalog' | 'serverTimezone'> & {
  schema?: string;
  target?: string;
  generatedAt?: Date;
};

const rethrowConnectivity = (err: unknown) => {
  if (err instanceof ConnectivityError) throw err;
};

const loadServerTimezone = async (source: SourceConnection) => {
  if (!source.capabilities.supportsServerTimezone) return UNKNOWN_TIMEZONE;
  try {
    return (await source.getServerTimezone()) || UNKNOWN_TIMEZONE;
  } catch (err) {
    rethrowConnectivity(err);
    log.warn({ err: getErrorMessage(err) }, 'Could not read server timezone');
    return UNKNOWN_TIMEZONE;
  }
};

const enrichColumns = async (source: SourceConnection, table: TableFact, notes: CheckNote[]) => {
  const columns: ColumnFact[] = [];
  for (const column of table.columns) {
    if (table.row_count === 0) {
      columns.push({ ...column, cardinality: 0, null_count: 0 });
      continue;
    }
    try {
      const stats = await source.getColumnStats(table.name, column.name, column.type);
      columns.push({ ...column, ...stats });
    } catch (err) {
      rethrowConnectivity(err);
      notes.push({ check: 'statistics', reason: 'failed', message: `${column.name}: ${getErrorMessage(err)}` });
      columns.push(column);
    }
  }
  return { ...table, columns };
};

/**
 * One full quality run against an open source. Only connectivity failures
 * escape; everything else degrades to empty results plus notes.
 */
export const analyzeSource = async (source: SourceConnection, options: AnalyzeOptions = {}): Promise<Report> => {
  const schema = options.schema ?? source.schema;
  log.info({ schema, dialect: source.dbType }, 'Starting data quality analysis');

  const runNotes: CheckNote[] = [];
  let tables: TableFact[] = [];
  try {
    tables = await source.getTables(schema);
  } catch (err) {
    rethrowConnectivity(err);
    runNotes.push({
      check: 'metadata',
      reason: noteReasonFor(err),
      message: `Could not list tables in ${schema}: ${getErrorMessage(err)}`
    });
    log.warn({ schema, err: getErrorMessage(err) }, 'Could not list tables');
  }

  const serverTimezone = await loadServerTimezone(source);

  const statNotes = new Map<string, CheckNote[]>();
  const catalog: TableFact[] = [];
  for (const table of tables) {
    const notes: CheckNote[] = [];
    catalog.push(await enrichColumns(source, table, notes));
    statNotes.set(table.name, notes);
  }

  const perTable: TableRunResult[] = [];
  for (const [index, table] of catalog.entries()) {
    log.info({ table: table.name }, `Table ${index + 1}/${catalog.length}`);
    const result = await runChecks(table, source, { ...options, catalog, serverTimezone });
    perTable.push({ ...result, notes: [...(statNotes.get(table.name) ?? []), ...result.notes] });
  }

  const report = aggregate(perTable, {
    dialect: source.dbType,
    schema,
    connection: { db_type: source.dbType, target: options.target ?? '', server_timezone: serverTimezone },
    databaseTimezones: databaseTimezones(catalog, serverTimezone, resolvePatterns(options.patterns)),
    generatedAt: options.generatedAt,
    notes: runNotes
  });

  const { critical, warning, info } = report.data_quality_summary;
  log.info(
    { tables: report.metadata.total_tables_analyzed, findings: report.metadata.total_findings, critical, warning, info },
    'Data quality analysis complete'
  );
  return report;
};
