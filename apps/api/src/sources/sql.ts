import type { ColumnStats, Row } from '../types/quality';
import type { DbType, DialectCapabilities } from './types';
import { toNumber } from '../utils/stats';

export const SAMPLE_DISTINCT_LIMIT = 25;

export const CAPABILITIES: Record<DbType, DialectCapabilities> = {
  postgres: {
    supportsConstraintIntrospection: true,
    supportsOrphanDetection: true,
    supportsCdcIntrospection: true,
    supportsRowSampling: true,
    supportsServerTimezone: true,
    supportsSizeSnapshots: true,
    supportsChurnStatistics: true
  },
  mysql: {
    supportsConstraintIntrospection: true,
    supportsOrphanDetection: true,
    supportsCdcIntrospection: false,
    supportsRowSampling: true,
    supportsServerTimezone: true,
    supportsSizeSnapshots: true,
    supportsChurnStatistics: false
  },
  sqlite: {
    supportsConstraintIntrospection: true,
    supportsOrphanDetection: true,
    supportsCdcIntrospection: false,
    supportsRowSampling: true,
    supportsServerTimezone: false,
    supportsSizeSnapshots: false,
    supportsChurnStatistics: false
  }
};

// Types where MIN/MAX (and often DISTINCT) are unsupported or meaningless
const RANGE_SKIP = [
  'json', 'bytea', 'blob', 'xml', 'tsvector', 'tsquery', 'point', 'line', 'lseg',
  'box', 'path', 'polygon', 'circle', 'array', 'user-defined', 'bool', 'bit'
];
const DISTINCT_SKIP = ['json', 'xml', 'point', 'line', 'lseg', 'box', 'path', 'polygon', 'circle'];

export const supportsRange = (type: string) => !RANGE_SKIP.some(t => type.toLowerCase().includes(t));
export const supportsDistinct = (type: string) => {
  const t = type.toLowerCase();
  return t.includes('jsonb') || !DISTINCT_SKIP.some(s => t.includes(s));
};

export const quoteIdent = (dbType: DbType, name: string) =>
  dbType === 'mysql' ? `\`${name.replace(/`/g, '``')}\`` : `"${name.replace(/"/g, '""')}"`;

export const quoteTable = (dbType: DbType, schema: string, table: string) =>
  dbType === 'sqlite' ? quoteIdent(dbType, table) : `${quoteIdent(dbType, schema)}.${quoteIdent(dbType, table)}`;

const textCast = (dbType: DbType, expr: string) => {
  if (dbType === 'postgres') return `${expr}::text`;
  if (dbType === 'mysql') return `CAST(${expr} AS CHAR)`;
  return `CAST(${expr} AS TEXT)`;
};

/** Single-scan aggregate for cardinality, null count and range of one column. */
export const buildStatsQuery = (dbType: DbType, schema: string, table: string, column: string, type: string) => {
  const col = quoteIdent(dbType, column);
  const parts = [
    supportsDistinct(type) ? `COUNT(DISTINCT ${col}) AS cardinality` : 'NULL AS cardinality',
    `SUM(CASE WHEN ${col} IS NULL THEN 1 ELSE 0 END) AS null_count`
  ];
  if (supportsRange(type)) {
    parts.push(`${textCast(dbType, `MIN(${col})`)} AS min_value`, `${textCast(dbType, `MAX(${col})`)} AS max_value`);
  } else {
    parts.push('NULL AS min_value', 'NULL AS max_value');
  }
  return `SELECT ${parts.join(', ')} FROM ${quoteTable(dbType, schema, table)}`;
};

export const buildDistinctQuery = (dbType: DbType, schema: string, table: string, column: string) => {
  const col = quoteIdent(dbType, column);
  return (
    `SELECT DISTINCT ${textCast(dbType, col)} AS value FROM ${quoteTable(dbType, schema, table)} ` +
    `WHERE ${col} IS NOT NULL ORDER BY 1 LIMIT ${SAMPLE_DISTINCT_LIMIT}`
  );
};

/** Rows where every requested column is non-null. */
export const buildSampleQuery = (dbType: DbType, schema: string, table: string, columns: string[], limit: number) => {
  const cols = columns.map(c => quoteIdent(dbType, c));
  const where = cols.map(c => `${c} IS NOT NULL`).join(' AND ');
  return `SELECT ${cols.join(', ')} FROM ${quoteTable(dbType, schema, table)} WHERE ${where} LIMIT ${Math.max(1, Math.floor(limit))}`;
};

export const buildOrphanQueries = (
  dbType: DbType,
  schema: string,
  probe: { table: string; column: string; refTable: string; refColumn: string },
  sampleLimit: number
) => {
  const col = `s.${quoteIdent(dbType, probe.column)}`;
  const ref = `t.${quoteIdent(dbType, probe.refColumn)}`;
  const from =
    `FROM ${quoteTable(dbType, schema, probe.table)} s ` +
    `LEFT JOIN ${quoteTable(dbType, schema, probe.refTable)} t ON ${col} = ${ref} ` +
    `WHERE ${col} IS NOT NULL AND ${ref} IS NULL`;
  return {
    count: `SELECT COUNT(*) AS orphan_count ${from}`,
    sample: `SELECT DISTINCT ${textCast(dbType, col)} AS value ${from} ORDER BY 1 LIMIT ${Math.max(1, Math.floor(sampleLimit))}`
  };
};

const scalar = (value: unknown): string | number | null => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
};

export const toColumnStats = (row: Row | undefined, distinct: Row[]): ColumnStats => ({
  cardinality: toNumber(row?.cardinality),
  null_count: toNumber(row?.null_count),
  distinct_values: distinct.map(r => r.value).filter(v => v !== null && v !== undefined).map(v => String(v)),
  min: scalar(row?.min_value),
  max: scalar(row?.max_value)
});

/** Parses MySQL's `enum('a','b')` column type into its labels. */
export const parseEnumValues = (columnType: string) => {
  const match = /^enum\((.*)\)$/i.exec(columnType.trim());
  if (!match) return null;
  return Array.from(match[1].matchAll(/'((?:[^']|'')*)'/g), m => m[1].replace(/''/g, "'"));
};

/** Column names referenced inside CHECK (...) clauses of a CREATE TABLE statement. */
export const checkConstrainedColumns = (createSql: string, columns: string[]) => {
  const clauses: string[] = [];
  const re = /\bcheck\s*\(/gi;
  let match: RegExpExecArray | null;
  while ((match = re.exec(createSql)) !== null) {
    let depth = 1;
    let i = match.index + match[0].length;
    const start = i;
    while (i < createSql.length && depth > 0) {
      if (createSql[i] === '(') depth++;
      if (createSql[i] === ')') depth--;
      i++;
    }
    clauses.push(createSql.slice(start, i - 1));
  }
  const constrained = new Set<string>();
  for (const column of columns) {
    const escaped = column.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const word = new RegExp(`(^|[^\\w])["\`\\[]?${escaped}["\`\\]]?([^\\w]|$)`, 'i');
    if (clauses.some(clause => word.test(clause))) constrained.add(column);
  }
  return constrained;
};

export const sqlitePath = (connectionString: string) =>
  connectionString.replace(/^sqlite:(\/\/)?/, '').replace(/^file:/, '');

/** Host/database portion of a connection string, credentials removed. */
export const describeTarget = (dbType: DbType, connectionString: string) => {
  if (dbType === 'sqlite') return sqlitePath(connectionString);
  try {
    const url = new URL(connectionString);
    return `${url.hostname}${url.port ? `:${url.port}` : ''}${url.pathname}`;
  } catch {
    return connectionString.split('@').pop() ?? '';
  }
};
