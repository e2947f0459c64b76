import type { ColumnFact, FindingOf, TableFact, TimezoneColumn } from '../../types/quality';
import type { PatternConfig } from '../patterns';
import { recommend, severityPolicy } from '../severity';
import type { CheckContext } from './types';

export const UNKNOWN_TIMEZONE = 'unknown';

export const isTzAware = (type: string, patterns: PatternConfig) =>
  patterns.tzAwareTypes.some(t => type.toLowerCase().includes(t));

/**
 * Effective timezone of a date/time column, or null for anything that does
 * not carry a time of day. Naive columns are labelled with the server zone
 * they are implicitly stored in, so they never merge with offset-aware UTC.
 */
export const effectiveTimezone = (column: ColumnFact, serverTimezone: string, patterns: PatternConfig) => {
  if (column.detected_timezone) return column.detected_timezone;
  const type = column.type.toLowerCase().trim();
  if (!patterns.datetimeKeywords.some(k => type.includes(k))) return null;
  if (type === 'date') return null;
  if (isTzAware(type, patterns)) return 'UTC';
  return serverTimezone === UNKNOWN_TIMEZONE ? UNKNOWN_TIMEZONE : `${serverTimezone} (naive)`;
};

export const tableTimezoneColumns = (table: TableFact, serverTimezone: string, patterns: PatternConfig) => {
  const columns: TimezoneColumn[] = [];
  for (const col of table.columns) {
    const tz = effectiveTimezone(col, serverTimezone, patterns);
    if (tz === null) continue;
    columns.push({
      column: col.name,
      type: col.type,
      effective_timezone: tz,
      is_tz_aware: isTzAware(col.type, patterns)
    });
  }
  return columns;
};

export const databaseTimezones = (catalog: TableFact[], serverTimezone: string, patterns: PatternConfig) => {
  const all = new Set<string>();
  for (const table of catalog) {
    tableTimezoneColumns(table, serverTimezone, patterns).forEach(c => all.add(c.effective_timezone));
  }
  return Array.from(all).sort();
};

export const checkTimezone = async ({ table, catalog, patterns, serverTimezone }: CheckContext) => {
  const findings: FindingOf<'timezone'>[] = [];
  const columns = tableTimezoneColumns(table, serverTimezone, patterns);
  if (!columns.length) return findings;

  const distinct = Array.from(new Set(columns.map(c => c.effective_timezone))).sort();
  const database = databaseTimezones(catalog.some(t => t.name === table.name) ? catalog : [...catalog, table], serverTimezone, patterns);
  const awareCount = columns.filter(c => c.is_tz_aware).length;
  const naiveCount = columns.length - awareCount;
  const severity = severityPolicy.timezone(distinct.length, database.length);

  let detail: string;
  if (distinct.length > 1) {
    detail =
      `Mixed timezones within table: date/time columns use ${distinct.join(', ')}. ` +
      `${awareCount} TZ-aware column(s), ${naiveCount} TZ-naive column(s).`;
  } else if (database.length > 1) {
    detail = `All ${columns.length} date/time column(s) use '${distinct[0]}', but the database mixes ${database.join(', ')}.`;
  } else {
    detail = `All ${columns.length} date/time column(s) use '${distinct[0]}'. ${awareCount} TZ-aware, ${naiveCount} TZ-naive.`;
  }

  findings.push({
    table: table.name,
    column: null,
    check: 'timezone',
    severity,
    detail,
    recommendation: recommend.timezone(severity === 'warning', distinct),
    evidence: {
      server_timezone: serverTimezone,
      columns,
      distinct_timezones: distinct,
      database_timezones: database,
      tz_aware_count: awareCount,
      tz_naive_count: naiveCount
    }
  });

  return findings;
};
