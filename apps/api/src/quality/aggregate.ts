import { CHECK_KINDS } from '../types/quality';
import type {
  CheckKind,
  CheckNote,
  ConnectionInfo,
  DataQualitySummary,
  Finding,
  Report,
  TableReport,
  TableRunResult
} from '../types/quality';
import { SEVERITY_ORDER } from './severity';

export type ReportContext = {
  dialect?: string;
  schema?: string;
  connection?: Partial<ConnectionInfo>;
  databaseTimezones?: string[];
  generatedAt?: Date;
  notes?: CheckNote[];
};

const zeroByCheck = (): Record<CheckKind, number> => ({
  controlled_value_candidate: 0,
  nullable_but_never_null: 0,
  missing_primary_key: 0,
  missing_foreign_key: 0,
  format_inconsistency: 0,
  range_violation: 0,
  delete_management: 0,
  late_arriving_data: 0,
  timezone: 0
});

const sortFindings = (findings: Finding[]) =>
  [...findings].sort(
    (a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity] || (a.column ?? '').localeCompare(b.column ?? '')
  );

/**
 * Folds per-table check results into the report. Each finding is visited
 * exactly once, so summary counters always equal the number of findings.
 */
export const aggregate = (perTable: TableRunResult[], context: ReportContext = {}): Report => {
  const byCheck = zeroByCheck();
  const severity = { critical: 0, warning: 0, info: 0 };
  let total = 0;

  const tables: TableReport[] = perTable.map(({ table, results, notes }) => {
    const findings: Finding[] = [];
    for (const kind of CHECK_KINDS) {
      for (const finding of results[kind]) {
        findings.push(finding);
        byCheck[kind]++;
        severity[finding.severity]++;
        total++;
      }
    }

    return {
      ...table,
      data_quality: {
        ...results,
        findings: sortFindings(findings),
        notes
      }
    };
  });

  const runNotes = [...(context.notes ?? [])];
  const serverTimezone = context.connection?.server_timezone ?? 'unknown';
  const distinct = context.databaseTimezones ?? [];
  const summary: DataQualitySummary = {
    ...severity,
    by_check: byCheck,
    timezones: { server_timezone: serverTimezone, distinct, mixed: distinct.length > 1 }
  };

  return {
    metadata: {
      generated_at: (context.generatedAt ?? new Date()).toISOString(),
      dialect: context.dialect ?? 'unknown',
      schema_filter: context.schema ?? 'public',
      total_tables_analyzed: tables.length,
      total_findings: total,
      reduced_confidence: runNotes.length > 0 || tables.some(t => t.data_quality.notes.length > 0),
      notes: runNotes
    },
    connection: {
      db_type: context.connection?.db_type ?? context.dialect ?? 'unknown',
      target: context.connection?.target ?? '',
      server_timezone: serverTimezone
    },
    data_quality_summary: summary,
    tables
  };
};
