import type { ColumnFact, DeleteStrategy, FindingOf, SoftDeleteType, TableFact } from '../../types/quality';
import type { PatternConfig } from '../patterns';
import { isBooleanType } from '../patterns';
import { recommend, severityPolicy } from '../severity';
import { ConnectivityError, getErrorMessage, noteReasonFor } from '../../utils/errors';
import type { CheckContext } from './types';

export type SoftDeleteColumn = {
  column: ColumnFact;
  type: SoftDeleteType;
};

export const findSoftDeleteColumn = (columns: ColumnFact[], patterns: PatternConfig): SoftDeleteColumn | null => {
  for (const column of columns) {
    const name = column.name.toLowerCase();
    if (patterns.softDeleteTimestamp.includes(name)) return { column, type: 'timestamp' };
    if (patterns.softDeleteBoolean.includes(name)) return { column, type: 'boolean' };
    if (patterns.activeFlag.includes(name) && isBooleanType(column.type)) return { column, type: 'active_flag' };
  }
  return null;
};

export const classifyDeleteStrategy = (softDelete: SoftDeleteColumn | null, cdcEnabled: boolean | null): DeleteStrategy => {
  if (softDelete) return 'soft_delete';
  if (cdcEnabled) return 'hard_delete_with_cdc';
  return 'hard_delete';
};

const auditTrailFor = (table: TableFact, catalog: TableFact[], patterns: PatternConfig) => {
  const names = new Set(catalog.map(t => t.name.toLowerCase()));
  const base = table.name.toLowerCase();
  return patterns.auditSuffixes.map(sfx => base + sfx).find(candidate => names.has(candidate)) ?? null;
};

const describeStrategy = (strategy: DeleteStrategy, soft: SoftDeleteColumn | null) => {
  if (strategy === 'soft_delete' && soft) {
    const name = soft.column.name;
    if (soft.type === 'active_flag') {
      return `Active-flag column '${name}' (boolean) detected; rows with ${name}=false are logically deleted.`;
    }
    if (soft.type === 'timestamp') {
      return `Soft-delete column '${name}' (timestamp) detected; deleted rows are preserved with a deletion timestamp.`;
    }
    return `Soft-delete column '${name}' (boolean) detected; deleted rows are flagged in the source table.`;
  }
  if (strategy === 'hard_delete_with_cdc') {
    return 'No soft-delete column found, but CDC is enabled. Hard deletes can be captured via change data capture.';
  }
  return 'No soft-delete column detected and CDC is not enabled. Hard deletes are invisible to incremental ingestion.';
};

export const checkDeleteManagement = async ({ table, catalog, query, patterns, note }: CheckContext) => {
  const soft = findSoftDeleteColumn(table.columns, patterns);

  let cdcEnabled: boolean | null = table.cdc_enabled ?? null;
  if (cdcEnabled === null && query.capabilities.supportsCdcIntrospection) {
    try {
      cdcEnabled = await query.isCdcEnabled(table.name);
    } catch (err) {
      if (err instanceof ConnectivityError) throw err;
      note(noteReasonFor(err), `CDC introspection: ${getErrorMessage(err)}`);
    }
  }

  const strategy = classifyDeleteStrategy(soft, cdcEnabled);
  const auditTable = auditTrailFor(table, catalog, patterns);
  const isAuditTable = patterns.auditSuffixes.some(sfx => table.name.toLowerCase().endsWith(sfx));

  let detail = describeStrategy(strategy, soft);
  if (auditTable) detail += ` Audit-trail table '${auditTable}' exists.`;
  if (isAuditTable) detail += ' Table itself looks like an audit trail.';

  const finding: FindingOf<'delete_management'> = {
    table: table.name,
    column: soft?.column.name ?? null,
    check: 'delete_management',
    severity: severityPolicy.deleteManagement(strategy),
    detail,
    recommendation: recommend.deleteManagement(strategy, soft?.column.name ?? null, soft?.type ?? null),
    evidence: {
      delete_strategy: strategy,
      soft_delete_column: soft?.column.name ?? null,
      soft_delete_type: soft?.type ?? null,
      cdc_enabled: cdcEnabled,
      has_audit_trail: auditTable !== null,
      audit_trail_table: auditTable,
      is_audit_table: isAuditTable
    }
  };
  return [finding];
};
