import type { FindingOf, TableFact } from '../../types/quality';
import type { PatternConfig } from '../patterns';
import { isFreeformColumn, isTextType } from '../patterns';
import { recommend, severityPolicy } from '../severity';
import { ConnectivityError, getErrorMessage, noteReasonFor } from '../../utils/errors';
import { nameSimilarity, singularize, tableNameForms } from '../../utils/similarity';
import type { CheckContext } from './types';

const TARGET_SIMILARITY = 0.85;

const declaredColumns = (table: TableFact) =>
  new Set([...table.primary_keys, ...table.foreign_keys.map(fk => fk.column)]);

export const checkControlledValueCandidates = async ({ table, patterns, thresholds }: CheckContext) => {
  const findings: FindingOf<'controlled_value_candidate'>[] = [];
  if (table.row_count === 0) return findings;
  const declared = declaredColumns(table);

  for (const col of table.columns) {
    if (!isTextType(patterns, col.type)) continue;
    if (declared.has(col.name) || col.is_unique) continue;
    if (col.has_check_constraint || col.enum_values) continue;
    // Free-form names are skipped even when their cardinality is low.
    if (isFreeformColumn(patterns, col.name)) continue;

    const cardinality = col.cardinality ?? 0;
    if (cardinality === 0 || cardinality > thresholds.controlledValueMaxCardinality) continue;

    const distinctValues = Array.from(new Set(col.distinct_values)).sort();
    const shown = distinctValues
      .slice(0, thresholds.distinctValueDisplayLimit)
      .map(v => `'${v}'`)
      .join(', ');

    findings.push({
      table: table.name,
      column: col.name,
      check: 'controlled_value_candidate',
      severity: severityPolicy.controlledValueCandidate(),
      detail: `Text column with ${cardinality} distinct value(s) (${shown}) but no CHECK, ENUM, or FK constraint`,
      recommendation: recommend.controlledValueCandidate(),
      evidence: { distinct_values: distinctValues, cardinality }
    });
  }

  return findings;
};

export const checkNullableButNeverNull = async ({ table }: CheckContext) => {
  const findings: FindingOf<'nullable_but_never_null'>[] = [];
  if (table.row_count <= 0) return findings;

  for (const col of table.columns) {
    if (!col.nullable || col.null_count !== 0) continue;
    findings.push({
      table: table.name,
      column: col.name,
      check: 'nullable_but_never_null',
      severity: severityPolicy.nullableButNeverNull(),
      detail: `Column is nullable but has 0 NULLs across ${table.row_count} row(s)`,
      recommendation: recommend.nullableButNeverNull(),
      evidence: { row_count: table.row_count, null_count: 0 }
    });
  }

  return findings;
};

export const checkMissingPrimaryKey = async ({ table }: CheckContext) => {
  const findings: FindingOf<'missing_primary_key'>[] = [];
  if (table.primary_keys.length) return findings;
  findings.push({
    table: table.name,
    column: null,
    check: 'missing_primary_key',
    severity: severityPolicy.missingPrimaryKey(),
    detail: 'Table has no primary key defined',
    recommendation: recommend.missingPrimaryKey(),
    evidence: { row_count: table.row_count }
  });
  return findings;
};

export type InferredTarget = {
  table: string;
  column: string;
};

/** Resolves the table an FK-shaped column most likely points at, if any. */
export const inferForeignKeyTarget = (
  table: TableFact,
  column: string,
  catalog: TableFact[],
  patterns: PatternConfig
): InferredTarget | null => {
  const name = column.toLowerCase();
  if (patterns.joinExclude.includes(name)) return null;
  const suffix = patterns.joinSuffixes.find(s => name.endsWith(s));
  if (!suffix) return null;
  const prefix = name.slice(0, -suffix.length);
  if (!prefix) return null;

  const others = catalog.filter(t => t.name !== table.name);
  const forms = tableNameForms(prefix);
  let target = others.find(t => forms.has(t.name.toLowerCase()));
  if (!target) {
    let best = 0;
    for (const candidate of others) {
      const score = nameSimilarity(prefix, singularize(candidate.name));
      if (score >= TARGET_SIMILARITY && score > best) {
        best = score;
        target = candidate;
      }
    }
  }
  if (!target) return null;

  const base = suffix.slice(1);
  const refColumn =
    target.primary_keys.find(pk => [base, name].includes(pk.toLowerCase())) ??
    target.primary_keys[0] ??
    target.columns.find(c => c.name.toLowerCase() === base)?.name;
  if (!refColumn) return null;

  return { table: target.name, column: refColumn };
};

export const checkMissingForeignKeys = async ({ table, catalog, query, patterns, thresholds, note }: CheckContext) => {
  const findings: FindingOf<'missing_foreign_key'>[] = [];
  const declared = declaredColumns(table);
  const canProbe = query.capabilities.supportsOrphanDetection;
  let noted = false;

  for (const col of table.columns) {
    if (declared.has(col.name)) continue;
    const target = inferForeignKeyTarget(table, col.name, catalog, patterns);
    if (!target) continue;

    if (!canProbe && !noted) {
      note('unsupported', 'Orphan detection is not available for this source; FK findings were not escalated');
      noted = true;
    }

    let orphanCount: number | null = null;
    let orphanedValues: string[] = [];
    if (canProbe && table.row_count > 0) {
      try {
        const result = await query.countOrphans(
          { table: table.name, column: col.name, refTable: target.table, refColumn: target.column },
          thresholds.orphanSampleSize
        );
        orphanCount = result.count;
        orphanedValues = result.sample;
      } catch (err) {
        if (err instanceof ConnectivityError) throw err;
        note(noteReasonFor(err), `Orphan probe on ${col.name}: ${getErrorMessage(err)}`);
      }
    }

    let detail = `Column follows FK naming pattern and matches ${target.table}.${target.column} but has no FK constraint`;
    if (orphanCount) {
      detail += `. Found ${orphanCount} orphaned value(s), e.g. ${orphanedValues.join(', ')}`;
    }

    findings.push({
      table: table.name,
      column: col.name,
      check: 'missing_foreign_key',
      severity: severityPolicy.missingForeignKey(orphanCount),
      detail,
      recommendation: recommend.missingForeignKey(target.table, target.column, orphanCount),
      evidence: {
        target_table: target.table,
        target_column: target.column,
        orphan_count: orphanCount,
        orphaned_values: orphanedValues
      }
    });
  }

  return findings;
};
