import type { FindingOf, FormatPattern } from '../../types/quality';
import type { PatternConfig } from '../patterns';
import { FORMAT_PATTERNS, isNumericType, isTextType, matchesAny } from '../patterns';
import { recommend, severityPolicy } from '../severity';
import type { QualityThresholds } from '../severity';
import { round, toNumber } from '../../utils/stats';
import type { CheckContext } from './types';

export type DominantPattern = {
  pattern: FormatPattern;
  matched: number;
  sampled: number;
  ratio: number;
  nonMatching: string[];
};

/** Pattern covering the most sampled values; ties go to the earlier pattern. */
export const findDominantPattern = (values: string[], patterns: PatternConfig): DominantPattern | null => {
  if (!values.length) return null;
  let best: DominantPattern | null = null;

  for (const pattern of FORMAT_PATTERNS) {
    const regex = patterns.formats[pattern];
    const matched = values.filter(v => regex.test(v)).length;
    if (!matched || (best && matched <= best.matched)) continue;
    best = {
      pattern,
      matched,
      sampled: values.length,
      ratio: matched / values.length,
      nonMatching: values.filter(v => !regex.test(v)).slice(0, 5)
    };
  }

  return best;
};

export const isInconsistent = (dominant: DominantPattern | null, thresholds: QualityThresholds) =>
  !!dominant && dominant.ratio > thresholds.formatDominantMinRatio && dominant.ratio < 1;

export const checkFormatInconsistency = async ({ table, query, patterns, thresholds }: CheckContext) => {
  const findings: FindingOf<'format_inconsistency'>[] = [];
  if (table.row_count === 0) return findings;

  for (const col of table.columns) {
    if (!isTextType(patterns, col.type)) continue;
    // Low-cardinality columns are covered by the controlled value check.
    if (col.cardinality !== null && col.cardinality <= thresholds.controlledValueMaxCardinality) continue;

    const rows = await query.sampleRows(table.name, [col.name], thresholds.formatSampleSize);
    const values = rows
      .map(r => r[col.name])
      .filter(v => v !== null && v !== undefined)
      .map(v => String(v));

    const dominant = findDominantPattern(values, patterns);
    if (!dominant || !isInconsistent(dominant, thresholds)) continue;

    const nonConforming = dominant.sampled - dominant.matched;
    findings.push({
      table: table.name,
      column: col.name,
      check: 'format_inconsistency',
      severity: severityPolicy.formatInconsistency(),
      detail:
        `${dominant.matched}/${dominant.sampled} sampled values match ${dominant.pattern} format, ` +
        `but ${nonConforming} do not. Non-matching samples: ${dominant.nonMatching.join(', ')}`,
      recommendation: recommend.formatInconsistency(dominant.pattern),
      evidence: {
        pattern: dominant.pattern,
        sampled: dominant.sampled,
        matched: dominant.matched,
        match_ratio: round(dominant.ratio, 3),
        non_conforming_ratio: round(nonConforming / dominant.sampled, 3),
        non_matching_samples: dominant.nonMatching
      }
    });
  }

  return findings;
};

export const checkRangeViolations = async ({ table, patterns }: CheckContext) => {
  const findings: FindingOf<'range_violation'>[] = [];
  if (table.row_count === 0) return findings;

  for (const col of table.columns) {
    if (!isNumericType(patterns, col.type)) continue;
    const min = toNumber(col.min);
    if (min === null || min >= 0) continue;

    if (matchesAny(patterns.pricing, col.name)) {
      findings.push({
        table: table.name,
        column: col.name,
        check: 'range_violation',
        severity: severityPolicy.rangeViolation(),
        detail: `Pricing/amount column has negative value(s) (min: ${min})`,
        recommendation: recommend.rangeViolation('negative_pricing'),
        evidence: { violation_type: 'negative_pricing', min }
      });
    }
    if (matchesAny(patterns.quantity, col.name)) {
      findings.push({
        table: table.name,
        column: col.name,
        check: 'range_violation',
        severity: severityPolicy.rangeViolation(),
        detail: `Quantity column has negative value(s) (min: ${min})`,
        recommendation: recommend.rangeViolation('negative_quantity'),
        evidence: { violation_type: 'negative_quantity', min }
      });
    }
  }

  return findings;
};
