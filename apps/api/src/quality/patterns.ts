import defaults from './patterns.json';
import type { FormatPattern } from '../types/quality';

/**
 * Named keyword groups and regular expressions that drive name-based
 * classification. Every check reads its patterns from here, so tests and
 * callers can override a single group without touching check code.
 */
export type PatternConfig = {
  textTypes: string[];
  numericTypes: string[];
  freeformExact: string[];
  freeformSuffixes: string[];
  joinSuffixes: string[];
  joinExclude: string[];
  pricing: string[];
  quantity: string[];
  formats: Record<FormatPattern, RegExp>;
  softDeleteTimestamp: string[];
  softDeleteBoolean: string[];
  activeFlag: string[];
  auditSuffixes: string[];
  businessDate: string[];
  systemTimestamp: string[];
  datetimeKeywords: string[];
  tzAwareTypes: string[];
  growthSourceColumns: string[];
};

export const FORMAT_PATTERNS: FormatPattern[] = ['email', 'phone', 'date_as_text', 'url', 'numeric_as_text'];

export type PatternOverrides = Partial<PatternConfig>;

export const DEFAULT_PATTERNS: PatternConfig = {
  ...defaults,
  formats: {
    email: new RegExp(defaults.formats.email),
    phone: new RegExp(defaults.formats.phone),
    date_as_text: new RegExp(defaults.formats.date_as_text),
    url: new RegExp(defaults.formats.url),
    numeric_as_text: new RegExp(defaults.formats.numeric_as_text)
  }
};

export const resolvePatterns = (overrides: PatternOverrides = {}): PatternConfig => ({
  ...DEFAULT_PATTERNS,
  ...overrides,
  formats: { ...DEFAULT_PATTERNS.formats, ...overrides.formats }
});

const lower = (value: string) => value.toLowerCase();

// `DECIMAL(10,2) UNSIGNED` -> ['decimal', 'unsigned']; `character varying` -> ['character', 'varying']
const typeWords = (type: string) =>
  lower(type)
    .replace(/\([^)]*\)/g, ' ')
    .split(/\s+/)
    .filter(Boolean);

export const isTextType = (patterns: PatternConfig, type: string) =>
  typeWords(type).some(word => patterns.textTypes.includes(word));

export const isNumericType = (patterns: PatternConfig, type: string) =>
  typeWords(type).some(word => patterns.numericTypes.includes(word));

export const isBooleanType = (type: string) => lower(type).includes('bool') || lower(type) === 'bit';

export const isFreeformColumn = (patterns: PatternConfig, column: string) => {
  const name = lower(column);
  if (patterns.freeformExact.includes(name)) return true;
  return patterns.freeformSuffixes.some(s => name.endsWith(s));
};

export const matchesAny = (keywords: string[], column: string) => {
  const name = lower(column);
  return keywords.some(k => name.includes(k));
};

export const findColumnByNames = <T extends { name: string }>(columns: T[], names: string[]) => {
  const byName = new Map(columns.map(c => [lower(c.name), c]));
  for (const candidate of names) {
    const match = byName.get(candidate);
    if (match) return match;
  }
  return undefined;
};
