import type { ColumnFact, ForeignKeyFact, Row, TableFact } from '../types/quality';

export type RawColumn = {
  table: string;
  name: string;
  type: string;
  nullable: boolean;
  enum_values?: string[] | null;
};

/** Constraint facts keyed by table name; column sets hold column names. */
export type KeyFacts = {
  primaryKeys: Map<string, string[]>;
  foreignKeys: Map<string, ForeignKeyFact[]>;
  unique: Map<string, Set<string>>;
  checked: Map<string, Set<string>>;
};

export const emptyKeyFacts = (): KeyFacts => ({
  primaryKeys: new Map(),
  foreignKeys: new Map(),
  unique: new Map(),
  checked: new Map()
});

const push = <T>(map: Map<string, T[]>, key: string, value: T) => {
  const list = map.get(key) ?? [];
  list.push(value);
  map.set(key, list);
};

const add = (map: Map<string, Set<string>>, key: string, value: string) => {
  const set = map.get(key) ?? new Set<string>();
  set.add(value);
  map.set(key, set);
};

export const addPrimaryKey = (facts: KeyFacts, table: string, column: string) => push(facts.primaryKeys, table, column);
export const addForeignKey = (facts: KeyFacts, table: string, fk: ForeignKeyFact) => push(facts.foreignKeys, table, fk);
export const addUnique = (facts: KeyFacts, table: string, column: string) => add(facts.unique, table, column);
export const addChecked = (facts: KeyFacts, table: string, column: string) => add(facts.checked, table, column);

export const isRow = (value: unknown): value is Row => typeof value === 'object' && value !== null;

export const rowsOf = (values: unknown[]): Row[] => values.filter(isRow);

export const text = (value: unknown) => (value === null || value === undefined ? '' : String(value));

/** Joins column metadata with keys and row counts, preserving column order. */
export const assembleTables = (
  schema: string,
  columns: RawColumn[],
  facts: KeyFacts,
  rowCounts: Map<string, number>
): TableFact[] => {
  const byTable = new Map<string, RawColumn[]>();
  for (const col of columns) push(byTable, col.table, col);

  return Array.from(byTable, ([name, cols]) => ({
    schema,
    name,
    row_count: rowCounts.get(name) ?? 0,
    primary_keys: facts.primaryKeys.get(name) ?? [],
    foreign_keys: facts.foreignKeys.get(name) ?? [],
    columns: cols.map(
      (col): ColumnFact => ({
        table: name,
        name: col.name,
        type: col.type.toLowerCase(),
        nullable: col.nullable,
        is_unique: facts.unique.get(name)?.has(col.name) ?? false,
        has_check_constraint: facts.checked.get(name)?.has(col.name) ?? false,
        enum_values: col.enum_values ?? null,
        detected_timezone: null,
        cardinality: null,
        null_count: null,
        distinct_values: [],
        min: null,
        max: null
      })
    )
  }));
};

/** Turns per-month row additions into a cumulative series on top of a baseline. */
export const cumulativeHistory = (table: string, baseline: number, monthly: Array<{ month: string; added: number }>) => {
  let total = baseline;
  return monthly.map(({ month, added }) => {
    total += added;
    return { table, month, row_count: total };
  });
};
