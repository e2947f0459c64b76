import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { GrowthHistoryPoint, SizeSnapshot, SnapshotInput } from '../types/growth';
import { DataShapeError } from '../utils/errors';
import { rowsOf, text } from '../sources/catalog';
import { toNumber } from '../utils/stats';
import { config } from '../config';

/**
 * Append-only history of table sizes and monthly growth. Nothing here
 * updates or deletes a stored row.
 */
export interface SnapshotStore {
  recordSnapshot(input: SnapshotInput): Promise<SizeSnapshot>;
  listSnapshots(table: string): Promise<SizeSnapshot[]>;
  listTables(): Promise<string[]>;
  recordGrowthHistory(table: string, points: GrowthHistoryPoint[], collectedAt?: string): Promise<void>;
  listGrowthHistory(table: string): Promise<GrowthHistoryPoint[]>;
  close(): Promise<void>;
}

export type SnapshotStoreOptions = {
  file?: string;
  now?: () => Date;
};

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS size_snapshots (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    table_name TEXT NOT NULL,
    schema_name TEXT NOT NULL,
    captured_at TEXT NOT NULL,
    size_bytes INTEGER NOT NULL,
    row_count INTEGER NOT NULL,
    avg_row_size_bytes REAL,
    inserts INTEGER NOT NULL,
    updates INTEGER NOT NULL,
    deletes INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_size_snapshots_table ON size_snapshots (table_name, captured_at);
  CREATE TABLE IF NOT EXISTS growth_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    table_name TEXT NOT NULL,
    collected_at TEXT NOT NULL,
    month TEXT NOT NULL,
    row_count INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_growth_history_table ON growth_history (table_name, collected_at);
`;

const MONTH_RE = /^\d{4}-(0[1-9]|1[0-2])$/;

const assertCount = (value: number, field: string) => {
  if (!Number.isFinite(value) || value < 0) {
    throw new DataShapeError(`${field} must be a non-negative number, got ${value}`);
  }
};

const assertTimestamp = (value: string, field: string) => {
  if (Number.isNaN(new Date(value).valueOf())) throw new DataShapeError(`${field} is not a valid timestamp: ${value}`);
};

const validateSnapshot = (input: SnapshotInput) => {
  if (!input.table.trim()) throw new DataShapeError('table is required');
  assertCount(input.size_bytes, 'size_bytes');
  assertCount(input.row_count, 'row_count');
  assertCount(input.churn.inserts, 'churn.inserts');
  assertCount(input.churn.updates, 'churn.updates');
  assertCount(input.churn.deletes, 'churn.deletes');
  if (input.avg_row_size_bytes !== undefined && input.avg_row_size_bytes !== null) {
    assertCount(input.avg_row_size_bytes, 'avg_row_size_bytes');
  }
  if (input.captured_at !== undefined) assertTimestamp(input.captured_at, 'captured_at');
};

const toSnapshot = (row: Record<string, unknown>): SizeSnapshot => ({
  id: toNumber(row.id) ?? 0,
  table: text(row.table_name),
  schema: text(row.schema_name),
  captured_at: text(row.captured_at),
  size_bytes: toNumber(row.size_bytes) ?? 0,
  row_count: toNumber(row.row_count) ?? 0,
  avg_row_size_bytes: toNumber(row.avg_row_size_bytes),
  inserts: toNumber(row.inserts) ?? 0,
  updates: toNumber(row.updates) ?? 0,
  deletes: toNumber(row.deletes) ?? 0
});

export const openSnapshotStore = (options: SnapshotStoreOptions = {}): SnapshotStore => {
  const file = options.file ?? config.snapshotDb;
  const now = options.now ?? (() => new Date());

  if (file !== ':memory:') fs.mkdirSync(path.dirname(file), { recursive: true });
  const db = new Database(file);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA_SQL);

  const insertSnapshot = db.prepare(`
    INSERT INTO size_snapshots
      (table_name, schema_name, captured_at, size_bytes, row_count, avg_row_size_bytes, inserts, updates, deletes)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertHistory = db.prepare(
    'INSERT INTO growth_history (table_name, collected_at, month, row_count) VALUES (?, ?, ?, ?)'
  );
  const insertHistoryBatch = db.transaction((table: string, collectedAt: string, points: GrowthHistoryPoint[]) => {
    for (const point of points) insertHistory.run(table, collectedAt, point.month, point.row_count);
  });

  return {
    async recordSnapshot(input) {
      validateSnapshot(input);
      // Stored as UTC ISO text so ordering by string is ordering by time.
      const capturedAt = new Date(input.captured_at ?? now()).toISOString();
      const result = insertSnapshot.run(
        input.table,
        input.schema ?? '',
        capturedAt,
        input.size_bytes,
        input.row_count,
        input.avg_row_size_bytes ?? null,
        input.churn.inserts,
        input.churn.updates,
        input.churn.deletes
      );
      return {
        id: Number(result.lastInsertRowid),
        table: input.table,
        schema: input.schema ?? '',
        captured_at: capturedAt,
        size_bytes: input.size_bytes,
        row_count: input.row_count,
        avg_row_size_bytes: input.avg_row_size_bytes ?? null,
        ...input.churn
      };
    },

    async listSnapshots(table) {
      const rows = db.prepare('SELECT * FROM size_snapshots WHERE table_name = ? ORDER BY captured_at, id').all(table);
      return rowsOf(rows).map(toSnapshot);
    },

    async listTables() {
      const rows = db
        .prepare('SELECT table_name FROM size_snapshots UNION SELECT table_name FROM growth_history ORDER BY 1')
        .all();
      return rowsOf(rows).map(r => text(r.table_name));
    },

    async recordGrowthHistory(table, points, collectedAt) {
      if (!table.trim()) throw new DataShapeError('table is required');
      for (const point of points) {
        if (!MONTH_RE.test(point.month)) throw new DataShapeError(`month must be YYYY-MM, got ${point.month}`);
        assertCount(point.row_count, 'row_count');
      }
      if (collectedAt !== undefined) assertTimestamp(collectedAt, 'collected_at');
      insertHistoryBatch(table, new Date(collectedAt ?? now()).toISOString(), points);
    },

    // Only the most recent collection counts; older ones stay for audit.
    async listGrowthHistory(table) {
      const rows = db
        .prepare(
          `SELECT table_name, month, row_count FROM growth_history
           WHERE table_name = ?
             AND collected_at = (SELECT MAX(collected_at) FROM growth_history WHERE table_name = ?)
           ORDER BY month, id`
        )
        .all(table, table);
      return rowsOf(rows).map(r => ({
        table: text(r.table_name),
        month: text(r.month),
        row_count: toNumber(r.row_count) ?? 0
      }));
    },

    async close() {
      db.close();
    }
  };
};
