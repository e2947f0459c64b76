import type { SizeSnapshot } from '../types/growth';
import type { SourceConnection } from '../sources/types';
import type { SnapshotStore } from './store';
import { findColumnByNames, resolvePatterns } from '../quality/patterns';
import type { PatternOverrides } from '../quality/patterns';
import { ConnectivityError, DataShapeError, getErrorMessage } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('collector');

export type CollectOptions = {
  schema?: string;
  capturedAt?: Date;
  historyMonths?: number;
  patterns?: PatternOverrides;
};

export type CollectionResult = {
  captured_at: string;
  schema: string;
  snapshots: SizeSnapshot[];
  history_tables: string[];
};

/**
 * Appends one size snapshot per table, all sharing one `captured_at`, then
 * records monthly growth for tables with a creation-time column.
 */
export const collectSnapshots = async (
  source: SourceConnection,
  store: SnapshotStore,
  options: CollectOptions = {}
): Promise<CollectionResult> => {
  if (!source.capabilities.supportsSizeSnapshots) {
    throw new DataShapeError(`Size snapshots are not supported for ${source.dbType} sources`);
  }
  const schema = options.schema ?? source.schema;
  const capturedAt = (options.capturedAt ?? new Date()).toISOString();
  const patterns = resolvePatterns(options.patterns);

  const snapshots: SizeSnapshot[] = [];
  for (const reading of await source.collectTableSizes(schema)) {
    snapshots.push(
      await store.recordSnapshot({
        table: reading.table,
        schema: reading.schema,
        size_bytes: reading.size_bytes,
        row_count: reading.row_count,
        avg_row_size_bytes: reading.avg_row_size_bytes,
        churn: { inserts: reading.inserts, updates: reading.updates, deletes: reading.deletes },
        captured_at: capturedAt
      })
    );
  }

  const historyTables: string[] = [];
  for (const table of await source.getTables(schema)) {
    const column = findColumnByNames(table.columns, patterns.growthSourceColumns);
    if (!column) continue;
    try {
      const points = await source.collectGrowthHistory(table.name, column.name, options.historyMonths ?? 24);
      await store.recordGrowthHistory(table.name, points, capturedAt);
      historyTables.push(table.name);
    } catch (err) {
      if (err instanceof ConnectivityError) throw err;
      log.warn({ table: table.name, column: column.name, err: getErrorMessage(err) }, 'Growth history unavailable');
    }
  }

  log.info({ schema, tables: snapshots.length, history: historyTables.length }, 'Snapshot collection complete');
  return { captured_at: capturedAt, schema, snapshots, history_tables: historyTables };
};
