import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { openSnapshotStore } from '../growth/store';
import type { SnapshotStore } from '../growth/store';
import { project } from '../growth/projector';
import { DataShapeError } from '../utils/errors';

const churn = { inserts: 0, updates: 0, deletes: 0 };

describe('snapshot store', () => {
  let store: SnapshotStore;

  beforeEach(() => {
    store = openSnapshotStore({ file: ':memory:', now: () => new Date('2024-05-01T00:00:00.000Z') });
  });

  afterEach(async () => {
    await store.close();
  });

  it('stamps snapshots with the clock when no capture time is given', async () => {
    const saved = await store.recordSnapshot({ table: 'orders', schema: 'public', size_bytes: 4096, row_count: 10, churn });

    expect(saved).toEqual({
      id: 1,
      table: 'orders',
      schema: 'public',
      captured_at: '2024-05-01T00:00:00.000Z',
      size_bytes: 4096,
      row_count: 10,
      avg_row_size_bytes: null,
      inserts: 0,
      updates: 0,
      deletes: 0
    });
    expect(await store.listSnapshots('orders')).toEqual([saved]);
  });

  it('keeps every snapshot in capture order', async () => {
    await store.recordSnapshot({ table: 'orders', size_bytes: 2, row_count: 2, churn, captured_at: '2024-03-01T00:00:00.000Z' });
    await store.recordSnapshot({ table: 'orders', size_bytes: 1, row_count: 1, churn, captured_at: '2024-02-01T00:00:00.000Z' });
    await store.recordSnapshot({ table: 'orders', size_bytes: 2, row_count: 2, churn, captured_at: '2024-03-01T00:00:00.000Z' });

    const snapshots = await store.listSnapshots('orders');
    expect(snapshots.map(s => [s.id, s.row_count])).toEqual([
      [2, 1],
      [1, 2],
      [3, 2]
    ]);
  });

  it('orders snapshots by instant regardless of UTC offset', async () => {
    await store.recordSnapshot({ table: 'orders', size_bytes: 1, row_count: 100, churn, captured_at: '2024-01-01T00:00:00Z' });
    await store.recordSnapshot({ table: 'orders', size_bytes: 3, row_count: 300, churn, captured_at: '2024-03-01T20:00:00-10:00' });
    await store.recordSnapshot({ table: 'orders', size_bytes: 2, row_count: 250, churn, captured_at: '2024-03-02T01:00:00Z' });

    const snapshots = await store.listSnapshots('orders');
    expect(snapshots.map(s => [s.captured_at, s.row_count])).toEqual([
      ['2024-01-01T00:00:00.000Z', 100],
      ['2024-03-02T01:00:00.000Z', 250],
      ['2024-03-02T06:00:00.000Z', 300]
    ]);

    const [now] = await project(store, 'orders', { horizons: [0] });
    expect(now.projected_rows).toBe(300);
  });

  it('rejects negative sizes and bad timestamps', async () => {
    await expect(store.recordSnapshot({ table: 'orders', size_bytes: -1, row_count: 0, churn })).rejects.toThrow(
      DataShapeError
    );
    await expect(
      store.recordSnapshot({ table: 'orders', size_bytes: 1, row_count: 0, churn, captured_at: 'yesterday' })
    ).rejects.toThrow('captured_at is not a valid timestamp: yesterday');
    await expect(store.recordSnapshot({ table: ' ', size_bytes: 1, row_count: 0, churn })).rejects.toThrow(
      'table is required'
    );
    expect(await store.listTables()).toEqual([]);
  });

  it('reads back only the latest growth history collection', async () => {
    await store.recordGrowthHistory(
      'events',
      [
        { table: 'events', month: '2024-01', row_count: 10 },
        { table: 'events', month: '2024-02', row_count: 20 }
      ],
      '2024-03-01T00:00:00.000Z'
    );
    await store.recordGrowthHistory('events', [
      { table: 'events', month: '2024-03', row_count: 35 },
      { table: 'events', month: '2024-02', row_count: 25 }
    ]);

    expect(await store.listGrowthHistory('events')).toEqual([
      { table: 'events', month: '2024-02', row_count: 25 },
      { table: 'events', month: '2024-03', row_count: 35 }
    ]);
  });

  it('rejects malformed months', async () => {
    await expect(
      store.recordGrowthHistory('events', [{ table: 'events', month: '2024-13', row_count: 1 }])
    ).rejects.toThrow('month must be YYYY-MM, got 2024-13');
  });

  it('lists tables from snapshots and history together', async () => {
    await store.recordSnapshot({ table: 'orders', size_bytes: 1, row_count: 1, churn });
    await store.recordGrowthHistory('events', [{ table: 'events', month: '2024-01', row_count: 1 }]);
    await store.recordSnapshot({ table: 'orders', size_bytes: 2, row_count: 2, churn });

    expect(await store.listTables()).toEqual(['events', 'orders']);
  });
});
