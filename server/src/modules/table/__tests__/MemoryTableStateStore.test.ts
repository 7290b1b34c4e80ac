import { describe, it, expect } from 'vitest';
import { StatePersistenceFailureError, createTable } from '../../../shared/logic/index.js';
import { MemoryTableStateStore } from '../store/MemoryTableStateStore.js';
import { SETTINGS } from './testHelpers.js';

const table = createTable('t1', SETTINGS, [{ seatNumber: 1, playerId: 'alice' }]);

describe('MemoryTableStateStore', () => {
  it('returns null for an unknown table', async () => {
    expect(await new MemoryTableStateStore().loadTableState('t1')).toBeNull();
  });

  it('stores a copy, not the caller object', async () => {
    const store = new MemoryTableStateStore();
    const mine = structuredClone(table);
    await store.commitTableState('t1', mine);

    mine.seats[0].chips = 1;
    expect((await store.loadTableState('t1'))?.seats[0].chips).toBe(1000);
  });

  it('accepts only the next version', async () => {
    const store = new MemoryTableStateStore();
    await store.commitTableState('t1', table);

    await expect(store.commitTableState('t1', { ...table, version: 0 })).rejects.toThrow(
      'Version conflict for table t1: stored 0, writing 0'
    );
    await expect(store.commitTableState('t1', { ...table, version: 2 })).rejects.toThrow(StatePersistenceFailureError);
    await store.commitTableState('t1', { ...table, version: 1 });

    expect((await store.loadTableState('t1'))?.version).toBe(1);
  });

  it('requires an existing table for versions above 0', async () => {
    const store = new MemoryTableStateStore();
    await expect(store.commitTableState('t1', { ...table, version: 1 })).rejects.toThrow(
      'Version conflict for table t1: stored none, writing 1'
    );
  });

  it('fails injected commits without writing', async () => {
    const store = new MemoryTableStateStore();
    store.failNextCommits(1);

    await expect(store.commitTableState('t1', table)).rejects.toThrow('Injected commit failure for table t1');
    expect(await store.loadTableState('t1')).toBeNull();

    await store.commitTableState('t1', table);
    expect(store.commitCount).toBe(1);
  });

  it('rejects malformed stored state on load', async () => {
    const store = new MemoryTableStateStore();
    store.put({ ...table, seats: [{ ...table.seats[0], chips: -5 }] });
    await expect(store.loadTableState('t1')).rejects.toThrow();
  });
});
