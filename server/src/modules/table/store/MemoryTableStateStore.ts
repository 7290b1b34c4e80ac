import type { Table } from '../../../shared/logic/index.js';
import { StatePersistenceFailureError } from '../../../shared/logic/index.js';
import type { TableStateStore } from './TableStateStore.js';
import { tableSchema } from './tableSchema.js';

/**
 * In-process store. States are kept as serialized snapshots so callers never share references with storage.
 */
export class MemoryTableStateStore implements TableStateStore {
  private states = new Map<string, string>();
  private pendingFailures = 0;

  commitCount = 0;

  async loadTableState(tableId: string): Promise<Table | null> {
    const raw = this.states.get(tableId);
    return raw === undefined ? null : parseTable(raw);
  }

  async commitTableState(tableId: string, newState: Table): Promise<void> {
    if (this.pendingFailures > 0) {
      this.pendingFailures--;
      throw new StatePersistenceFailureError(`Injected commit failure for table ${tableId}`);
    }

    const raw = this.states.get(tableId);
    const storedVersion = raw === undefined ? null : parseTable(raw).version;
    const expected = newState.version === 0 ? null : newState.version - 1;
    if (storedVersion !== expected) {
      throw new StatePersistenceFailureError(
        `Version conflict for table ${tableId}: stored ${storedVersion ?? 'none'}, writing ${newState.version}`
      );
    }

    this.states.set(tableId, JSON.stringify(newState));
    this.commitCount++;
  }

  /** Makes the next `count` commits fail */
  failNextCommits(count: number): void {
    this.pendingFailures = count;
  }

  /** Overwrites stored state without a version check */
  put(table: Table): void {
    this.states.set(table.id, JSON.stringify(table));
  }

  delete(tableId: string): void {
    this.states.delete(tableId);
  }
}

function parseTable(raw: string): Table {
  return tableSchema.parse(JSON.parse(raw));
}
