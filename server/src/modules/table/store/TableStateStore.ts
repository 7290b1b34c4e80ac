import type { Table } from '../../../shared/logic/index.js';

/**
 * Persistence contract for table state.
 *
 * `commitTableState` is a compare-and-set on `version`: it succeeds only when the stored version is
 * `newState.version - 1` (or, for `version === 0`, when nothing is stored yet), and writes the whole
 * table at once. Any other outcome rejects with `StatePersistenceFailureError` and leaves storage as it was.
 */
export interface TableStateStore {
  loadTableState(tableId: string): Promise<Table | null>;
  commitTableState(tableId: string, newState: Table): Promise<void>;
}
