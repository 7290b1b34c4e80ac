import { nanoid } from 'nanoid';
import type { NewTableSeat, PlayerAction, TableSettings, ValidActions } from '../../shared/logic/index.js';
import { createTable, TableNotFoundError } from '../../shared/logic/index.js';
import type { PrivateTableView, PublicTableView } from '../../shared/types/websocket.js';
import { TableInstance } from './TableInstance.js';
import { TABLE_CONSTANTS } from './constants.js';
import type { TableStateStore } from './store/TableStateStore.js';
import type { CommittedTransition, StateNotifier, TableRuntimeOptions } from './types.js';

export class TableManager {
  private tables: Map<string, TableInstance> = new Map();

  constructor(
    private readonly store: TableStateStore,
    private readonly notifier: StateNotifier,
    private readonly options: TableRuntimeOptions
  ) {}

  // Create and persist a new waiting table
  public async createTable(
    settings: TableSettings,
    seats: NewTableSeat[] = [],
    tableId: string = nanoid(TABLE_CONSTANTS.TABLE_ID_LENGTH)
  ): Promise<TableInstance> {
    const table = createTable(tableId, settings, seats);
    await this.store.commitTableState(tableId, table);
    console.log(`[TableManager] Table ${tableId} created (${settings.smallBlind}/${settings.bigBlind}, ${seats.length} seated)`);
    return this.register(tableId);
  }

  // Get a table by ID (only tables this process has touched)
  public getTable(tableId: string): TableInstance | undefined {
    return this.tables.get(tableId);
  }

  /**
   * Instance for a table known to storage. Tables created by other processes are picked up here.
   */
  public async resolveTable(tableId: string): Promise<TableInstance> {
    const existing = this.tables.get(tableId);
    if (existing) return existing;

    const state = await this.store.loadTableState(tableId);
    if (!state) {
      throw new TableNotFoundError(tableId);
    }
    return this.register(tableId);
  }

  public async submitAction(tableId: string, action: PlayerAction): Promise<CommittedTransition> {
    return (await this.resolveTable(tableId)).submitAction(action);
  }

  public async submitPlayerAction(
    tableId: string,
    playerId: string,
    action: Omit<PlayerAction, 'seat'>,
    claimedSeat?: number
  ): Promise<CommittedTransition> {
    return (await this.resolveTable(tableId)).submitPlayerAction(playerId, action, claimedSeat);
  }

  public async startHand(tableId: string): Promise<CommittedTransition> {
    return (await this.resolveTable(tableId)).startHand();
  }

  public async startTable(tableId: string): Promise<CommittedTransition> {
    return (await this.resolveTable(tableId)).startTable();
  }

  public async pauseTable(tableId: string): Promise<CommittedTransition> {
    return (await this.resolveTable(tableId)).pauseTable();
  }

  public async resumeTable(tableId: string): Promise<CommittedTransition> {
    return (await this.resolveTable(tableId)).resumeTable();
  }

  public async getValidActions(tableId: string, seatNumber: number): Promise<ValidActions> {
    return (await this.resolveTable(tableId)).getValidActions(seatNumber);
  }

  public async getPublicView(tableId: string): Promise<PublicTableView> {
    return (await this.resolveTable(tableId)).getPublicView();
  }

  public async getPlayerView(tableId: string, playerId: string): Promise<PrivateTableView | null> {
    return (await this.resolveTable(tableId)).getPlayerView(playerId);
  }

  // Stop timers and forget the table; stored state is kept
  public removeTable(tableId: string): void {
    const table = this.tables.get(tableId);
    if (!table) {
      console.warn(`[TableManager] removeTable: table ${tableId} not found`);
      return;
    }
    table.shutdown();
    this.tables.delete(tableId);
  }

  public shutdown(): void {
    for (const table of this.tables.values()) {
      table.shutdown();
    }
    this.tables.clear();
  }

  public get size(): number {
    return this.tables.size;
  }

  private register(tableId: string): TableInstance {
    // concurrent resolves for one id must share a single queue
    const existing = this.tables.get(tableId);
    if (existing) return existing;

    const table = new TableInstance(tableId, this.store, this.notifier, this.options);
    this.tables.set(tableId, table);
    return table;
  }
}
