import type { PlayerAction, Table, TableEvent, Transition, ValidActions } from '../../shared/logic/index.js';
import {
  applyAction,
  applyTimeout,
  getValidActions,
  isHandInProgress,
  pauseTable,
  resumeTable,
  startHand,
  startTable,
  SeatNotOwnedError,
  StatePersistenceFailureError,
  TableNotFoundError,
  formatCard,
  isTableEngineError,
} from '../../shared/logic/index.js';
import type { PrivateTableView, PublicTableView } from '../../shared/types/websocket.js';

import { TABLE_CONSTANTS } from './constants.js';
import { AsyncQueue } from './AsyncQueue.js';
import { TimerScheduler } from './TimerScheduler.js';
import type { TimerKey } from './TimerScheduler.js';
import { StateTransformer } from './helpers/StateTransformer.js';
import type { TableStateStore } from './store/TableStateStore.js';
import type { CommittedTransition, StateNotifier, TableRuntimeOptions } from './types.js';

/**
 * Runtime for one table. Every operation runs through the table's queue as
 * load -> pure transition -> version-checked commit -> notify, so at most one
 * transition is in flight and nothing is visible before it is stored.
 */
export class TableInstance {
  private readonly queue = new AsyncQueue();
  private readonly timers: TimerScheduler;
  private closed = false;

  constructor(
    public readonly id: string,
    private readonly store: TableStateStore,
    private readonly notifier: StateNotifier,
    private readonly options: TableRuntimeOptions,
    timers?: TimerScheduler
  ) {
    this.timers = timers ?? new TimerScheduler();
  }

  // ============================================
  // Inbound operations
  // ============================================

  submitAction(action: PlayerAction): Promise<CommittedTransition> {
    return this.queue.enqueue(() => this.transact('submitAction', table => applyAction(table, action)));
  }

  /**
   * Action by the player behind a connection. The seat comes from the stored table; a claimed
   * seat that is not the player's is rejected with SeatNotOwnedError.
   */
  submitPlayerAction(playerId: string, action: Omit<PlayerAction, 'seat'>, claimedSeat?: number): Promise<CommittedTransition> {
    return this.queue.enqueue(() =>
      this.transact('submitAction', table => {
        const seat = StateTransformer.findSeatByPlayer(table, playerId);
        if (!seat) {
          throw new SeatNotOwnedError(playerId);
        }
        if (claimedSeat !== undefined && claimedSeat !== seat.seatNumber) {
          throw new SeatNotOwnedError(playerId, claimedSeat);
        }
        return applyAction(table, { ...action, seat: seat.seatNumber });
      })
    );
  }

  startHand(): Promise<CommittedTransition> {
    return this.queue.enqueue(() =>
      this.transact('startHand', table => startHand(table, { random: this.options.random }))
    );
  }

  startTable(): Promise<CommittedTransition> {
    return this.queue.enqueue(() =>
      this.transact('startTable', table => startTable(table, { random: this.options.random }))
    );
  }

  pauseTable(): Promise<CommittedTransition> {
    return this.queue.enqueue(() => this.transact('pauseTable', pauseTable));
  }

  resumeTable(): Promise<CommittedTransition> {
    return this.queue.enqueue(() => this.transact('resumeTable', resumeTable));
  }

  // ============================================
  // Queries (read committed state)
  // ============================================

  async getState(): Promise<Table> {
    return this.load();
  }

  async getValidActions(seatNumber: number): Promise<ValidActions> {
    return getValidActions(await this.load(), seatNumber);
  }

  async getPublicView(): Promise<PublicTableView> {
    return StateTransformer.toPublicView(await this.load(), this.timers.getDeadline('action'));
  }

  async getPlayerView(playerId: string): Promise<PrivateTableView | null> {
    const table = await this.load();
    const seat = StateTransformer.findSeatByPlayer(table, playerId);
    return seat ? StateTransformer.toPlayerView(table, seat.seatNumber) : null;
  }

  /** Resolves once every operation submitted so far has settled */
  idle(): Promise<void> {
    return this.queue.drain();
  }

  shutdown(): void {
    this.closed = true;
    this.timers.cancelAll();
  }

  // ============================================
  // Transition pipeline
  // ============================================

  private async load(): Promise<Table> {
    const table = await this.store.loadTableState(this.id);
    if (!table) {
      throw new TableNotFoundError(this.id);
    }
    return table;
  }

  /**
   * Runs one transition against freshly loaded state. A persistence failure reloads and
   * recomputes once; a second failure is reported with storage untouched.
   * Engine errors propagate without any state change.
   */
  private async transact(label: string, transition: (table: Table) => Transition): Promise<CommittedTransition> {
    for (let attempt = 1; ; attempt++) {
      const current = await this.load();
      const { table: next, events } = transition(current);
      next.version = current.version + 1;

      try {
        await this.store.commitTableState(this.id, next);
      } catch (err) {
        const failure = err instanceof StatePersistenceFailureError
          ? err
          : new StatePersistenceFailureError(`Commit failed for table ${this.id}`, err);
        if (attempt < TABLE_CONSTANTS.COMMIT_ATTEMPTS) {
          console.warn(`[TableInstance] ${label} commit failed on table ${this.id}, retrying: ${failure.message}`);
          continue;
        }
        console.error(`[TableInstance] ${label} commit failed on table ${this.id}:`, failure.message);
        throw failure;
      }

      this.logEvents(events);
      this.scheduleTimers(next);
      this.publish(next);
      return { table: next, events };
    }
  }

  private publish(table: Table): void {
    try {
      this.notifier.notifyStateChanged(table.id, StateTransformer.toPublicView(table, this.timers.getDeadline('action')));
      for (const seat of table.seats) {
        const view = StateTransformer.toPlayerView(table, seat.seatNumber);
        if (view) {
          this.notifier.notifyPlayerState(table.id, seat.playerId, view);
        }
      }
    } catch (err) {
      // state is already committed; clients catch up on the next notification
      console.error(`[TableInstance] notify failed for table ${table.id}:`, err);
    }
  }

  // ============================================
  // Timers
  // ============================================

  private scheduleTimers(table: Table): void {
    this.timers.cancel('action');
    this.timers.cancel('nextHand');
    if (this.closed) return;

    const hand = table.hand;
    if (hand && !hand.isComplete && hand.round.toActSeat !== null) {
      const seat = hand.round.toActSeat;
      const { handNumber, actionCount } = hand;
      this.timers.schedule('action', this.options.actionTimeoutMs, () => {
        this.onActionTimeout(handNumber, actionCount, seat);
      });
      return;
    }

    if (this.options.autoStartNextHand && table.status === 'in_progress' && !isHandInProgress(table)) {
      const handNumber = table.handNumber;
      this.timers.schedule('nextHand', this.options.nextHandDelayMs, () => {
        this.onNextHand(handNumber);
      });
    }
  }

  private onActionTimeout(handNumber: number, actionCount: number, seat: number): void {
    void this.queue.enqueue(async () => {
      try {
        const table = await this.load();
        const hand = table.hand;
        // stale: the seat acted, or the hand moved on, before this ran
        if (!hand || hand.isComplete || hand.handNumber !== handNumber
          || hand.actionCount !== actionCount || hand.round.toActSeat !== seat) {
          return;
        }
        console.log(`[TableInstance] Seat ${seat} timed out on table ${this.id} (hand #${handNumber})`);
        await this.transact('timeout', current => applyTimeout(current, seat));
      } catch (err) {
        console.error(`[TableInstance] Action timeout handling failed on table ${this.id}:`, err);
        this.rearm(err, 'action', this.options.actionTimeoutMs, () => {
          this.onActionTimeout(handNumber, actionCount, seat);
        });
      }
    });
  }

  private onNextHand(handNumber: number): void {
    void this.queue.enqueue(async () => {
      try {
        const table = await this.load();
        if (table.status !== 'in_progress' || isHandInProgress(table) || table.handNumber !== handNumber) {
          return;
        }
        await this.transact('nextHand', current => startHand(current, { random: this.options.random }));
      } catch (err) {
        console.warn(`[TableInstance] Next hand not started on table ${this.id}:`, err);
        this.rearm(err, 'nextHand', this.options.nextHandDelayMs, () => {
          this.onNextHand(handNumber);
        });
      }
    });
  }

  // Arms a fired timer again after a storage failure. Rule errors are final.
  private rearm(err: unknown, key: TimerKey, delayMs: number, callback: () => void): void {
    if (this.closed) return;
    if (isTableEngineError(err) && !(err instanceof StatePersistenceFailureError)) return;
    this.timers.schedule(key, delayMs, callback);
  }

  // ============================================
  // Logging
  // ============================================

  private logEvents(events: TableEvent[]): void {
    for (const event of events) {
      switch (event.type) {
        case 'hand_started':
          console.log(`[TableInstance] Table ${this.id} hand #${event.handNumber} started (button ${event.buttonSeat})`);
          break;
        case 'street_dealt':
          console.log(`[TableInstance] Table ${this.id} ${event.street}: ${event.cards.map(formatCard).join(' ')}`);
          break;
        case 'pot_awarded':
          console.log(`[TableInstance] Table ${this.id} pot ${event.potIndex} (${event.amount}) -> seats ${event.winners.join(', ')}`);
          break;
        case 'table_finished':
          console.log(`[TableInstance] Table ${this.id} finished`);
          break;
        default:
          break;
      }
    }
  }
}
