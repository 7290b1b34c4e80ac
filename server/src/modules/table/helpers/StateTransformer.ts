// Public / private view builders (static methods)

import type { Seat, Table } from '../../../shared/logic/index.js';
import { getCurrentPots, getValidActions } from '../../../shared/logic/index.js';
import type {
  PrivateTableView,
  PublicHandView,
  PublicSeatView,
  PublicTableView,
} from '../../../shared/types/websocket.js';

export class StateTransformer {
  static seatToPublicSeat(table: Table, seat: Seat): PublicSeatView {
    const hand = table.hand;
    const revealed = hand?.result?.showdown.find(entry => entry.seat === seat.seatNumber);

    return {
      seatNumber: seat.seatNumber,
      playerId: seat.playerId,
      chips: seat.chips,
      status: seat.status,
      committed: hand && !hand.isComplete ? hand.round.committed[seat.seatNumber] ?? 0 : 0,
      hasCards: seat.holeCards.length === 2 && seat.status !== 'folded',
      holeCards: revealed ? [...revealed.holeCards] : null,
    };
  }

  /**
   * Non-private portion of the table. Hole cards appear only for hands shown down.
   */
  static toPublicView(table: Table, actionDeadline: number | null = null): PublicTableView {
    const hand = table.hand;
    let handView: PublicHandView | null = null;

    if (hand) {
      handView = {
        handNumber: hand.handNumber,
        street: hand.street,
        communityCards: [...hand.communityCards],
        buttonSeat: hand.buttonSeat,
        smallBlindSeat: hand.smallBlindSeat,
        bigBlindSeat: hand.bigBlindSeat,
        pots: getCurrentPots(table).map(p => ({ amount: p.amount, eligibleSeats: [...p.eligibleSeats] })),
        currentBet: hand.round.currentBet,
        minRaise: hand.round.minRaise,
        toActSeat: hand.isComplete ? null : hand.round.toActSeat,
        isComplete: hand.isComplete,
        result: hand.result ? structuredClone(hand.result) : null,
      };
    }

    return {
      tableId: table.id,
      version: table.version,
      status: table.status,
      handNumber: table.handNumber,
      buttonSeat: table.buttonSeat,
      smallBlind: table.settings.smallBlind,
      bigBlind: table.settings.bigBlind,
      maxPlayers: table.settings.maxPlayers,
      seats: table.seats.map(seat => this.seatToPublicSeat(table, seat)),
      hand: handView,
      actionDeadline: handView && handView.toActSeat !== null ? actionDeadline : null,
    };
  }

  /**
   * Owner-only view for one seat, or null when the seat is empty.
   */
  static toPlayerView(table: Table, seatNumber: number): PrivateTableView | null {
    const seat = table.seats.find(s => s.seatNumber === seatNumber);
    if (!seat) return null;

    return {
      tableId: table.id,
      version: table.version,
      playerId: seat.playerId,
      seatNumber,
      holeCards: [...seat.holeCards],
      validActions: getValidActions(table, seatNumber),
    };
  }

  static findSeatByPlayer(table: Table, playerId: string): Seat | undefined {
    return table.seats.find(s => s.playerId === playerId);
  }
}
