// WebSocket event types shared between client and server

import type {
  ActionKind,
  Card,
  HandResult,
  SeatStatus,
  Street,
  TableErrorCode,
  TableStatus,
} from '../logic/index.js';
import type { ValidActions } from '../logic/actionValidator.js';

// ========== Client -> Server Events ==========

export type AckResponse =
  | { ok: true }
  | { ok: false; code: TableErrorCode | 'BAD_REQUEST' | 'UNAUTHORIZED' | 'INTERNAL_ERROR'; message: string };

export type Ack = (response: AckResponse) => void;

// The acting player is the one authenticated at the handshake, never a payload field.
export interface ClientToServerEvents {
  // Table
  'table:watch': (data: { tableId: string }, ack?: Ack) => void;
  'table:start': (data: { tableId: string }, ack?: Ack) => void;
  'hand:start': (data: { tableId: string }, ack?: Ack) => void;

  // Game actions
  'game:action': (data: { tableId: string; seat?: number; action: ActionKind; amount?: number }, ack?: Ack) => void;
}

// ========== Server -> Client Events ==========

export interface ServerToClientEvents {
  'table:state': (data: { state: PublicTableView }) => void;
  'player:state': (data: { state: PrivateTableView }) => void;
}

// ========== Shared Types ==========

export interface PublicSeatView {
  seatNumber: number;
  playerId: string;
  chips: number;
  status: SeatStatus;
  committed: number;      // this street
  hasCards: boolean;
  holeCards: Card[] | null;   // only when shown down
}

export interface PublicPotView {
  amount: number;
  eligibleSeats: number[];
}

export interface PublicHandView {
  handNumber: number;
  street: Street;
  communityCards: Card[];
  buttonSeat: number;
  smallBlindSeat: number;
  bigBlindSeat: number;
  pots: PublicPotView[];
  currentBet: number;
  minRaise: number;
  toActSeat: number | null;
  isComplete: boolean;
  result: HandResult | null;
}

// Everything observers may see. Never carries unrevealed hole cards.
export interface PublicTableView {
  tableId: string;
  version: number;
  status: TableStatus;
  handNumber: number;
  buttonSeat: number | null;
  smallBlind: number;
  bigBlind: number;
  maxPlayers: number;
  seats: PublicSeatView[];
  hand: PublicHandView | null;
  actionDeadline: number | null;   // epoch ms
}

// Owner-only portion for one seat.
export interface PrivateTableView {
  tableId: string;
  version: number;
  playerId: string;
  seatNumber: number;
  holeCards: Card[];
  validActions: ValidActions;
}
