export type Suit = 'h' | 'd' | 'c' | 's'; // hearts, diamonds, clubs, spades
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | 'T' | 'J' | 'Q' | 'K' | 'A';

export const SUITS: readonly Suit[] = ['h', 'd', 'c', 's'];
export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', 'T', 'J', 'Q', 'K', 'A'];

export interface Card {
  rank: Rank;
  suit: Suit;
}

/** Returns an integer in [0, maxExclusive). */
export type RandomSource = (maxExclusive: number) => number;

export type SeatStatus = 'playing' | 'folded' | 'all_in' | 'sitting_out';
export type TableStatus = 'waiting' | 'in_progress' | 'paused' | 'finished';
export type Street = 'preflop' | 'flop' | 'turn' | 'river' | 'showdown';
export type ActionKind = 'fold' | 'check' | 'call' | 'bet' | 'raise';

export interface TableSettings {
  smallBlind: number;
  bigBlind: number;
  buyIn: number;
  maxPlayers: number;
}

export interface Seat {
  seatNumber: number;
  playerId: string;
  chips: number;
  status: SeatStatus;
  holeCards: Card[];   // 0 or 2, private to the occupant
}

export interface Pot {
  amount: number;
  eligibleSeats: number[];
}

export interface BettingRound {
  currentBet: number;         // highest street commitment
  minRaise: number;           // smallest legal raise increment
  lastFullRaiseBet: number;   // street total at the last full bet/raise (reopen rule)
  committed: Record<number, number>;
  actedSeats: number[];       // seats that acted since the last full bet/raise
  toActSeat: number | null;
}

export interface PlayerAction {
  seat: number;
  kind: ActionKind;
  amount?: number;
}

export interface RecordedAction {
  seat: number;
  kind: ActionKind;
  amount: number;       // chips moved from the stack by this action
  streetTotal: number;  // seat's street commitment after the action
  street: Street;
  isAllIn: boolean;
  timedOut: boolean;
}

export interface HandValue {
  category: number;     // 1=high card ... 9=straight flush
  name: string;
  ranks: number[];      // tie-break values, most significant first
}

export interface Payout {
  seat: number;
  amount: number;
  potIndex: number;
}

export interface ShowdownEntry {
  seat: number;
  holeCards: Card[];
  handName: string;
}

export interface HandResult {
  uncontested: boolean;
  payouts: Payout[];
  showdown: ShowdownEntry[];
}

export interface Hand {
  handNumber: number;
  street: Street;
  deck: Card[];
  communityCards: Card[];
  buttonSeat: number;
  smallBlindSeat: number;
  bigBlindSeat: number;
  round: BettingRound;
  contributions: Record<number, number>;   // total put in this hand, per seat
  pots: Pot[];                             // pots closed out at the end of prior streets
  actions: RecordedAction[];
  actionCount: number;
  lateSeats: number[];   // seated after the deal, sitting out until the next hand
  isComplete: boolean;
  result: HandResult | null;
}

export interface Table {
  id: string;
  settings: TableSettings;
  seats: Seat[];
  buttonSeat: number | null;
  status: TableStatus;
  handNumber: number;
  version: number;
  hand: Hand | null;
}

export type TableEvent =
  | { type: 'table_started' }
  | { type: 'table_paused' }
  | { type: 'table_resumed' }
  | { type: 'hand_started'; handNumber: number; buttonSeat: number; smallBlindSeat: number; bigBlindSeat: number }
  | { type: 'blinds_posted'; smallBlind: { seat: number; amount: number }; bigBlind: { seat: number; amount: number } }
  | { type: 'action_applied'; action: RecordedAction }
  | { type: 'street_dealt'; street: Street; cards: Card[] }
  | { type: 'showdown'; entries: ShowdownEntry[] }
  | { type: 'pot_awarded'; potIndex: number; amount: number; winners: number[] }
  | { type: 'hand_complete'; handNumber: number; uncontested: boolean }
  | { type: 'table_finished' };

export interface Transition {
  table: Table;
  events: TableEvent[];
}
