import { BettingRound, Hand, RecordedAction, Seat, Street } from './types.js';
import { ValidatedAction } from './actionValidator.js';
import { recordContribution } from './potAccountant.js';
import { getEligibleSeatNumbers, nextSeatClockwise } from './positions.js';

/**
 * Where a street stands after an action:
 * - `awaiting_action`: `toActSeat` must act next
 * - `round_complete`: deal the next street
 * - `hand_complete`: one live seat left (others folded), award without further streets
 * - `run_out`: nobody can bet any more (all remaining are all-in), deal out and show down
 */
export type RoundState =
  | { kind: 'awaiting_action'; toActSeat: number }
  | { kind: 'round_complete' }
  | { kind: 'run_out' }
  | { kind: 'hand_complete' };

export function createBettingRound(bigBlind: number): BettingRound {
  return {
    currentBet: 0,
    minRaise: bigBlind,
    lastFullRaiseBet: 0,
    committed: {},
    actedSeats: [],
    toActSeat: null,
  };
}

/**
 * Applies an already validated action to `hand` and `seats` (both owned by the caller's working copy).
 * Chips move through the pot accountant before the round advances.
 */
export function applyValidatedAction(
  hand: Hand,
  seats: Seat[],
  action: ValidatedAction,
  street: Street,
  timedOut: boolean
): RecordedAction {
  const round = hand.round;
  const seat = seats.find(s => s.seatNumber === action.seat);
  if (!seat) {
    throw new Error(`Seat ${action.seat} missing from table`);
  }

  if (action.kind === 'fold') {
    seat.status = 'folded';
    seat.holeCards = [];
  } else if (action.chips > 0) {
    seat.chips -= action.chips;
    recordContribution(hand, seat.seatNumber, action.chips);
    if (seat.chips === 0) {
      seat.status = 'all_in';
    }
  }

  if (action.kind === 'bet' || action.kind === 'raise') {
    const total = action.streetTotal;
    if (action.isFullRaise) {
      const increment = total - round.currentBet;
      round.minRaise = Math.max(round.minRaise, increment);
      round.lastFullRaiseBet = total;
      // everyone else gets to act again
      round.actedSeats = [];
    }
    if (total > round.currentBet) {
      round.currentBet = total;
    }
  }

  if (!round.actedSeats.includes(action.seat)) {
    round.actedSeats.push(action.seat);
  }
  hand.actionCount++;

  const recorded: RecordedAction = {
    seat: action.seat,
    kind: action.kind,
    amount: action.chips,
    streetTotal: round.committed[action.seat] ?? 0,
    street,
    isAllIn: action.isAllIn,
    timedOut,
  };
  hand.actions.push(recorded);
  return recorded;
}

function needsToAct(round: BettingRound, seat: Seat): boolean {
  if (seat.status !== 'playing') return false;
  const committed = round.committed[seat.seatNumber] ?? 0;
  return !round.actedSeats.includes(seat.seatNumber) || committed < round.currentBet;
}

/**
 * Decides the next state of the street. The next seat to act is searched clockwise from
 * `fromSeat`; with `includeFrom` the search starts at `fromSeat` itself (a street opening).
 */
export function resolveRoundState(round: BettingRound, seats: Seat[], fromSeat: number, includeFrom = false): RoundState {
  const live = seats.filter(s => s.status === 'playing' || s.status === 'all_in');
  if (live.length <= 1) {
    return { kind: 'hand_complete' };
  }

  const canAct = seats.filter(s => s.status === 'playing');
  if (canAct.length === 0) {
    return { kind: 'run_out' };
  }

  // a lone seat that already matches every bet has nobody left to bet against
  if (canAct.length === 1) {
    const committed = round.committed[canAct[0].seatNumber] ?? 0;
    if (committed >= round.currentBet) {
      return { kind: 'run_out' };
    }
  }

  const order = getEligibleSeatNumbers(seats);
  let seatNumber = includeFrom && order.includes(fromSeat) ? fromSeat : nextSeatClockwise(order, fromSeat);
  for (let i = 0; i < order.length; i++) {
    const seat = seats.find(s => s.seatNumber === seatNumber);
    if (seat && needsToAct(round, seat)) {
      return { kind: 'awaiting_action', toActSeat: seatNumber };
    }
    seatNumber = nextSeatClockwise(order, seatNumber);
  }

  return { kind: 'round_complete' };
}
