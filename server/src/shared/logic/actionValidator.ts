import { ActionKind, PlayerAction, Seat, Table } from './types.js';
import { InvalidActionError, NotYourTurnError } from './errors.js';

export interface ValidatedAction {
  seat: number;
  kind: ActionKind;
  chips: number;          // moved from the stack
  streetTotal: number;    // seat's street commitment afterwards
  isAllIn: boolean;
  isFullRaise: boolean;   // bet, or raise whose increment reaches minRaise: reopens action
}

export interface ValidActions {
  seat: number;
  actions: ActionKind[];
  callAmount: number | null;
  minBet: number | null;
  minRaiseTo: number | null;
  maxRaiseTo: number | null;
}

function findSeat(table: Table, seatNumber: number): Seat | undefined {
  return table.seats.find(s => s.seatNumber === seatNumber);
}

/**
 * Decides whether `action` is legal for the seat to act and normalizes its amount.
 * Never mutates the table.
 *
 * Amounts: `bet` is the chips put in, `raise` is the new street total ("raise to").
 * `call` is always `currentBet - committed`, capped at the stack.
 */
export function validateAction(table: Table, action: PlayerAction): ValidatedAction {
  const hand = table.hand;
  if (!hand || hand.isComplete || hand.street === 'showdown' || table.status === 'finished') {
    throw new InvalidActionError('The hand is not accepting actions');
  }

  const round = hand.round;
  if (round.toActSeat !== action.seat) {
    throw new NotYourTurnError(action.seat, round.toActSeat);
  }

  const seat = findSeat(table, action.seat);
  if (!seat || seat.status !== 'playing') {
    throw new InvalidActionError(`Seat ${action.seat} is not in the hand`);
  }

  const committed = round.committed[seat.seatNumber] ?? 0;
  const toCall = round.currentBet - committed;

  if (action.kind !== 'bet' && action.kind !== 'raise' && action.amount !== undefined) {
    throw new InvalidActionError(`${action.kind} does not take an amount`);
  }

  switch (action.kind) {
    case 'fold':
      return { seat: seat.seatNumber, kind: 'fold', chips: 0, streetTotal: committed, isAllIn: false, isFullRaise: false };

    case 'check':
      if (toCall !== 0) {
        throw new InvalidActionError(`Cannot check facing a bet of ${round.currentBet}`);
      }
      return { seat: seat.seatNumber, kind: 'check', chips: 0, streetTotal: committed, isAllIn: false, isFullRaise: false };

    case 'call': {
      if (toCall <= 0) {
        throw new InvalidActionError('Nothing to call');
      }
      const chips = Math.min(toCall, seat.chips);
      return {
        seat: seat.seatNumber,
        kind: 'call',
        chips,
        streetTotal: committed + chips,
        isAllIn: chips === seat.chips,
        isFullRaise: false,
      };
    }

    case 'bet': {
      if (round.currentBet !== 0) {
        throw new InvalidActionError('Cannot bet after a bet; raise instead');
      }
      const amount = requireAmount(action);
      if (amount > seat.chips) {
        throw new InvalidActionError(`Bet of ${amount} exceeds stack of ${seat.chips}`);
      }
      const isAllIn = amount === seat.chips;
      // an all-in for less than the minimum is allowed
      if (amount < table.settings.bigBlind && !isAllIn) {
        throw new InvalidActionError(`Minimum bet is ${table.settings.bigBlind}`);
      }
      return {
        seat: seat.seatNumber,
        kind: 'bet',
        chips: amount,
        streetTotal: committed + amount,
        isAllIn,
        isFullRaise: true,
      };
    }

    case 'raise': {
      if (round.currentBet === 0) {
        throw new InvalidActionError('Nothing to raise; bet instead');
      }
      if (!canRaise(table, seat)) {
        throw new InvalidActionError('Action was not reopened; only call or fold');
      }
      const raiseTo = requireAmount(action);
      const maxRaiseTo = committed + seat.chips;
      if (raiseTo > maxRaiseTo) {
        throw new InvalidActionError(`Raise to ${raiseTo} exceeds stack (max ${maxRaiseTo})`);
      }
      if (raiseTo <= round.currentBet) {
        throw new InvalidActionError(`Raise must exceed the current bet of ${round.currentBet}`);
      }
      const increment = raiseTo - round.currentBet;
      const isAllIn = raiseTo === maxRaiseTo;
      if (increment < round.minRaise && !isAllIn) {
        throw new InvalidActionError(`Minimum raise is to ${round.currentBet + round.minRaise}`);
      }
      return {
        seat: seat.seatNumber,
        kind: 'raise',
        chips: raiseTo - committed,
        streetTotal: raiseTo,
        isAllIn,
        isFullRaise: increment >= round.minRaise,
      };
    }
  }
}

function requireAmount(action: PlayerAction): number {
  const amount = action.amount;
  if (amount === undefined || !Number.isInteger(amount) || amount <= 0) {
    throw new InvalidActionError(`${action.kind} requires a positive integer amount`);
  }
  return amount;
}

/**
 * Raise rights: a seat that already acted at the last full-raise level may only call or fold
 * after a short all-in raise.
 */
function canRaise(table: Table, seat: Seat): boolean {
  const round = table.hand?.round;
  if (!round) return false;
  const committed = round.committed[seat.seatNumber] ?? 0;
  if (seat.chips <= round.currentBet - committed) return false;
  // short all-ins never add up to a full raise: only lastFullRaiseBet reopens action
  return !round.actedSeats.includes(seat.seatNumber) || committed < round.lastFullRaiseBet;
}

/**
 * Legal action kinds and amount bounds for `seatNumber`. Empty when the seat is not to act.
 */
export function getValidActions(table: Table, seatNumber: number): ValidActions {
  const empty: ValidActions = { seat: seatNumber, actions: [], callAmount: null, minBet: null, minRaiseTo: null, maxRaiseTo: null };
  const hand = table.hand;
  const seat = findSeat(table, seatNumber);
  if (!hand || hand.isComplete || !seat || seat.status !== 'playing' || hand.round.toActSeat !== seatNumber) {
    return empty;
  }

  const round = hand.round;
  const committed = round.committed[seatNumber] ?? 0;
  const toCall = round.currentBet - committed;
  const result: ValidActions = { ...empty, actions: ['fold'] };

  if (toCall === 0) {
    result.actions.push('check');
  } else {
    result.actions.push('call');
    result.callAmount = Math.min(toCall, seat.chips);
  }

  if (round.currentBet === 0 && seat.chips > 0) {
    result.actions.push('bet');
    result.minBet = Math.min(table.settings.bigBlind, seat.chips);
    result.maxRaiseTo = seat.chips;
  } else if (round.currentBet > 0 && canRaise(table, seat)) {
    result.actions.push('raise');
    result.maxRaiseTo = committed + seat.chips;
    result.minRaiseTo = Math.min(round.currentBet + round.minRaise, result.maxRaiseTo);
  }

  return result;
}
