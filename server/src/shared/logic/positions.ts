import { Seat } from './types.js';
import { InsufficientPlayersError } from './errors.js';

export interface Positions {
  buttonSeat: number;
  smallBlindSeat: number;
  bigBlindSeat: number;
  firstToActSeat: number;   // preflop
}

/**
 * Seat numbers with status `playing`, ascending. Clockwise order wraps from the last to the first.
 */
export function getEligibleSeatNumbers(seats: Seat[]): number[] {
  return seats
    .filter(s => s.status === 'playing')
    .map(s => s.seatNumber)
    .sort((a, b) => a - b);
}

/**
 * First seat in `order` strictly clockwise after `fromSeat`.
 * `fromSeat` does not need to be part of `order` (a seat that left or sat out).
 */
export function nextSeatClockwise(order: number[], fromSeat: number): number {
  return order.find(n => n > fromSeat) ?? order[0];
}

/**
 * Button, blinds and preflop first-to-act for the next hand.
 *
 * First hand of a table: the button goes to the lowest eligible seat.
 * Later hands: the button moves to the next eligible seat clockwise from the previous button.
 * Heads-up: the button posts the small blind and acts first preflop.
 */
export function resolvePositions(seats: Seat[], previousButton: number | null): Positions {
  const order = getEligibleSeatNumbers(seats);
  if (order.length < 2) {
    throw new InsufficientPlayersError(order.length);
  }

  const buttonSeat = previousButton === null ? order[0] : nextSeatClockwise(order, previousButton);

  if (order.length === 2) {
    const bigBlindSeat = nextSeatClockwise(order, buttonSeat);
    return { buttonSeat, smallBlindSeat: buttonSeat, bigBlindSeat, firstToActSeat: buttonSeat };
  }

  const smallBlindSeat = nextSeatClockwise(order, buttonSeat);
  const bigBlindSeat = nextSeatClockwise(order, smallBlindSeat);
  const firstToActSeat = nextSeatClockwise(order, bigBlindSeat);
  return { buttonSeat, smallBlindSeat, bigBlindSeat, firstToActSeat };
}

/**
 * Seats in clockwise order starting with the first seat after the button, button last.
 */
export function clockwiseFromButton(seatNumbers: number[], buttonSeat: number): number[] {
  const sorted = [...seatNumbers].sort((a, b) => a - b);
  const after = sorted.filter(n => n > buttonSeat);
  const upTo = sorted.filter(n => n <= buttonSeat);
  return [...after, ...upTo];
}
