import { Hand, HandValue, Payout, Pot, Seat } from './types.js';
import { compareHands } from './handEvaluator.js';
import { clockwiseFromButton } from './positions.js';

/**
 * Records chips a seat put in. Called for every accepted chip movement (blinds included)
 * before the betting round advances.
 */
export function recordContribution(hand: Hand, seat: number, amount: number): void {
  if (amount <= 0) return;
  hand.round.committed[seat] = (hand.round.committed[seat] ?? 0) + amount;
  hand.contributions[seat] = (hand.contributions[seat] ?? 0) + amount;
}

/**
 * Splits the hand's contributions into a main pot and side pots.
 *
 * A boundary exists at every distinct all-in total. Each layer holds what every seat put in
 * between the previous boundary and this one; seats that reached the boundary and did not fold
 * are eligible. Whatever sits above the highest all-in forms the last pot.
 * Consecutive layers with the same eligible seats are merged.
 */
export function calculatePots(contributions: Record<number, number>, seats: Seat[]): Pot[] {
  const statusOf = new Map(seats.map(s => [s.seatNumber, s.status]));
  const entries = Object.entries(contributions)
    .map(([seat, amount]) => ({ seat: Number(seat), amount }))
    .filter(e => e.amount > 0);

  const isLive = (seat: number) => {
    const status = statusOf.get(seat);
    return status === 'playing' || status === 'all_in';
  };

  const allInLevels = [...new Set(
    entries.filter(e => statusOf.get(e.seat) === 'all_in').map(e => e.amount)
  )].sort((a, b) => a - b);

  const layers: Pot[] = [];
  let prevLevel = 0;

  for (const level of allInLevels) {
    let amount = 0;
    const eligibleSeats: number[] = [];
    for (const e of entries) {
      amount += Math.min(e.amount, level) - Math.min(e.amount, prevLevel);
      if (isLive(e.seat) && e.amount >= level) {
        eligibleSeats.push(e.seat);
      }
    }
    if (amount > 0) {
      layers.push({ amount, eligibleSeats: eligibleSeats.sort((a, b) => a - b) });
    }
    prevLevel = level;
  }

  // above the highest all-in
  let topAmount = 0;
  const topEligible: number[] = [];
  for (const e of entries) {
    topAmount += Math.max(0, e.amount - prevLevel);
    if (isLive(e.seat) && (e.amount > prevLevel || statusOf.get(e.seat) === 'playing')) {
      topEligible.push(e.seat);
    }
  }
  if (topAmount > 0) {
    layers.push({ amount: topAmount, eligibleSeats: topEligible.sort((a, b) => a - b) });
  }

  return mergePots(layers);
}

function mergePots(layers: Pot[]): Pot[] {
  const merged: Pot[] = [];
  for (const pot of layers) {
    const last = merged[merged.length - 1];
    if (last && (pot.eligibleSeats.length === 0 || sameSeats(last.eligibleSeats, pot.eligibleSeats))) {
      // dead money with nobody left to claim it rides with the pot below
      last.amount += pot.amount;
    } else {
      merged.push({ amount: pot.amount, eligibleSeats: [...pot.eligibleSeats] });
    }
  }
  return merged;
}

function sameSeats(a: number[], b: number[]): boolean {
  return a.length === b.length && a.every((seat, i) => seat === b[i]);
}

/**
 * Pays every pot, in creation order, to the best hand(s) among its eligible seats.
 *
 * `handValues` holds the showdown value of every seat that reached showdown. Seats missing from it
 * (the uncontested case) can still win a pot in which they are the only eligible seat.
 * A split pot's odd chips go to the first winner clockwise from the button.
 */
export function awardPots(pots: Pot[], handValues: Map<number, HandValue>, buttonSeat: number): Payout[] {
  const payouts: Payout[] = [];

  pots.forEach((pot, potIndex) => {
    const winners = findPotWinners(pot, handValues);
    if (winners.length === 0) return;

    const ordered = clockwiseFromButton(winners, buttonSeat);
    const share = Math.floor(pot.amount / ordered.length);
    const remainder = pot.amount % ordered.length;

    ordered.forEach((seat, i) => {
      payouts.push({ seat, amount: share + (i === 0 ? remainder : 0), potIndex });
    });
  });

  return payouts;
}

function findPotWinners(pot: Pot, handValues: Map<number, HandValue>): number[] {
  if (pot.eligibleSeats.length === 1) return [...pot.eligibleSeats];

  let best: HandValue | null = null;
  let winners: number[] = [];
  for (const seat of pot.eligibleSeats) {
    const value = handValues.get(seat);
    if (!value) continue;
    const cmp = best ? compareHands(value, best) : 1;
    if (cmp > 0) {
      best = value;
      winners = [seat];
    } else if (cmp === 0) {
      winners.push(seat);
    }
  }
  return winners;
}

/**
 * Chips on the table for this hand: sum of pots from prior streets plus current street commitments.
 * Equals the sum of `hand.contributions` at every step of the hand.
 */
export function chipsInPlay(hand: Hand): number {
  const potTotal = hand.pots.reduce((sum, p) => sum + p.amount, 0);
  const streetTotal = Object.values(hand.round.committed).reduce((sum, c) => sum + c, 0);
  return potTotal + streetTotal;
}
