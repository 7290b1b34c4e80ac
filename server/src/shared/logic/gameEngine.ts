import {
  Card,
  Hand,
  HandValue,
  Payout,
  PlayerAction,
  RandomSource,
  Seat,
  ShowdownEntry,
  Street,
  Table,
  TableEvent,
  TableSettings,
  Transition,
} from './types.js';
import { createDeck, shuffleDeck, dealCards, defaultRandom } from './deck.js';
import { evaluateHoldemHand } from './handEvaluator.js';
import { resolvePositions, getEligibleSeatNumbers, clockwiseFromButton } from './positions.js';
import { validateAction, getValidActions } from './actionValidator.js';
import { createBettingRound, applyValidatedAction, resolveRoundState, RoundState } from './bettingRound.js';
import { calculatePots, awardPots, recordContribution } from './potAccountant.js';
import { tableSettingsSchema } from './settings.js';
import { InsufficientPlayersError, InvalidActionError } from './errors.js';

export interface HandOptions {
  random?: RandomSource;
  deck?: Card[];   // pre-ordered deck, dealt from the top as given
}

export interface NewTableSeat {
  seatNumber: number;
  playerId: string;
  chips?: number;   // defaults to the buy-in
}

// ============================================
// Table lifecycle
// ============================================

/**
 * A `waiting` table with the given occupants, all `playing`.
 */
export function createTable(id: string, settings: TableSettings, seats: NewTableSeat[] = []): Table {
  const parsed = tableSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    throw new InvalidActionError(`Invalid table settings: ${parsed.error.issues.map(i => i.message).join(', ')}`);
  }

  const numbers = new Set<number>();
  for (const s of seats) {
    if (s.seatNumber < 1 || s.seatNumber > settings.maxPlayers || numbers.has(s.seatNumber)) {
      throw new InvalidActionError(`Invalid seat number ${s.seatNumber}`);
    }
    numbers.add(s.seatNumber);
  }

  return {
    id,
    settings: { ...parsed.data },
    seats: seats
      .map(s => ({
        seatNumber: s.seatNumber,
        playerId: s.playerId,
        chips: s.chips ?? settings.buyIn,
        status: 'playing' as const,
        holeCards: [],
      }))
      .sort((a, b) => a.seatNumber - b.seatNumber),
    buttonSeat: null,
    status: 'waiting',
    handNumber: 0,
    version: 0,
    hand: null,
  };
}

/**
 * waiting -> in_progress, then deals the first hand.
 */
export function startTable(table: Table, options: HandOptions = {}): Transition {
  if (table.status !== 'waiting') {
    throw new InvalidActionError(`Table has already started (status: ${table.status})`);
  }
  const parsed = tableSettingsSchema.safeParse(table.settings);
  if (!parsed.success) {
    throw new InvalidActionError(`Invalid table settings: ${parsed.error.issues.map(i => i.message).join(', ')}`);
  }

  const funded = table.seats.filter(s => s.chips > 0 && s.status !== 'sitting_out');
  if (funded.length < 2) {
    throw new InsufficientPlayersError(funded.length);
  }

  const working = structuredClone(table);
  working.status = 'in_progress';
  const started = startHand(working, options);
  return { table: started.table, events: [{ type: 'table_started' }, ...started.events] };
}

// New hands are not dealt while paused; a hand already running plays out.
export function pauseTable(table: Table): Transition {
  if (table.status !== 'in_progress') {
    throw new InvalidActionError(`Only a running table can be paused (status: ${table.status})`);
  }
  const working = structuredClone(table);
  working.status = 'paused';
  return { table: working, events: [{ type: 'table_paused' }] };
}

export function resumeTable(table: Table): Transition {
  if (table.status !== 'paused') {
    throw new InvalidActionError(`Table is not paused (status: ${table.status})`);
  }
  const working = structuredClone(table);
  working.status = 'in_progress';
  return { table: working, events: [{ type: 'table_resumed' }] };
}

export function isHandInProgress(table: Table): boolean {
  return table.hand !== null && !table.hand.isComplete;
}

// ============================================
// Hand flow
// ============================================

/**
 * Rotates the button, shuffles, deals two hole cards to every eligible seat and posts the blinds.
 */
export function startHand(table: Table, options: HandOptions = {}): Transition {
  if (table.status !== 'in_progress') {
    throw new InvalidActionError(`Cannot start a hand while the table is ${table.status}`);
  }
  if (isHandInProgress(table)) {
    throw new InvalidActionError('A hand is already in progress');
  }

  const working = structuredClone(table);
  const events: TableEvent[] = [];
  const { smallBlind, bigBlind } = working.settings;

  // busted seats sit out; everyone else with chips is dealt in
  for (const seat of working.seats) {
    seat.holeCards = [];
    if (seat.chips <= 0) {
      seat.status = 'sitting_out';
    } else if (seat.status === 'folded' || seat.status === 'all_in') {
      seat.status = 'playing';
    }
  }

  const positions = resolvePositions(working.seats, working.buttonSeat);

  let deck = options.deck ? [...options.deck] : shuffleDeck(createDeck(), options.random ?? defaultRandom);
  const handNumber = working.handNumber + 1;
  const hand: Hand = {
    handNumber,
    street: 'preflop',
    deck: [],
    communityCards: [],
    buttonSeat: positions.buttonSeat,
    smallBlindSeat: positions.smallBlindSeat,
    bigBlindSeat: positions.bigBlindSeat,
    round: createBettingRound(bigBlind),
    contributions: {},
    pots: [],
    actions: [],
    actionCount: 0,
    lateSeats: [],
    isComplete: false,
    result: null,
  };

  // one card at a time, starting left of the button, two passes
  const dealOrder = clockwiseFromButton(getEligibleSeatNumbers(working.seats), positions.buttonSeat);
  for (let pass = 0; pass < 2; pass++) {
    for (const seatNumber of dealOrder) {
      const { cards, remainingDeck } = dealCards(deck, 1);
      requireSeat(working, seatNumber).holeCards.push(...cards);
      deck = remainingDeck;
    }
  }
  hand.deck = deck;

  working.hand = hand;
  working.handNumber = handNumber;
  working.buttonSeat = positions.buttonSeat;

  events.push({
    type: 'hand_started',
    handNumber,
    buttonSeat: positions.buttonSeat,
    smallBlindSeat: positions.smallBlindSeat,
    bigBlindSeat: positions.bigBlindSeat,
  });

  const sbPosted = postBlind(working, hand, positions.smallBlindSeat, smallBlind);
  const bbPosted = postBlind(working, hand, positions.bigBlindSeat, bigBlind);
  events.push({
    type: 'blinds_posted',
    smallBlind: { seat: positions.smallBlindSeat, amount: sbPosted },
    bigBlind: { seat: positions.bigBlindSeat, amount: bbPosted },
  });

  // the big blind counts as the opening full bet preflop
  hand.round.currentBet = bigBlind;
  hand.round.lastFullRaiseBet = bigBlind;

  const state = resolveRoundState(hand.round, working.seats, positions.firstToActSeat, true);
  advance(working, state, events);

  return { table: working, events };
}

function postBlind(table: Table, hand: Hand, seatNumber: number, blind: number): number {
  const seat = requireSeat(table, seatNumber);
  const amount = Math.min(blind, seat.chips);
  seat.chips -= amount;
  recordContribution(hand, seatNumber, amount);
  if (seat.chips === 0) {
    seat.status = 'all_in';
  }
  return amount;
}

/**
 * Validates and applies one action for the seat to act, then advances the hand as far as it goes
 * without further input (next street, run-out, showdown).
 */
export function applyAction(table: Table, action: PlayerAction, timedOut: boolean = false): Transition {
  const working = structuredClone(table);
  sitOutLateSeats(working);

  const validated = validateAction(working, action);
  const hand = working.hand;
  if (!hand) {
    throw new InvalidActionError('The hand is not accepting actions');
  }

  const events: TableEvent[] = [];
  const recorded = applyValidatedAction(hand, working.seats, validated, hand.street, timedOut);
  events.push({ type: 'action_applied', action: recorded });

  const state = resolveRoundState(hand.round, working.seats, action.seat);
  advance(working, state, events);

  return { table: working, events };
}

/**
 * Acts for a seat whose action timer expired: check when legal, fold otherwise.
 * A seat that is no longer at the table is skipped.
 */
export function applyTimeout(table: Table, seatNumber: number): Transition {
  const hand = table.hand;
  if (!hand || hand.isComplete || hand.round.toActSeat !== seatNumber) {
    throw new InvalidActionError(`Seat ${seatNumber} is not waiting to act`);
  }

  if (!table.seats.some(s => s.seatNumber === seatNumber)) {
    const working = structuredClone(table);
    sitOutLateSeats(working);
    const events: TableEvent[] = [];
    const workingHand = working.hand;
    if (workingHand) {
      advance(working, resolveRoundState(workingHand.round, working.seats, seatNumber), events);
    }
    return { table: working, events };
  }

  const canCheck = getValidActions(table, seatNumber).actions.includes('check');
  return applyAction(table, { seat: seatNumber, kind: canCheck ? 'check' : 'fold' }, true);
}

// A seat that appeared mid-hand (no hole cards) waits for the next deal.
function sitOutLateSeats(table: Table): void {
  const hand = table.hand;
  if (!hand || hand.isComplete) return;
  for (const seat of table.seats) {
    if (seat.status === 'playing' && seat.holeCards.length !== 2) {
      seat.status = 'sitting_out';
      hand.lateSeats.push(seat.seatNumber);
    }
  }
}

function advance(table: Table, initial: RoundState, events: TableEvent[]): void {
  const hand = table.hand;
  if (!hand) return;

  let state = initial;
  for (;;) {
    switch (state.kind) {
      case 'awaiting_action':
        hand.round.toActSeat = state.toActSeat;
        return;

      case 'hand_complete':
        closeStreet(table, hand);
        awardUncontested(table, hand, events);
        finishHand(table, hand, events);
        return;

      case 'run_out':
        closeStreet(table, hand);
        while (hand.street !== 'river') {
          dealNextStreet(hand, events);
        }
        showdown(table, hand, events);
        finishHand(table, hand, events);
        return;

      case 'round_complete':
        closeStreet(table, hand);
        if (hand.street === 'river') {
          showdown(table, hand, events);
          finishHand(table, hand, events);
          return;
        }
        dealNextStreet(hand, events);
        // postflop action opens with the first seat still able to act after the button
        state = resolveRoundState(hand.round, table.seats, hand.buttonSeat);
        break;
    }
  }
}

// Moves street commitments into the pots and opens a fresh round.
function closeStreet(table: Table, hand: Hand): void {
  hand.pots = calculatePots(hand.contributions, table.seats);
  hand.round = createBettingRound(table.settings.bigBlind);
}

const NEXT_STREET: Record<'preflop' | 'flop' | 'turn', { street: Street; count: number }> = {
  preflop: { street: 'flop', count: 3 },
  flop: { street: 'turn', count: 1 },
  turn: { street: 'river', count: 1 },
};

function dealNextStreet(hand: Hand, events: TableEvent[]): void {
  if (hand.street !== 'preflop' && hand.street !== 'flop' && hand.street !== 'turn') return;
  const next = NEXT_STREET[hand.street];

  // burn one, then deal
  const burned = dealCards(hand.deck, 1);
  const { cards, remainingDeck } = dealCards(burned.remainingDeck, next.count);
  hand.deck = remainingDeck;
  hand.communityCards.push(...cards);
  hand.street = next.street;

  events.push({ type: 'street_dealt', street: next.street, cards });
}

function awardUncontested(table: Table, hand: Hand, events: TableEvent[]): void {
  const winner = table.seats.find(s => s.status === 'playing' || s.status === 'all_in');
  const payouts: Payout[] = winner
    ? hand.pots.map((pot, potIndex) => ({ seat: winner.seatNumber, amount: pot.amount, potIndex }))
    : [];

  applyPayouts(table, hand, payouts, events);
  hand.result = { uncontested: true, payouts, showdown: [] };
}

function showdown(table: Table, hand: Hand, events: TableEvent[]): void {
  hand.street = 'showdown';

  const live = table.seats.filter(s => s.status === 'playing' || s.status === 'all_in');
  const order = clockwiseFromButton(live.map(s => s.seatNumber), hand.buttonSeat);

  const values = new Map<number, HandValue>();
  const entries: ShowdownEntry[] = [];
  for (const seatNumber of order) {
    const seat = requireSeat(table, seatNumber);
    const value = evaluateHoldemHand(seat.holeCards, hand.communityCards);
    values.set(seatNumber, value);
    entries.push({ seat: seatNumber, holeCards: [...seat.holeCards], handName: value.name });
  }
  events.push({ type: 'showdown', entries });

  const payouts = awardPots(hand.pots, values, hand.buttonSeat);
  applyPayouts(table, hand, payouts, events);
  hand.result = { uncontested: false, payouts, showdown: entries };
}

function applyPayouts(table: Table, hand: Hand, payouts: Payout[], events: TableEvent[]): void {
  for (const payout of payouts) {
    requireSeat(table, payout.seat).chips += payout.amount;
  }
  hand.pots.forEach((pot, potIndex) => {
    const winners = payouts.filter(p => p.potIndex === potIndex).map(p => p.seat);
    events.push({ type: 'pot_awarded', potIndex, amount: pot.amount, winners });
  });
}

function finishHand(table: Table, hand: Hand, events: TableEvent[]): void {
  hand.isComplete = true;
  hand.round.toActSeat = null;

  for (const seat of table.seats) {
    if (seat.chips === 0) {
      seat.status = 'sitting_out';
    } else if (seat.status === 'folded' || seat.status === 'all_in' || hand.lateSeats.includes(seat.seatNumber)) {
      seat.status = 'playing';
    }
  }

  events.push({ type: 'hand_complete', handNumber: hand.handNumber, uncontested: hand.result?.uncontested ?? false });

  const funded = table.seats.filter(s => s.chips > 0);
  if (funded.length < 2) {
    table.status = 'finished';
    events.push({ type: 'table_finished' });
  }
}

function requireSeat(table: Table, seatNumber: number): Seat {
  const seat = table.seats.find(s => s.seatNumber === seatNumber);
  if (!seat) {
    throw new Error(`Seat ${seatNumber} missing from table ${table.id}`);
  }
  return seat;
}

// ============================================
// Queries
// ============================================

/**
 * Main pot and side pots including the current street's commitments.
 */
export function getCurrentPots(table: Table): { amount: number; eligibleSeats: number[] }[] {
  if (!table.hand) return [];
  if (table.hand.isComplete) return table.hand.pots;
  return calculatePots(table.hand.contributions, table.seats);
}

export { getValidActions };
