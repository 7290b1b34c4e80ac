import { z } from 'zod';
import type { Table } from '../../../shared/logic/index.js';
import { tableSettingsSchema } from '../../../shared/logic/index.js';

// Shape check for state read back from storage.

const cardSchema = z.object({
  rank: z.enum(['2', '3', '4', '5', '6', '7', '8', '9', 'T', 'J', 'Q', 'K', 'A']),
  suit: z.enum(['h', 'd', 'c', 's']),
});

const chipsBySeat = z.record(z.string(), z.number().int().nonnegative());
const street = z.enum(['preflop', 'flop', 'turn', 'river', 'showdown']);
const actionKind = z.enum(['fold', 'check', 'call', 'bet', 'raise']);

const seatSchema = z.object({
  seatNumber: z.number().int().positive(),
  playerId: z.string(),
  chips: z.number().int().nonnegative(),
  status: z.enum(['playing', 'folded', 'all_in', 'sitting_out']),
  holeCards: z.array(cardSchema),
});

const potSchema = z.object({
  amount: z.number().int().nonnegative(),
  eligibleSeats: z.array(z.number().int()),
});

const handSchema = z.object({
  handNumber: z.number().int().positive(),
  street,
  deck: z.array(cardSchema),
  communityCards: z.array(cardSchema),
  buttonSeat: z.number().int(),
  smallBlindSeat: z.number().int(),
  bigBlindSeat: z.number().int(),
  round: z.object({
    currentBet: z.number().int().nonnegative(),
    minRaise: z.number().int().nonnegative(),
    lastFullRaiseBet: z.number().int().nonnegative(),
    committed: chipsBySeat,
    actedSeats: z.array(z.number().int()),
    toActSeat: z.number().int().nullable(),
  }),
  contributions: chipsBySeat,
  pots: z.array(potSchema),
  actions: z.array(z.object({
    seat: z.number().int(),
    kind: actionKind,
    amount: z.number().int().nonnegative(),
    streetTotal: z.number().int().nonnegative(),
    street,
    isAllIn: z.boolean(),
    timedOut: z.boolean(),
  })),
  actionCount: z.number().int().nonnegative(),
  lateSeats: z.array(z.number().int()),
  isComplete: z.boolean(),
  result: z.object({
    uncontested: z.boolean(),
    payouts: z.array(z.object({
      seat: z.number().int(),
      amount: z.number().int().nonnegative(),
      potIndex: z.number().int().nonnegative(),
    })),
    showdown: z.array(z.object({
      seat: z.number().int(),
      holeCards: z.array(cardSchema),
      handName: z.string(),
    })),
  }).nullable(),
});

export const tableSchema: z.ZodType<Table> = z.object({
  id: z.string().min(1),
  settings: tableSettingsSchema,
  seats: z.array(seatSchema),
  buttonSeat: z.number().int().nullable(),
  status: z.enum(['waiting', 'in_progress', 'paused', 'finished']),
  handNumber: z.number().int().nonnegative(),
  version: z.number().int().nonnegative(),
  hand: handSchema.nullable(),
});
