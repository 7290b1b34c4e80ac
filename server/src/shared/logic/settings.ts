import { z } from 'zod';

export const tableSettingsSchema = z
  .object({
    smallBlind: z.number().int().positive(),
    bigBlind: z.number().int().positive(),
    buyIn: z.number().int().positive(),
    maxPlayers: z.number().int().min(2).max(8),
  })
  .refine(s => s.bigBlind >= s.smallBlind, {
    message: 'Big blind must be greater than or equal to small blind',
    path: ['bigBlind'],
  });
