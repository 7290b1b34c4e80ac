import { z, ZodError } from 'zod';
import { isTableEngineError, SeatNotOwnedError } from '../../shared/logic/index.js';
import type { Ack, AckResponse } from '../../shared/types/websocket.js';
import type { TableManager } from '../table/TableManager.js';
import { playerRoom, tableRoom } from '../table/helpers/BroadcastService.js';
import type { GameSocket } from '../table/types.js';

// ========== Payload schemas ==========

const tableIdSchema = z.string().min(1).max(64);

export const tablePayloadSchema = z.object({
  tableId: tableIdSchema,
});

export const actionPayloadSchema = z.object({
  tableId: tableIdSchema,
  seat: z.number().int().positive().optional(),
  action: z.enum(['fold', 'check', 'call', 'bet', 'raise']),
  amount: z.number().int().positive().optional(),
});

// ========== Helpers ==========

export class UnauthorizedError extends Error {
  constructor() {
    super('Not authenticated');
    this.name = 'UnauthorizedError';
  }
}

function requirePlayer(socket: GameSocket): string {
  const playerId = socket.data.playerId;
  if (!playerId) {
    throw new UnauthorizedError();
  }
  return playerId;
}

// Table-level operations are open to the table's seated players only
async function requireSeated(socket: GameSocket, tableId: string, tableManager: TableManager): Promise<void> {
  const playerId = requirePlayer(socket);
  if (!(await tableManager.getPlayerView(tableId, playerId))) {
    throw new SeatNotOwnedError(playerId);
  }
}

export function toAckError(err: unknown): AckResponse {
  if (isTableEngineError(err)) {
    return { ok: false, code: err.code, message: err.message };
  }
  if (err instanceof UnauthorizedError) {
    return { ok: false, code: 'UNAUTHORIZED', message: err.message };
  }
  if (err instanceof ZodError) {
    return { ok: false, code: 'BAD_REQUEST', message: err.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  console.error('[Socket] Unexpected error:', err);
  return { ok: false, code: 'INTERNAL_ERROR', message: 'Internal error' };
}

function reply(ack: Ack | undefined, response: AckResponse): void {
  if (typeof ack === 'function') {
    ack(response);
  }
}

async function respond(ack: Ack | undefined, work: () => Promise<void>): Promise<void> {
  try {
    await work();
    reply(ack, { ok: true });
  } catch (err) {
    reply(ack, toAckError(err));
  }
}

// ========== Handlers ==========

// Subscribe to a table's public view, plus the owner view of the connected player
export function handleTableWatch(socket: GameSocket, data: unknown, ack: Ack | undefined, tableManager: TableManager): Promise<void> {
  return respond(ack, async () => {
    const playerId = requirePlayer(socket);
    const { tableId } = tablePayloadSchema.parse(data);
    const view = await tableManager.getPublicView(tableId);

    await socket.join(tableRoom(tableId));
    socket.emit('table:state', { state: view });

    const playerView = await tableManager.getPlayerView(tableId, playerId);
    if (playerView) {
      await socket.join(playerRoom(playerId));
      socket.emit('player:state', { state: playerView });
    }
  });
}

export function handleTableStart(socket: GameSocket, data: unknown, ack: Ack | undefined, tableManager: TableManager): Promise<void> {
  return respond(ack, async () => {
    const { tableId } = tablePayloadSchema.parse(data);
    await requireSeated(socket, tableId, tableManager);
    await tableManager.startTable(tableId);
  });
}

export function handleHandStart(socket: GameSocket, data: unknown, ack: Ack | undefined, tableManager: TableManager): Promise<void> {
  return respond(ack, async () => {
    const { tableId } = tablePayloadSchema.parse(data);
    await requireSeated(socket, tableId, tableManager);
    await tableManager.startHand(tableId);
  });
}

// The seat is the connected player's; a `seat` in the payload must match it
export function handleGameAction(socket: GameSocket, data: unknown, ack: Ack | undefined, tableManager: TableManager): Promise<void> {
  return respond(ack, async () => {
    const playerId = requirePlayer(socket);
    const { tableId, seat, action, amount } = actionPayloadSchema.parse(data);
    await tableManager.submitPlayerAction(tableId, playerId, { kind: action, amount }, seat);
  });
}
