import type { FastifyInstance } from 'fastify';
import type { JWT } from '@fastify/jwt';
import { z } from 'zod';
import type { GameServer, GameSocket } from '../table/types.js';

// Tokens are issued by the account service with the same JWT_SECRET
const claimsSchema = z.object({
  playerId: z.string().min(1),
});

const tokenSchema = z.string().min(1);

function readToken(socket: GameSocket): unknown {
  return socket.handshake.auth.token ??
    socket.handshake.headers.cookie?.split('token=')[1]?.split(';')[0];
}

/**
 * Handshake check: verifies the connection's JWT and binds its player to `socket.data.playerId`.
 */
export function createAuthMiddleware(jwt: JWT) {
  return (socket: GameSocket, next: (err?: Error) => void): void => {
    const token = tokenSchema.safeParse(readToken(socket));
    if (!token.success) {
      next(new Error('Authentication required'));
      return;
    }

    try {
      const { playerId } = claimsSchema.parse(jwt.verify(token.data));
      socket.data.playerId = playerId;
      next();
    } catch (err) {
      console.warn(`[Socket] Auth failed for ${socket.id}:`, err);
      next(new Error('Authentication failed'));
    }
  };
}

export function setupAuthMiddleware(io: GameServer, fastify: FastifyInstance): void {
  io.use(createAuthMiddleware(fastify.jwt));
}
