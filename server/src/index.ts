import Fastify from 'fastify';
import { fastifyJwt } from '@fastify/jwt';
import { Server } from 'socket.io';
import { env } from './config/env.js';
import { createRedisClient } from './config/redis.js';
import { setupAuthMiddleware } from './modules/game/authMiddleware.js';
import { setupGameSocket } from './modules/game/socket.js';
import { RedisTableStateStore } from './modules/table/store/RedisTableStateStore.js';
import type { GameServer } from './modules/table/types.js';

const fastify = Fastify({
  logger: env.NODE_ENV === 'development' ? { level: 'warn' } : false,
  trustProxy: env.NODE_ENV === 'production',
});

const redis = createRedisClient();

// Health check
fastify.get('/health', async () => {
  const redisStatus = redis.status;
  return { status: redisStatus === 'ready' ? 'ok' : 'degraded', redis: redisStatus, timestamp: new Date().toISOString() };
});

let shutdownTables: () => void = () => undefined;

// Start server and setup Socket.io
const start = async () => {
  try {
    await fastify.register(fastifyJwt, { secret: env.JWT_SECRET });

    const io: GameServer = new Server(fastify.server, {
      cors: {
        origin: env.CLIENT_URL,
        credentials: true,
      },
      pingInterval: 10000,
      pingTimeout: 5000,
    });

    setupAuthMiddleware(io, fastify);

    const { tableManager } = setupGameSocket(io, new RedisTableStateStore(redis), {
      actionTimeoutMs: env.ACTION_TIMEOUT_MS,
      nextHandDelayMs: env.NEXT_HAND_DELAY_MS,
      autoStartNextHand: env.AUTO_START_NEXT_HAND,
    });
    shutdownTables = () => tableManager.shutdown();

    await fastify.listen({ port: env.PORT, host: '0.0.0.0' });

    console.log(`✅ Server running on http://localhost:${env.PORT}`);
    console.log(`✅ WebSocket ready on ws://localhost:${env.PORT}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

// Graceful shutdown
const shutdown = async () => {
  console.log('Shutting down...');
  shutdownTables();
  await fastify.close();
  await redis.quit();
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

void start();
