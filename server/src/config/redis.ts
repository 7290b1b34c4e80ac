import { Redis } from 'ioredis';
import { env } from './env.js';

// Redis key prefixes
export const REDIS_KEYS = {
  tableState: (tableId: string) => `table:state:${tableId}`,
} as const;

export function createRedisClient(url: string = env.REDIS_URL): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
  });

  redis.on('connect', () => {
    console.log('[Redis] Connected');
  });

  redis.on('error', (err) => {
    console.error('[Redis] Connection error:', err);
  });

  return redis;
}
