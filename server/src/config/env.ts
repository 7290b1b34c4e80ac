import { config } from 'dotenv';
import { z } from 'zod';

// Load .env file
config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

export const envSchema = z.object({
  REDIS_URL: z.string().default('redis://localhost:6379'),
  PORT: z.coerce.number().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CLIENT_URL: z.string().default('http://localhost:5173'),
  JWT_SECRET: z.string().min(32),
  ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  NEXT_HAND_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  AUTO_START_NEXT_HAND: booleanFlag.default('true'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
