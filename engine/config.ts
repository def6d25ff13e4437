import dotenv from 'dotenv';
import { z } from 'zod';
import { MAX_SEED } from './random';

// Load .env first, then let .env.local override it for local development
dotenv.config();
dotenv.config({ path: '.env.local', override: true });

const optionalSeed = z.preprocess(
  value => (value === '' ? undefined : value),
  z.coerce.number().int().min(0).max(MAX_SEED).optional()
);

const envSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silent']).default('info'),
  REDIS_URL: z.preprocess(value => (value === '' ? undefined : value), z.string().url().optional()),
  SNAPSHOT_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  DEFAULT_BOARD_RADIUS: z.coerce.number().int().min(1).default(2),
  DEFAULT_SEED: optionalSeed
});

export interface AppConfig {
  logLevel: 'error' | 'warn' | 'info' | 'debug' | 'silent';
  redisUrl: string | null;
  snapshotTtlSeconds: number;
  defaultBoardRadius: number;
  defaultSeed: number | null;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errors}`);
  }

  const parsed = result.data;
  return Object.freeze({
    logLevel: parsed.LOG_LEVEL,
    redisUrl: parsed.REDIS_URL ?? null,
    snapshotTtlSeconds: parsed.SNAPSHOT_TTL_SECONDS,
    defaultBoardRadius: parsed.DEFAULT_BOARD_RADIUS,
    defaultSeed: parsed.DEFAULT_SEED ?? null
  });
}

export const config = loadConfig(process.env);
