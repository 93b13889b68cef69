import { Redis } from 'ioredis';
import type { LogSink } from '../logger/logger.js';

export interface RedisConnectionOptions {
  url?: string;
  /** Receives connection errors; ioredis reconnects on its own. */
  logger?: LogSink;
}

let redis: Redis | null = null;

/**
 * Returns the process-wide connection, opening it on first use. BullMQ
 * workers need `maxRetriesPerRequest: null` so blocking commands survive
 * reconnects.
 */
export function getRedis(options: RedisConnectionOptions = {}): Redis {
  if (!redis) {
    redis = new Redis(options.url ?? process.env.REDIS_URL ?? 'redis://localhost:6379', {
      maxRetriesPerRequest: null,
    });
    const { logger } = options;
    if (logger) {
      redis.on('error', (err: Error) => logger.error({ err }, 'Redis connection error'));
    }
  }
  return redis;
}

export async function closeRedis(): Promise<void> {
  if (redis) {
    await redis.quit();
    redis = null;
  }
}
