import { createClient } from 'redis';

import { logger } from '@utils/logger.js';

import { config } from '../../config/env.config.js';

export const redis = createClient({
  url: config.REDIS_URL,
});

export type RedisClient = typeof redis;

redis.on('error', (err: Error) => {
  logger.error('[redis] error', { message: err.message });
});

redis.on('connect', () => {
  logger.info('[redis] connected');
});

redis.on('end', () => {
  logger.info('[redis] connection closed');
});

export async function connectRedis(): Promise<void> {
  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function disconnectRedis(): Promise<void> {
  if (redis.isOpen) {
    await redis.quit();
  }
}

export async function pingRedis(): Promise<string> {
  await connectRedis();
  return redis.ping();
}

export function registerShutdownSignals(...closers: Array<() => Promise<void>>): void {
  const handler = async (signal: NodeJS.Signals) => {
    try {
      logger.info('[redis] shutting down', { signal });
      for (const close of closers) {
        await close();
      }
      await disconnectRedis();
    } catch (err) {
      logger.error('[redis] shutdown failed', { err });
    } finally {
      process.exit(0);
    }
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}
