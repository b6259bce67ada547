import Redis from 'ioredis';

import type { AppConfig } from '../config';
import type { AppLogger } from './logger';

export type RedisClient = Redis;

const RECONNECT_STEP_MS = 200;
const MAX_RECONNECT_DELAY_MS = 5_000;

/** Linear backoff, capped. ioredis keeps retrying for as long as a number comes back. */
export function reconnectDelay(attempt: number): number {
  return Math.min(attempt * RECONNECT_STEP_MS, MAX_RECONNECT_DELAY_MS);
}

type ConnectionEvents = {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
};

export function watchRedisConnection(client: ConnectionEvents, logger: AppLogger) {
  client.on('ready', () => {
    logger.info('Redis connection ready');
  });

  client.on('reconnecting', (delayMs) => {
    logger.warn({ delayMs }, 'Reconnecting to Redis');
  });

  client.on('error', (error) => {
    logger.error({ err: error }, 'Redis connection error');
  });
}

export function createRedisClient(config: AppConfig, logger: AppLogger): RedisClient {
  const client = new Redis(config.redis.url, {
    connectionName: config.service.name,
    enableAutoPipelining: true,
    maxRetriesPerRequest: null,
    lazyConnect: true,
    retryStrategy: reconnectDelay,
  });

  watchRedisConnection(client, logger);

  return client;
}
