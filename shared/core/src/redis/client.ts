/**
 * Redis client factory.
 *
 * Connections are lazy: nothing touches the network until the first command,
 * so a service configured for in-memory persistence never dials Redis.
 */

import Redis, { RedisOptions } from 'ioredis';
import type { ILogger } from '../logging';

export interface RedisClientOptions {
  /** Redis URL, e.g. redis://localhost:6379/0 */
  url: string;
  password?: string;
  /** Label used in log lines */
  name?: string;
}

/**
 * Resolve the password from the explicit value or REDIS_PASSWORD. Blank
 * values count as absent.
 */
export function resolveRedisPassword(password?: string): string | undefined {
  const raw = password ?? process.env.REDIS_PASSWORD;
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function createRedisClient(options: RedisClientOptions, logger: ILogger): Redis {
  const name = options.name ?? 'redis';
  const redisOptions: RedisOptions = {
    password: resolveRedisPassword(options.password),
    enableReadyCheck: false,
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  };

  const client = new Redis(options.url, redisOptions);

  client.on('error', (err: Error) => {
    logger.error('Redis client error', { client: name, error: err.message });
  });
  client.on('connect', () => {
    logger.info('Redis client connected', { client: name });
  });
  client.on('close', () => {
    logger.debug('Redis client closed', { client: name });
  });

  return client;
}

/**
 * QUIT, falling back to a hard disconnect if the server is unreachable.
 */
export async function closeRedisClient(client: Redis, logger: ILogger): Promise<void> {
  try {
    await client.quit();
  } catch (error) {
    logger.warn('Redis QUIT failed, disconnecting', { error: error instanceof Error ? error.message : String(error) });
    client.disconnect();
  }
}
