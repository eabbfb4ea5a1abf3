import Redis from 'ioredis';
import { env } from '../env';
import { log } from '../log';

export type RedisClient = Redis;

const MAX_RECONNECT_DELAY_MS = 5_000;

let shared: Redis | null = null;

/**
 * Namespace configuration is only ever read here. The client connects on first
 * use, so a process without Redis still starts and every lookup loads as null.
 */
export function createRedisClient(url: string = env.REDIS_URL): Redis {
  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    retryStrategy: (attempt) => Math.min(attempt * 200, MAX_RECONNECT_DELAY_MS),
  });

  client.on('ready', () => {
    log.info({ event: 'redis_ready' }, 'namespace config store ready');
  });

  client.on('reconnecting', (delayMs: number) => {
    log.warn({ event: 'redis_reconnecting', delay_ms: delayMs }, 'namespace config store reconnecting');
  });

  client.on('error', (error) => {
    log.error({ err: error, event: 'redis_error' }, 'namespace config store error');
  });

  return client;
}

export function getRedisClient(): Redis {
  if (!shared) {
    shared = createRedisClient();
  }
  return shared;
}

export async function closeRedisClient(): Promise<void> {
  const client = shared;
  shared = null;
  if (client) {
    await client.quit();
  }
}
