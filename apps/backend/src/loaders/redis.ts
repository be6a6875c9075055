import { Redis } from 'ioredis';
import type { ILogger } from '@homehub/types';

export interface RedisSettings {
  url: string;
  namespace: string;
}

/**
 * Build the cache client. Every key it touches lives under `<namespace>:`;
 * the connection opens on `connect()` so startup can report a failure.
 */
export function createRedisClient(settings: RedisSettings, logger: ILogger): Redis {
  const log = logger.child({ module: 'redis' });
  const client = new Redis(settings.url, {
    keyPrefix: `${settings.namespace}:`,
    lazyConnect: true,
    maxRetriesPerRequest: 3
  });

  client.on('connect', () => log.info('Redis connected'));
  client.on('error', (error: Error) => log.error({ error }, 'Redis error'));

  return client;
}

export async function disconnectRedis(client: Redis): Promise<void> {
  if (client.status === 'end') {
    return;
  }
  await client.quit();
}
