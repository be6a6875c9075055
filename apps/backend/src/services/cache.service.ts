import type { ICacheService, ILogger } from '@homehub/types';

/**
 * The ioredis commands the cache uses. An ioredis `Redis` instance satisfies
 * it directly.
 */
export interface RedisCommands {
  readonly options: { keyPrefix?: string };
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, expiryMode: 'EX', seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(cursor: string, matchToken: 'MATCH', pattern: string, countToken: 'COUNT', count: number): Promise<[string, string[]]>;
}

/**
 * RedisCacheService
 *
 * Redis-backed key-value cache for plugin records, device lookups and the
 * namespaced scratch space handed to plugins. Values are stored as JSON with
 * an optional expiry.
 *
 * Key prefix handling:
 * The client applies its `keyPrefix` to commands but not to SCAN patterns or
 * the keys SCAN returns, so `deletePattern()` adds the prefix to the pattern
 * and strips it from each result before deleting.
 */
export class RedisCacheService implements ICacheService {
  private readonly logger: ILogger;

  /**
   * @param redis - Connected ioredis client
   * @param logger - Parent logger
   * @param scanCount - SCAN batch hint
   */
  constructor(
    private readonly redis: RedisCommands,
    logger: ILogger,
    private readonly scanCount = 200
  ) {
    this.logger = logger.child({ module: 'cache' });
  }

  async get<T>(key: string): Promise<T | null> {
    const cached = await this.redis.get(key);
    if (cached === null) {
      return null;
    }
    try {
      const value: T = JSON.parse(cached);
      return value;
    } catch (error) {
      this.logger.warn({ key, error }, 'Discarding unparseable cache entry');
      await this.redis.del(key);
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const payload = JSON.stringify(value);
    if (ttlSeconds) {
      await this.redis.set(key, payload, 'EX', ttlSeconds);
    } else {
      await this.redis.set(key, payload);
    }
  }

  async delete(key: string): Promise<number> {
    return await this.redis.del(key);
  }

  /**
   * Delete every key matching a glob pattern, scanning in batches so large
   * keyspaces never block the server the way KEYS would.
   */
  async deletePattern(pattern: string): Promise<number> {
    const prefix = this.redis.options.keyPrefix ?? '';
    let cursor = '0';
    let removed = 0;

    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', `${prefix}${pattern}`, 'COUNT', this.scanCount);
      cursor = next;
      const unprefixed = keys.map(key => (key.startsWith(prefix) ? key.slice(prefix.length) : key));
      if (unprefixed.length > 0) {
        removed += await this.redis.del(...unprefixed);
      }
    } while (cursor !== '0');

    this.logger.debug({ pattern, removed }, 'Cache pattern invalidated');
    return removed;
  }
}
