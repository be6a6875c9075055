/**
 * Key-value cache with TTL semantics.
 *
 * The orchestrator treats the cache as an optimisation only. Every value can
 * be rebuilt from the repositories, so callers tolerate misses.
 */
export interface ICacheService {
    /**
     * Retrieve a cached value by key.
     *
     * @returns Parsed value, or null on miss or expiry
     */
    get<T>(key: string): Promise<T | null>;

    /**
     * Store a JSON-serialisable value, optionally expiring after `ttlSeconds`.
     *
     * @example
     * ```typescript
     * await cache.set('plugins:list', records, 60);
     * ```
     */
    set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;

    /**
     * Delete a single key.
     *
     * @returns Number of keys removed (0 or 1)
     */
    delete(key: string): Promise<number>;

    /**
     * Delete every key matching a glob pattern such as `devices:*`.
     *
     * @returns Number of keys removed
     */
    deletePattern(pattern: string): Promise<number>;
}
