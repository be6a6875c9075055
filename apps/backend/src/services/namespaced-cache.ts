import type { ICacheService } from '@homehub/types';

/**
 * View of a cache confined to keys under `prefix`.
 *
 * Plugins receive one scoped to `plugin:<id>:` so they cannot read or evict
 * each other's entries, and uninstall can purge the whole namespace.
 */
export class NamespacedCache implements ICacheService {
  constructor(
    private readonly inner: ICacheService,
    private readonly prefix: string
  ) {}

  static forPlugin(inner: ICacheService, pluginId: string): NamespacedCache {
    return new NamespacedCache(inner, `plugin:${pluginId}:`);
  }

  get<T>(key: string): Promise<T | null> {
    return this.inner.get<T>(this.prefix + key);
  }

  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    return this.inner.set(this.prefix + key, value, ttlSeconds);
  }

  delete(key: string): Promise<number> {
    return this.inner.delete(this.prefix + key);
  }

  deletePattern(pattern: string): Promise<number> {
    return this.inner.deletePattern(this.prefix + pattern);
  }
}
