// TTL-based cache for automatic expiration
// Reads refresh an entry's expiry; the sweep timer never keeps the process alive

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
  ttl: number;
}

export class TTLCache<K, V> {
  private cache = new Map<K, CacheEntry<V>>();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private defaultTTL: number = 60 * 60 * 1000, // 1 hour default
    private cleanupMs: number = 60 * 1000 // Cleanup every minute
  ) {
    this.startCleanup();
  }

  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, this.cleanupMs);
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
      }
    }
  }

  set(key: K, value: V, ttl?: number): void {
    const entryTtl = ttl ?? this.defaultTTL;
    this.cache.set(key, { value, expiresAt: Date.now() + entryTtl, ttl: entryTtl });
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    const now = Date.now();
    if (entry.expiresAt <= now) {
      this.cache.delete(key);
      return undefined;
    }

    entry.expiresAt = now + entry.ttl;
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }
}
