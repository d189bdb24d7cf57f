/**
 * Simple in-memory cache with TTL support for upstream responses.
 *
 * Scores change during live games, so keep TTLs short (the default is 60s);
 * standings can live longer.
 */

interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

// Default TTL of 60 seconds
const DEFAULT_TTL_MS = 60 * 1000;
const DEFAULT_MAX_ENTRIES = 500;

export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();

  constructor(
    private defaultTtlMs: number = DEFAULT_TTL_MS,
    private maxEntries: number = DEFAULT_MAX_ENTRIES,
  ) {}

  /**
   * Get a cached value or compute it if missing/expired.
   * A failed fetch caches nothing. Writes prune expired entries and evict the
   * oldest ones past `maxEntries`.
   */
  async getOrCompute(key: string, fetcher: () => Promise<T>, ttlMs: number = this.defaultTtlMs): Promise<T> {
    const now = Date.now();
    const entry = this.entries.get(key);

    if (entry && entry.expiresAt > now) {
      return entry.data;
    }

    const data = await fetcher();

    this.prune(Date.now());
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, {
      data,
      expiresAt: now + ttlMs,
    });

    return data;
  }

  /**
   * Drop every expired entry.
   */
  prune(now: number = Date.now()): void {
    for (const [key, entry] of Array.from(this.entries.entries())) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  /**
   * Invalidate a specific cache key.
   */
  invalidate(key: string): void {
    this.entries.delete(key);
  }

  /**
   * Invalidate all keys matching a pattern.
   */
  invalidatePattern(pattern: RegExp): void {
    for (const key of Array.from(this.entries.keys())) {
      if (pattern.test(key)) {
        this.entries.delete(key);
      }
    }
  }

  /**
   * Clear all cached data.
   */
  clearAll(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
