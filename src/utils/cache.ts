/**
 * TTL-bounded LRU cache. Holds the raw device listings of each home.
 */

export interface CacheEntry<T> {
  value: T;
  cachedAt: number;
  expiresAt: number;
}

export interface CacheOptions {
  defaultTtlMs?: number;
  maxSize?: number;
}

export class LRUCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly defaultTtlMs: number;
  private readonly maxSize: number;

  constructor(options: CacheOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? 300000;
    this.maxSize = options.maxSize ?? 100;
  }

  /**
   * Returns null when absent or expired. A hit becomes the most recently used.
   */
  get(key: string): CacheEntry<T> | null {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return null;
    }
    if (Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  set(key: string, value: T, ttlMs = this.defaultTtlMs): void {
    this.entries.delete(key);
    if (this.entries.size >= this.maxSize) {
      // Map iteration order is insertion order, so the first key is the LRU one
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    const now = Date.now();
    this.entries.set(key, { value, cachedAt: now, expiresAt: now + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  static getCacheAgeSeconds(entry: CacheEntry<unknown>): number {
    return Math.floor((Date.now() - entry.cachedAt) / 1000);
  }
}
