/**
 * TTL Cache - entries expire a fixed time after insertion
 *
 * Expired entries are dropped on read and by prune(); set() prunes
 * at most once per TTL window. There is no size bound.
 */

export interface TtlCacheOptions {
  ttlMs: number;
  now?: () => number;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<K, V> {
  private entries = new Map<K, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private lastPrune: number;

  constructor(options: TtlCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new Error(`TTL must be a positive number of milliseconds, got ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.lastPrune = this.now();
  }

  get ttl(): number {
    return this.ttlMs;
  }

  /**
   * Number of stored entries, including expired ones not yet pruned
   */
  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): void {
    const now = this.now();
    if (now - this.lastPrune >= this.ttlMs) {
      this.prune();
    }
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Remove every expired entry, returns how many were removed
   */
  prune(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }

    this.lastPrune = now;
    return removed;
  }
}
