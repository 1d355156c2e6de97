/**
 * Cache Manager
 * In-memory response cache with TTL and LRU eviction
 *
 * Features:
 * - Time-based expiration (TTL)
 * - Bounded size, least-recently-used entry evicted on overflow
 * - Hit/miss tracking
 *
 * Map iteration order is insertion order; re-inserting on every hit keeps the
 * least-recently-used entry first.
 */

import type { CacheEntry, CacheOptions, CacheStats, ResponseCache } from './cache.types.js';

export class MemoryCache implements ResponseCache {
  readonly name = 'memory';

  private entries = new Map<string, CacheEntry>();
  private counters = {
    hits: 0,
    misses: 0,
    evictions: 0,
  };
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: CacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${options.maxEntries}`);
    }
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);

    if (!entry) {
      this.counters.misses++;
      return null;
    }

    const now = this.now();
    if (entry.expiresAt <= now) {
      this.entries.delete(key);
      this.counters.misses++;
      return null;
    }

    entry.lastAccessAt = now;
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.counters.hits++;

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = this.now();
    this.entries.delete(key);

    while (this.entries.size >= this.maxEntries) {
      this.evictLeastRecentlyUsed();
    }

    this.entries.set(key, {
      key,
      value,
      expiresAt: now + ttlSeconds * 1000,
      lastAccessAt: now,
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.counters.evictions = 0;
  }

  stats(): CacheStats {
    const total = this.counters.hits + this.counters.misses;
    return {
      size: this.entries.size,
      hits: this.counters.hits,
      misses: this.counters.misses,
      hitRate: total > 0 ? this.counters.hits / total : 0,
      evictions: this.counters.evictions,
    };
  }

  /**
   * Keys from least to most recently used (for debugging and tests)
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Drop expired entries; returns how many were removed
   */
  cleanup(): number {
    const now = this.now();
    let cleaned = 0;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        cleaned++;
      }
    }

    return cleaned;
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;
    this.entries.delete(oldest.value);
    this.counters.evictions++;
  }
}
