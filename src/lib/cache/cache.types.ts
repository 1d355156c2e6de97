/**
 * Response cache contract shared by the memory and file backends.
 * Values are serialized response bodies; TTLs are in seconds.
 */

export interface CacheEntry {
  key: string;
  value: string;
  expiresAt: number;
  lastAccessAt: number;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
  evictions: number;
}

export interface ResponseCache {
  readonly name: string;
  /** Returns null when the key is absent or expired. */
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  stats(): CacheStats;
}

export interface CacheOptions {
  maxEntries: number;
  /** Clock override for tests. */
  now?: () => number;
}
