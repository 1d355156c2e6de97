/**
 * File Cache
 * Persists cached responses as one JSON record per key under a directory.
 *
 * File name = sha256(key). Each record keeps the full key, so a mismatch reads
 * as a miss. Writes go to a temp file and are renamed into place.
 *
 * `stats().size` counts the records already on disk once the cache has
 * been read or written; before the first call it is 0.
 *
 * Single-process, development use only: there is no locking, and two
 * processes writing the same directory may evict each other's entries.
 */

import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { cacheError } from '../errors/gurume-error.js';
import type { CacheEntry, CacheOptions, CacheStats, ResponseCache } from './cache.types.js';

const RECORD_SUFFIX = '.json';

const CacheRecordSchema = z.object({
  key: z.string(),
  value: z.string(),
  expiresAt: z.number(),
  lastAccessAt: z.number(),
});

export interface FileCacheOptions extends CacheOptions {
  dir: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileCache implements ResponseCache {
  readonly name = 'file';

  private readonly dir: string;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private counters = { hits: 0, misses: 0, evictions: 0 };
  private knownSize = 0;
  private sizeLoaded = false;

  constructor(options: FileCacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${options.maxEntries}`);
    }
    this.dir = path.resolve(options.dir);
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    await this.ensureSize();
    const file = this.fileFor(key);
    const record = await this.readRecord(file);

    if (!record || record.key !== key) {
      this.counters.misses++;
      return null;
    }

    const now = this.now();
    if (record.expiresAt <= now) {
      if (await this.remove(file)) this.shrink();
      this.counters.misses++;
      return null;
    }

    await this.writeRecord(file, { ...record, lastAccessAt: now });
    this.counters.hits++;
    return record.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = this.now();
    const file = this.fileFor(key);

    try {
      await mkdir(this.dir, { recursive: true });
    } catch (error) {
      throw cacheError(`cannot create cache directory ${this.dir}`, error);
    }

    await this.writeRecord(file, {
      key,
      value,
      expiresAt: now + ttlSeconds * 1000,
      lastAccessAt: now,
    });
    await this.enforceCapacity(path.basename(file));
  }

  async delete(key: string): Promise<boolean> {
    await this.ensureSize();
    const removed = await this.remove(this.fileFor(key));
    if (removed) this.shrink();
    return removed;
  }

  async clear(): Promise<void> {
    for (const name of await this.recordFiles()) {
      await this.remove(path.join(this.dir, name));
    }
    this.counters.evictions = 0;
    this.knownSize = 0;
    this.sizeLoaded = true;
  }

  stats(): CacheStats {
    const total = this.counters.hits + this.counters.misses;
    return {
      size: this.knownSize,
      hits: this.counters.hits,
      misses: this.counters.misses,
      hitRate: total > 0 ? this.counters.hits / total : 0,
      evictions: this.counters.evictions,
    };
  }

  private async ensureSize(): Promise<void> {
    if (this.sizeLoaded) return;
    this.knownSize = (await this.recordFiles()).length;
    this.sizeLoaded = true;
  }

  private shrink(): void {
    this.knownSize = Math.max(0, this.knownSize - 1);
  }

  private fileFor(key: string): string {
    const digest = createHash('sha256').update(key).digest('hex');
    return path.join(this.dir, `${digest}${RECORD_SUFFIX}`);
  }

  private async recordFiles(): Promise<string[]> {
    try {
      const names = await readdir(this.dir);
      return names.filter((name) => name.endsWith(RECORD_SUFFIX));
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw cacheError(`cannot list cache directory ${this.dir}`, error);
    }
  }

  private async readRecord(file: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw cacheError(`cannot read cache record ${path.basename(file)}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw cacheError(`corrupt cache record ${path.basename(file)}`, error);
    }

    const parsed = CacheRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw cacheError(`corrupt cache record ${path.basename(file)}`, parsed.error);
    }
    return parsed.data;
  }

  private async writeRecord(file: string, entry: CacheEntry): Promise<void> {
    const tmp = `${file}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, JSON.stringify(entry), 'utf8');
      await rename(tmp, file);
    } catch (error) {
      await rm(tmp, { force: true });
      throw cacheError(`cannot write cache record ${path.basename(file)}`, error);
    }
  }

  private async remove(file: string): Promise<boolean> {
    try {
      await rm(file);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw cacheError(`cannot delete cache record ${path.basename(file)}`, error);
    }
  }

  /**
   * Evict least-recently-accessed records until the directory fits maxEntries.
   * Unreadable records are evicted first.
   */
  private async enforceCapacity(keep: string): Promise<void> {
    const names = await this.recordFiles();
    this.knownSize = names.length;
    this.sizeLoaded = true;
    if (names.length <= this.maxEntries) return;

    const ranked: Array<{ name: string; lastAccessAt: number }> = [];
    for (const name of names) {
      if (name === keep) continue;
      const record = await this.readRecord(path.join(this.dir, name)).catch(() => null);
      ranked.push({ name, lastAccessAt: record?.lastAccessAt ?? -Infinity });
    }
    ranked.sort((a, b) => a.lastAccessAt - b.lastAccessAt);

    let excess = names.length - this.maxEntries;
    for (const { name } of ranked) {
      if (excess <= 0) break;
      if (await this.remove(path.join(this.dir, name))) {
        this.counters.evictions++;
        this.shrink();
      }
      excess--;
    }
  }
}
