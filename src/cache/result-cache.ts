import { Mutex } from 'async-mutex';

import type { CacheEntry, CacheKey, CacheStats, ParamsDigest, ResultCacheOptions } from './types.js';

import { invalidParameter } from '../errors.js';

const serializeKey = (key: CacheKey): string => `${key.contentHash}:${key.challengeType}`;

const isValidEntry = (entry: unknown): entry is CacheEntry => {
  if (entry === null || typeof entry !== 'object') return false;
  const candidate: Partial<Record<keyof CacheEntry, unknown>> = entry;
  return typeof candidate.result === 'string'
    && candidate.result.length > 0
    && typeof candidate.paramsDigest === 'string'
    && typeof candidate.createdAt === 'number'
    && Number.isFinite(candidate.createdAt)
    && typeof candidate.lastAccessAt === 'number'
    && Number.isFinite(candidate.lastAccessAt);
};

/**
 * Bounded, TTL-expiring, LRU-evicting map from (content hash, challenge type)
 * to a recognized result.
 *
 * Every read and write of the map runs under one mutex. The lock only ever
 * covers the map window; callers compute results outside of it.
 */
export class ResultCache {
  readonly maxSize: number;
  readonly ttlMs: number;

  private readonly entries = new Map<string, CacheEntry>();
  private readonly mutex = new Mutex();
  private readonly now: () => number;
  private readonly onAnomaly?: (message: string, key: CacheKey) => void;

  constructor(options: ResultCacheOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize <= 0) {
      throw invalidParameter('cache maxSize must be a positive integer', { maxSize: options.maxSize });
    }
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw invalidParameter('cache ttl must be positive', { ttlMs: options.ttlMs });
    }
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.onAnomaly = options.onAnomaly;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns a snapshot of the live entry and refreshes its recency.
   * Expired or malformed entries are removed and reported as absent.
   */
  async get(key: CacheKey): Promise<CacheEntry | undefined> {
    return await this.mutex.runExclusive(() => {
      const id = serializeKey(key);
      const entry: unknown = this.entries.get(id);
      if (entry === undefined) return undefined;
      if (!isValidEntry(entry)) {
        this.entries.delete(id);
        this.onAnomaly?.('dropped malformed cache entry', key);
        return undefined;
      }
      const nowMs = this.now();
      if (this.isExpired(entry, nowMs)) {
        this.entries.delete(id);
        return undefined;
      }
      entry.lastAccessAt = nowMs;
      // Re-insert so map order follows recency when timestamps tie.
      this.entries.delete(id);
      this.entries.set(id, entry);
      return { ...entry };
    });
  }

  async put(key: CacheKey, result: string, paramsDigest: ParamsDigest): Promise<void> {
    if (result.length === 0) {
      throw invalidParameter('cache result must be a non-empty string', { ...key });
    }
    await this.mutex.runExclusive(() => {
      const id = serializeKey(key);
      if (this.entries.has(id)) {
        this.entries.delete(id);
      } else if (this.entries.size >= this.maxSize) {
        this.evictLeastRecentlyUsed();
      }
      const nowMs = this.now();
      this.entries.set(id, { result, paramsDigest, createdAt: nowMs, lastAccessAt: nowMs });
    });
  }

  async delete(key: CacheKey): Promise<boolean> {
    return await this.mutex.runExclusive(() => this.entries.delete(serializeKey(key)));
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.entries.clear();
    });
  }

  async stats(): Promise<CacheStats> {
    return await this.mutex.runExclusive(() => {
      const nowMs = this.now();
      const expired = [...this.entries.values()].filter((entry) => this.isExpired(entry, nowMs)).length;
      return {
        total: this.entries.size,
        expired,
        active: this.entries.size - expired,
        maxSize: this.maxSize,
        ttlMs: this.ttlMs,
      };
    });
  }

  private isExpired(entry: CacheEntry, nowMs: number): boolean {
    return nowMs - entry.createdAt > this.ttlMs;
  }

  private evictLeastRecentlyUsed(): void {
    let victim: string | undefined;
    let oldest = Number.POSITIVE_INFINITY;
    this.entries.forEach((entry, id) => {
      if (entry.lastAccessAt < oldest) {
        oldest = entry.lastAccessAt;
        victim = id;
      }
    });
    if (victim !== undefined) this.entries.delete(victim);
  }
}
