/**
 * In-memory result cache with TTL expiry and bounded-size LRU eviction.
 *
 * Keys are content hashes of (tenant, normalized text). Entries keep the
 * result computed under whichever model was active at the time; a model
 * swap does not invalidate them, the TTL bounds the staleness.
 *
 * All operations are synchronous, so each one is atomic on the event loop.
 */

import { createHash } from 'crypto';

// ============================================================================
// Types
// ============================================================================

export interface CacheEntry<V> {
  key: string;
  value: V;
  /** Epoch ms after which the entry is treated as missing */
  expiresAt: number;
}

export interface ResultCacheOptions {
  /** Default time-to-live in ms (default: 1 hour) */
  ttlMs?: number;
  /** Maximum entries before least-recently-used eviction (default: 1000) */
  maxEntries?: number;
  /** Clock override for tests */
  now?: () => number;
}

export interface ResultCacheStats {
  size: number;
  maxEntries: number;
  ttlMs: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
}

const DEFAULT_TTL_MS = 60 * 60 * 1000;
const DEFAULT_MAX_ENTRIES = 1000;

// ============================================================================
// Key
// ============================================================================

/**
 * Build the cache key for a normalized query, scoped by tenant.
 * SHA-256 truncated to 32 hex characters.
 */
export function cacheKey(normalized: string, tenant?: string): string {
  return createHash('sha256')
    .update(`${tenant ?? ''}\u0000${normalized}`)
    .digest('hex')
    .slice(0, 32);
}

// ============================================================================
// ResultCache
// ============================================================================

/**
 * TTL + LRU cache. A Map keeps insertion order, so re-inserting on read
 * moves an entry to the most-recently-used end and the first key is
 * always the eviction candidate.
 */
export class ResultCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private ttlMs: number;
  private maxEntries: number;
  private readonly now: () => number;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(options: ResultCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Look up a live entry. Expired entries are removed and reported as a miss.
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /** Presence check that does not touch recency or hit counters. */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && entry.expiresAt > this.now();
  }

  /**
   * Insert or overwrite an entry, evicting least-recently-used entries
   * when over capacity.
   */
  put(key: string, value: V, ttlMs: number = this.ttlMs): void {
    this.entries.delete(key);
    this.entries.set(key, { key, value, expiresAt: this.now() + ttlMs });
    this.evictOverflow();
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Remove every expired entry.
   *
   * @returns Number of entries removed
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
    this.expirations += removed;
    return removed;
  }

  /** Apply new limits; shrinking the capacity evicts immediately. */
  configure(options: Pick<ResultCacheOptions, 'ttlMs' | 'maxEntries'>): void {
    this.ttlMs = options.ttlMs ?? this.ttlMs;
    this.maxEntries = options.maxEntries ?? this.maxEntries;
    this.evictOverflow();
  }

  stats(): ResultCacheStats {
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      ttlMs: this.ttlMs,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}
