/**
 * @fileoverview TTL + FIFO bounded caches for ranking
 *
 * Two independent caches back the ranker: dimension-alignment results keyed by
 * (query fingerprint, chunk id, profile id), and query embeddings keyed by
 * query text. Both follow the same eviction contract:
 *
 * - A lookup of an entry older than the TTL is a miss and removes the entry.
 * - An insert at capacity first drops expired entries, then evicts the oldest
 *   entry by insertion time.
 * - Reading an entry never extends its life. Overwriting a key counts as a
 *   fresh insertion.
 *
 * Every operation is synchronous. Concurrent queries interleave only at
 * `await` points, so no caller can observe a half-inserted or half-evicted
 * entry.
 *
 * @packageDocumentation
 */

import { Errors, type CacheName } from '../core/errors.js';
import type { CacheSettings } from '../config/schema.js';
import { toError } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Statistics about one cache.
 */
export interface CacheStats {
  /** Entries currently held (expired ones included until swept) */
  entries: number;
  hits: number;
  misses: number;
  /** Hit rate as a percentage (0-100) */
  hitRate: number;
  /** Entries dropped because they outlived the TTL */
  ttlExpirations: number;
  /** Entries dropped to make room */
  evictions: number;
}

export type EvictionReason = 'ttl' | 'capacity' | 'manual';

export interface TtlFifoCacheOptions {
  /** Maximum number of entries before FIFO eviction */
  maxEntries: number;
  /** Time-to-live in milliseconds */
  ttlMs: number;
  /** Clock in milliseconds; injectable for tests */
  now?: () => number;
  onEvict?: (key: string, reason: EvictionReason) => void;
}

/**
 * Storage contract the ranker's caches are written against. Implementations
 * may be remote; any throw is reported to the ranker as CacheUnavailableError.
 */
export interface CacheStore<T> {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
  clear(): number;
  getStats(): CacheStats;
}

interface CacheEntry<T> {
  readonly value: T;
  readonly insertedAt: number;
}

// ============================================================================
// IN-MEMORY TTL + FIFO CACHE
// ============================================================================

export class TtlFifoCache<T> implements CacheStore<T> {
  // Map iteration order is insertion order, which is the eviction order.
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly onEvict?: (key: string, reason: EvictionReason) => void;
  private hits = 0;
  private misses = 0;
  private ttlExpirations = 0;
  private evictions = 0;

  constructor(options: TtlFifoCacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries <= 0) {
      throw new Error('Cache size must be a positive integer');
    }
    if (!(options.ttlMs > 0)) {
      throw new Error('Cache TTL must be positive');
    }
    this.maxEntries = options.maxEntries;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.onEvict = options.onEvict;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      this.ttlExpirations++;
      this.misses++;
      this.onEvict?.(key, 'ttl');
      return undefined;
    }

    this.hits++;
    return entry.value;
  }

  set(key: string, value: T): void {
    const now = this.now();

    // Re-inserting moves the key to the back of the eviction order.
    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries) {
      this.sweepExpired(now);
    }
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
      this.onEvict?.(oldest.value, 'capacity');
    }

    this.entries.set(key, { value, insertedAt: now });
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry, this.now());
  }

  /**
   * Remove every expired entry.
   *
   * @returns Number of entries removed
   */
  invalidateStale(): number {
    return this.sweepExpired(this.now());
  }

  clear(): number {
    const count = this.entries.size;
    for (const key of this.entries.keys()) {
      this.onEvict?.(key, 'manual');
    }
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.ttlExpirations = 0;
    this.evictions = 0;
    return count;
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    const totalRequests = this.hits + this.misses;
    const hitRate = totalRequests > 0 ? (this.hits / totalRequests) * 100 : 0;
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: Math.round(hitRate * 100) / 100,
      ttlExpirations: this.ttlExpirations,
      evictions: this.evictions,
    };
  }

  getTtlMs(): number {
    return this.ttlMs;
  }

  private isExpired(entry: CacheEntry<T>, now: number): boolean {
    return now - entry.insertedAt > this.ttlMs;
  }

  private sweepExpired(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        this.ttlExpirations++;
        this.onEvict?.(key, 'ttl');
        removed++;
      }
    }
    return removed;
  }
}

// ============================================================================
// SCORE CACHE
// ============================================================================

export interface AlignmentCacheKey {
  readonly fingerprint: string;
  readonly chunkId: string;
  readonly profileId: string;
}

export interface ScoreCacheOptions {
  now?: () => number;
  /** Replace the in-memory alignment store */
  alignmentStore?: CacheStore<number>;
  /** Replace the in-memory query-embedding store */
  embeddingStore?: CacheStore<readonly number[]>;
}

export interface ScoreCacheStats {
  alignment: CacheStats | null;
  queryEmbedding: CacheStats | null;
}

export function alignmentCacheKey(key: AlignmentCacheKey): string {
  return JSON.stringify([key.fingerprint, key.chunkId, key.profileId]);
}

/**
 * The ranker's two caches. A disabled cache always misses and ignores writes.
 * Store failures are rethrown as CacheUnavailableError.
 */
export class ScoreCache {
  private readonly alignment: CacheStore<number> | null;
  private readonly embeddings: CacheStore<readonly number[]> | null;

  constructor(settings: CacheSettings, options: ScoreCacheOptions = {}) {
    this.alignment = settings.enableDimensionCache
      ? options.alignmentStore ?? new TtlFifoCache<number>({
        maxEntries: settings.cacheSize,
        ttlMs: settings.cacheTtlMs,
        now: options.now,
      })
      : null;
    this.embeddings = settings.enableQueryCache
      ? options.embeddingStore ?? new TtlFifoCache<readonly number[]>({
        maxEntries: settings.queryCacheSize,
        ttlMs: settings.cacheTtlMs,
        now: options.now,
      })
      : null;
  }

  getAlignment(key: AlignmentCacheKey): number | undefined {
    const store = this.alignment;
    if (!store) return undefined;
    return guard('alignment', 'get', () => store.get(alignmentCacheKey(key)));
  }

  setAlignment(key: AlignmentCacheKey, alignment: number): void {
    const store = this.alignment;
    if (!store) return;
    guard('alignment', 'set', () => store.set(alignmentCacheKey(key), alignment));
  }

  getEmbedding(queryKey: string): readonly number[] | undefined {
    const store = this.embeddings;
    if (!store) return undefined;
    return guard('query_embedding', 'get', () => store.get(queryKey));
  }

  setEmbedding(queryKey: string, embedding: readonly number[]): void {
    const store = this.embeddings;
    if (!store) return;
    guard('query_embedding', 'set', () => store.set(queryKey, embedding));
  }

  clear(): number {
    let cleared = 0;
    const alignment = this.alignment;
    const embeddings = this.embeddings;
    if (alignment) cleared += guard('alignment', 'clear', () => alignment.clear());
    if (embeddings) cleared += guard('query_embedding', 'clear', () => embeddings.clear());
    return cleared;
  }

  getStats(): ScoreCacheStats {
    return {
      alignment: this.alignment?.getStats() ?? null,
      queryEmbedding: this.embeddings?.getStats() ?? null,
    };
  }
}

function guard<T>(cache: CacheName, operation: 'get' | 'set' | 'clear', fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    const cause = toError(error);
    throw Errors.cacheUnavailable(cache, operation, cause.message, cause);
  }
}
