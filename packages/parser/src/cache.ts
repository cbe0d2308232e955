import { DEFAULT_CACHE_MAX_SIZE, DEFAULT_CACHE_TTL_MS } from '@symbolscope/core';
import type { AST } from './ast/types.js';

/**
 * AST stored together with the version and content hash it was produced for.
 */
export interface CachedAST {
  ast: AST;
  version: string;
  hash: string;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  maxSize: number;
}

/**
 * Parse-result cache keyed by `(filePath, version)`.
 * Implementations may throw from any method; callers treat that as non-fatal.
 */
export interface ASTCache {
  /** Stored entry for the path at this version, or undefined */
  get(filePath: string, version: string): CachedAST | undefined;
  set(filePath: string, entry: CachedAST): void;
  /** Drop the path's entry whatever its version */
  invalidate(filePath: string): void;
  clear(): void;
  stats(): CacheStats;
}

interface Slot {
  entry: CachedAST;
  storedAt: number;
}

export interface LRUCacheOptions {
  maxSize?: number;
  ttlMs?: number;
  /** Epoch-millisecond clock; injectable for tests */
  now?: () => number;
}

/**
 * In-memory LRU cache with a TTL.
 *
 * Recency is the Map's insertion order: a hit re-inserts its key, and eviction removes the
 * first key. Expired entries are dropped on read.
 */
export class LRUCache implements ASTCache {
  private slots = new Map<string, Slot>();
  private maxSize: number;
  private ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: LRUCacheOptions = {}) {
    this.maxSize = options.maxSize && options.maxSize > 0 ? options.maxSize : DEFAULT_CACHE_MAX_SIZE;
    this.ttlMs = options.ttlMs && options.ttlMs > 0 ? options.ttlMs : DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get(filePath: string, version: string): CachedAST | undefined {
    const slot = this.slots.get(filePath);
    if (!slot || slot.entry.version !== version) {
      this.misses++;
      return undefined;
    }

    if (this.now() - slot.storedAt >= this.ttlMs) {
      this.slots.delete(filePath);
      this.evictions++;
      this.misses++;
      return undefined;
    }

    // Refresh recency
    this.slots.delete(filePath);
    this.slots.set(filePath, slot);
    this.hits++;
    return slot.entry;
  }

  set(filePath: string, entry: CachedAST): void {
    this.slots.delete(filePath);
    this.slots.set(filePath, { entry, storedAt: this.now() });
    this.evictOverflow();
  }

  invalidate(filePath: string): void {
    this.slots.delete(filePath);
  }

  clear(): void {
    this.slots.clear();
  }

  size(): number {
    return this.slots.size;
  }

  has(filePath: string): boolean {
    return this.slots.has(filePath);
  }

  setMaxSize(maxSize: number): void {
    if (maxSize > 0) {
      this.maxSize = maxSize;
      this.evictOverflow();
    }
  }

  setTTL(ttlMs: number): void {
    if (ttlMs > 0) {
      this.ttlMs = ttlMs;
    }
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.slots.size,
      maxSize: this.maxSize,
    };
  }

  private evictOverflow(): void {
    while (this.slots.size > this.maxSize) {
      const oldest = this.slots.keys().next().value;
      if (oldest === undefined) break;
      this.slots.delete(oldest);
      this.evictions++;
    }
  }
}
