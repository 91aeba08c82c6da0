/**
 * In-memory cache store
 */

import type { Logger } from 'pino';
import type { UnifiedCacheStore } from '../types.mjs';
import { componentLogger } from '../logger.mjs';

/**
 * In-memory store with LRU eviction. Not synchronised: share one instance
 * only within one event loop.
 */
export class MemoryCacheStore implements UnifiedCacheStore {
  readonly kind = 'unified';

  private cache: Map<string, Buffer> = new Map();
  private currentSize: number = 0;

  private readonly maxSize: number;
  private readonly maxEntries: number;
  private readonly maxEntrySize: number;
  private readonly logger: Logger;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxSize = options.maxSize ?? 100 * 1024 * 1024; // 100MB default
    this.maxEntries = options.maxEntries ?? 1000;
    this.maxEntrySize = options.maxEntrySize ?? 5 * 1024 * 1024; // 5MB default
    this.logger = options.logger ?? componentLogger('memory-store');
  }

  private deleteEntry(key: string): boolean {
    const entry = this.cache.get(key);
    if (entry) {
      this.currentSize -= entry.length;
      this.cache.delete(key);
      return true;
    }
    return false;
  }

  private evictIfNeeded(requiredSize: number): void {
    // Evict by size
    while (this.currentSize + requiredSize > this.maxSize && this.cache.size > 0) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey === undefined) break;
      this.deleteEntry(oldestKey);
    }

    // Evict by entry count
    while (this.cache.size >= this.maxEntries) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey === undefined) break;
      this.deleteEntry(oldestKey);
    }
  }

  async get(key: string): Promise<Buffer | null> {
    const entry = this.cache.get(key);
    if (!entry) {
      return null;
    }

    // Move to end for LRU
    this.cache.delete(key);
    this.cache.set(key, entry);

    return entry;
  }

  async set(key: string, value: Buffer): Promise<void> {
    // Remove existing entry if present
    this.deleteEntry(key);

    // Don't cache if entry is too large
    if (value.length > this.maxEntrySize) {
      this.logger.debug(
        { key, bytes: value.length, maxEntrySize: this.maxEntrySize },
        'entry larger than maxEntrySize, not kept'
      );
      return;
    }

    this.evictIfNeeded(value.length);

    this.cache.set(key, value);
    this.currentSize += value.length;
  }

  async delete(key: string): Promise<void> {
    this.deleteEntry(key);
  }

  async has(key: string): Promise<boolean> {
    return this.cache.has(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
    this.currentSize = 0;
  }

  async size(): Promise<number> {
    return this.cache.size;
  }

  async keys(): Promise<string[]> {
    return Array.from(this.cache.keys());
  }

  async close(): Promise<void> {
    this.cache.clear();
    this.currentSize = 0;
  }

  /**
   * Get cache statistics
   */
  getStats(): MemoryCacheStats {
    return {
      entries: this.cache.size,
      sizeBytes: this.currentSize,
      maxSizeBytes: this.maxSize,
      maxEntries: this.maxEntries,
      utilizationPercent: (this.currentSize / this.maxSize) * 100,
    };
  }
}

/**
 * Options for memory cache store
 */
export interface MemoryCacheStoreOptions {
  /** Maximum total cache size in bytes. Default: 100MB */
  maxSize?: number;
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Maximum size per entry in bytes. Default: 5MB */
  maxEntrySize?: number;
  logger?: Logger;
}

/**
 * Memory cache statistics
 */
export interface MemoryCacheStats {
  entries: number;
  sizeBytes: number;
  maxSizeBytes: number;
  maxEntries: number;
  utilizationPercent: number;
}

/**
 * Create a memory cache store
 */
export function createMemoryCacheStore(options?: MemoryCacheStoreOptions): MemoryCacheStore {
  return new MemoryCacheStore(options);
}
