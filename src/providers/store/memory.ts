import { LRUCache } from 'lru-cache';
import type { BlobStore } from './types';

export interface MemoryBlobStoreOptions {
  /** Maximum number of entries before least-recently-used eviction */
  maxEntries: number;
  /** Entry lifetime in milliseconds */
  ttlMs: number;
}

/**
 * Bounded in-process blob store.
 */
export class MemoryBlobStore implements BlobStore {
  private readonly cache: LRUCache<string, string>;

  constructor(options: MemoryBlobStoreOptions) {
    this.cache = new LRUCache<string, string>({
      max: options.maxEntries,
      ttl: options.ttlMs
    });
  }

  async get(key: string): Promise<string | undefined> {
    return this.cache.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    this.cache.set(key, value);
  }

  get size(): number {
    return this.cache.size;
  }
}
