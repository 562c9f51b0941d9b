/**
 * @module cache/memory-backend
 * In-process cache storage: an LRU map bounded by entry count and total
 * bytes, with optional time-based expiry.
 *
 * Map insertion order doubles as recency order; `get` re-inserts the entry
 * so the oldest key is always first.
 */

import type { CacheBackend } from '@replay-editor/types';
import { Logger } from '../logger';

const log = new Logger('MemoryCache');

export interface MemoryCacheOptions {
  /** Maximum number of entries. Default: 256. */
  maxEntries?: number;
  /** Maximum total stored bytes. Default: 512 MiB. */
  maxBytes?: number;
  /** Entries older than this many ms are dropped on access. 0 disables expiry. */
  ttlMs?: number;
  /** Clock used for expiry. Default: `Date.now`. */
  now?: () => number;
}

interface Entry {
  value: Uint8Array;
  storedAt: number;
}

export const DEFAULT_MAX_ENTRIES = 256;
export const DEFAULT_MAX_BYTES = 512 * 1024 * 1024;

export class MemoryCacheBackend implements CacheBackend {
  readonly name = 'memory';

  private readonly entries = new Map<string, Entry>();
  private readonly maxEntries: number;
  private readonly maxBytes: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private totalBytes = 0;

  constructor(options: MemoryCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.maxBytes = Math.max(1, options.maxBytes ?? DEFAULT_MAX_BYTES);
    this.ttlMs = Math.max(0, options.ttlMs ?? 0);
    this.now = options.now ?? Date.now;
  }

  /** Number of live entries (expired ones are counted until touched). */
  get size(): number {
    return this.entries.size;
  }

  /** Total bytes currently held. */
  get bytes(): number {
    return this.totalBytes;
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (this.isExpired(entry)) {
      this.remove(key, entry);
      return undefined;
    }
    // Refresh position: delete and re-insert to move to end (most recent)
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      this.remove(key, existing);
    }
    if (value.byteLength > this.maxBytes) {
      log.debug(`Skipping ${key.slice(0, 12)}: ${value.byteLength} bytes exceeds the ${this.maxBytes} byte limit`);
      return;
    }
    this.entries.set(key, { value, storedAt: this.now() });
    this.totalBytes += value.byteLength;
    this.evict();
  }

  async delete(key: string): Promise<boolean> {
    const entry = this.entries.get(key);
    if (entry === undefined) return false;
    this.remove(key, entry);
    return true;
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.totalBytes = 0;
  }

  /** Drop every expired entry. Returns how many were removed. */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.remove(key, entry);
        removed++;
      }
    }
    return removed;
  }

  private isExpired(entry: Entry): boolean {
    return this.ttlMs > 0 && this.now() - entry.storedAt >= this.ttlMs;
  }

  private remove(key: string, entry: Entry): void {
    this.entries.delete(key);
    this.totalBytes -= entry.value.byteLength;
  }

  private evict(): void {
    for (const [key, entry] of this.entries) {
      if (this.entries.size <= this.maxEntries && this.totalBytes <= this.maxBytes) break;
      this.remove(key, entry);
      log.debug(`Evicted ${key.slice(0, 12)}`);
    }
  }
}
