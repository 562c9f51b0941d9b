/**
 * @module cache
 * Contracts for the replay cache and its storage backends.
 */

import type { PixelBuffer } from './common';

/**
 * Byte-oriented key/value storage under the replay cache.
 *
 * Implementations may be in-memory, on disk, or remote. Failures must be
 * reported by rejecting with a `CacheBackendError`.
 */
export interface CacheBackend {
  /** Human-readable backend name used in logs. */
  readonly name: string;
  /** Return the stored bytes, or `undefined` when the key is absent or evicted. */
  get(key: string): Promise<Uint8Array | undefined>;
  /** Store bytes under `key`, replacing any previous value. */
  put(key: string, value: Uint8Array): Promise<void>;
  /** Remove `key`. Resolves `true` when something was removed. */
  delete(key: string): Promise<boolean>;
  /** Remove every entry. */
  clear(): Promise<void>;
}

/** How a `getOrCompute` call obtained its buffer. */
export type CacheSource = 'hit' | 'computed' | 'joined';

/** Result of a single `getOrCompute` call. */
export interface CacheLookup {
  /** The resolved buffer. Callers own this copy. */
  buffer: PixelBuffer;
  /** `hit` from storage, `computed` by this caller, `joined` onto another caller's computation. */
  source: CacheSource;
  /** Set when the buffer was computed but could not be written to the backend. */
  writeError?: Error;
}

/** Counters exposed by the replay cache. */
export interface CacheStats {
  hits: number;
  misses: number;
  joins: number;
  computations: number;
  readErrors: number;
  writeErrors: number;
  /** Keys with a computation currently running. */
  inFlight: number;
}
