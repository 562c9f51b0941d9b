/**
 * @module cache/replay-cache
 * Memoization of resolved buffers with single-flight computation.
 *
 * At most one lookup-or-compute runs per key at a time: the first caller
 * registers its promise before any `await`, later callers join it and receive
 * the same buffer or the same rejection. Rejected computations are never
 * stored. Backend read failures degrade to a miss; write failures are
 * reported but do not fail the caller.
 */

import type {
  CacheBackend,
  CacheLookup,
  CacheStats,
  EventBus,
  PixelBuffer,
} from '@replay-editor/types';
import { decodeBuffer, encodeBuffer } from '../buffer-codec';
import { errorMessage } from '../errors';
import { notify } from '../event-bus';
import { Logger } from '../logger';
import { cloneBuffer } from '../pixel-buffer';

const log = new Logger('ReplayCache');

export type ComputeFn = () => Promise<PixelBuffer>;

export interface ReplayCacheOptions {
  /** Receives `cache:*` events. */
  bus?: EventBus;
}

export interface GetOrComputeOptions {
  /** Abandon this caller's wait. A shared computation keeps running. */
  signal?: AbortSignal;
}

interface Flight {
  buffer: PixelBuffer;
  source: 'hit' | 'computed';
  writeError?: Error;
}

/** Settle with `promise`, or reject with the abort reason once `signal` fires. */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export class ReplayCache {
  private readonly inFlight = new Map<string, Promise<Flight>>();
  private readonly counters = {
    hits: 0,
    misses: 0,
    joins: 0,
    computations: 0,
    readErrors: 0,
    writeErrors: 0,
  };
  private readonly bus: EventBus | undefined;

  constructor(
    readonly backend: CacheBackend,
    options: ReplayCacheOptions = {},
  ) {
    this.bus = options.bus;
  }

  /**
   * Return the buffer stored under `key`, computing and storing it on a miss.
   * `compute` runs at most once per key across concurrent callers.
   */
  async getOrCompute(
    key: string,
    compute: ComputeFn,
    options: GetOrComputeOptions = {},
  ): Promise<CacheLookup> {
    options.signal?.throwIfAborted();

    const pending = this.inFlight.get(key);
    if (pending !== undefined) {
      this.counters.joins++;
      const flight = await raceAbort(pending, options.signal);
      return { buffer: cloneBuffer(flight.buffer), source: 'joined', writeError: flight.writeError };
    }

    const flight = this.lookup(key, compute);
    this.inFlight.set(key, flight);
    const settle = (): void => {
      this.inFlight.delete(key);
    };
    flight.then(settle, settle);

    const result = await raceAbort(flight, options.signal);
    return { buffer: cloneBuffer(result.buffer), source: result.source, writeError: result.writeError };
  }

  /** Remove one key from storage. */
  async invalidate(key: string): Promise<boolean> {
    return this.backend.delete(key);
  }

  /** Remove every stored buffer. Running computations are unaffected. */
  async clear(): Promise<void> {
    await this.backend.clear();
  }

  stats(): CacheStats {
    return { ...this.counters, inFlight: this.inFlight.size };
  }

  // ── helpers ──

  private async lookup(key: string, compute: ComputeFn): Promise<Flight> {
    const stored = await this.read(key);
    if (stored !== undefined) {
      this.counters.hits++;
      notify(this.bus, 'cache:hit', { key }, log);
      return { buffer: stored, source: 'hit' };
    }

    this.counters.misses++;
    notify(this.bus, 'cache:miss', { key }, log);
    this.counters.computations++;
    const buffer = await compute();
    const writeError = await this.write(key, buffer);
    return { buffer, source: 'computed', writeError };
  }

  private async read(key: string): Promise<PixelBuffer | undefined> {
    let bytes: Uint8Array | undefined;
    try {
      bytes = await this.backend.get(key);
    } catch (err) {
      this.readFailed(key, err);
      return undefined;
    }
    if (bytes === undefined) return undefined;
    try {
      return decodeBuffer(bytes);
    } catch (err) {
      this.readFailed(key, err);
      return undefined;
    }
  }

  private readFailed(key: string, err: unknown): void {
    const message = errorMessage(err);
    this.counters.readErrors++;
    log.warn(`Read of ${key.slice(0, 12)} from ${this.backend.name} failed, recomputing: ${message}`);
    notify(this.bus, 'cache:read-failed', { key, message }, log);
  }

  private async write(key: string, buffer: PixelBuffer): Promise<Error | undefined> {
    try {
      await this.backend.put(key, encodeBuffer(buffer));
      return undefined;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.counters.writeErrors++;
      log.warn(`Write of ${key.slice(0, 12)} to ${this.backend.name} failed: ${error.message}`);
      notify(this.bus, 'cache:write-failed', { key, message: error.message }, log);
      return error;
    }
  }
}
