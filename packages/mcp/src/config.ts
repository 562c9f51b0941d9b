/**
 * @module config
 * Server configuration read once from the environment.
 *
 * | Variable | Default |
 * |---|---|
 * | `REPLAY_CACHE_BACKEND` | `memory` (`memory` or `file`) |
 * | `REPLAY_CACHE_DIR` | `<os tmpdir>/replay-editor-cache` |
 * | `REPLAY_CACHE_MAX_ENTRIES` | `256` (at least 1; the file backend prunes beyond it) |
 * | `REPLAY_CACHE_MAX_BYTES` | `536870912` |
 * | `REPLAY_CACHE_TTL_MS` | `0` (no expiry) |
 * | `REPLAY_SESSION_TTL_MS` | `1800000` (0 = never) |
 * | `REPLAY_LOG_LEVEL` | `info` |
 *
 * Cache keys embed the session id, so entries of a replaced or expired
 * session are never read again and only leave through this entry bound.
 */

import os from 'node:os';
import path from 'node:path';
import {
  DEFAULT_MAX_BYTES,
  DEFAULT_MAX_ENTRIES,
  DEFAULT_SESSION_TTL_MS,
  LogLevel,
  parseLogLevel,
} from '@replay-editor/core';

export type CacheBackendKind = 'memory' | 'file';

export interface ServerConfig {
  readonly cacheBackend: CacheBackendKind;
  readonly cacheDir: string;
  readonly cacheMaxEntries: number;
  readonly cacheMaxBytes: number;
  readonly cacheTtlMs: number;
  readonly sessionTtlMs: number;
  readonly logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a non-negative integer, got '${raw}'`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readBackend(env: Env): CacheBackendKind {
  const raw = readString(env, 'REPLAY_CACHE_BACKEND')?.toLowerCase() ?? 'memory';
  if (raw !== 'memory' && raw !== 'file') {
    throw new Error(`REPLAY_CACHE_BACKEND must be 'memory' or 'file', got '${raw}'`);
  }
  return raw;
}

function readLogLevel(env: Env): LogLevel {
  const raw = readString(env, 'REPLAY_LOG_LEVEL');
  if (raw === undefined) return LogLevel.INFO;
  const level = parseLogLevel(raw);
  if (level === null) {
    throw new Error(`REPLAY_LOG_LEVEL must be one of debug, info, warn, error, silent; got '${raw}'`);
  }
  return level;
}

/** Build the configuration from `env`. Throws on the first invalid value. */
export function loadConfig(env: Env = process.env): ServerConfig {
  const backend = readBackend(env);
  return Object.freeze({
    cacheBackend: backend,
    cacheDir: path.resolve(readString(env, 'REPLAY_CACHE_DIR') ?? path.join(os.tmpdir(), 'replay-editor-cache')),
    cacheMaxEntries: readInteger(env, 'REPLAY_CACHE_MAX_ENTRIES', DEFAULT_MAX_ENTRIES, 1),
    cacheMaxBytes: readInteger(env, 'REPLAY_CACHE_MAX_BYTES', DEFAULT_MAX_BYTES, 1),
    cacheTtlMs: readInteger(env, 'REPLAY_CACHE_TTL_MS', 0, 0),
    sessionTtlMs: readInteger(env, 'REPLAY_SESSION_TTL_MS', DEFAULT_SESSION_TTL_MS, 0),
    logLevel: readLogLevel(env),
  });
}
