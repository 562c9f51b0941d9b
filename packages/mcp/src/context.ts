/**
 * @module context
 * Wires the edit service, replay cache and event bus from a {@link ServerConfig}.
 */

import type { CacheBackend } from '@replay-editor/types';
import {
  EditService,
  EventBusImpl,
  FileCacheBackend,
  Logger,
  MemoryCacheBackend,
  ReplayCache,
  ResolutionEngine,
} from '@replay-editor/core';
import type { ServerConfig } from './config.js';

const log = new Logger('MCP');

export interface ToolContext {
  service: EditService;
  cache: ReplayCache;
  bus: EventBusImpl;
}

function createBackend(config: ServerConfig): CacheBackend {
  if (config.cacheBackend === 'file') {
    return new FileCacheBackend({ dir: config.cacheDir, threshold: config.cacheMaxEntries });
  }
  return new MemoryCacheBackend({
    maxEntries: config.cacheMaxEntries,
    maxBytes: config.cacheMaxBytes,
    ttlMs: config.cacheTtlMs,
  });
}

export function createContext(config: ServerConfig): ToolContext {
  const bus = new EventBusImpl();
  const backend = createBackend(config);
  const cache = new ReplayCache(backend, { bus });
  const engine = new ResolutionEngine({ cache, bus });
  const service = new EditService({ engine, bus, sessionTtlMs: config.sessionTtlMs });

  log.info(`Cache backend: ${backend.name}, session TTL ${config.sessionTtlMs}ms`);
  return { service, cache, bus };
}
