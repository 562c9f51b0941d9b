/**
 * @replay-editor/core
 *
 * Action stack model, region resolver, operation library, replay cache,
 * resolution engine and the session-level edit service.
 *
 * @packageDocumentation
 */

// Errors
export {
  ERROR_CODES,
  ReplayError,
  ValidationError,
  InvalidSelection,
  UnknownOperation,
  OutOfRange,
  DecodeError,
  CacheBackendError,
  SessionNotFound,
  errorMessage,
} from './errors';
export type { ErrorCode } from './errors';

// Logging
export { Logger, LogLevel, stderrSink, parseLogLevel } from './logger';
export type { LogSink } from './logger';

// Event bus
export { EventBusImpl, notify } from './event-bus';

// Pixel buffers and codecs
export {
  createBuffer,
  wrapBuffer,
  solidBuffer,
  cloneBuffer,
  buffersEqual,
  getPixel,
  cropBuffer,
  pasteBuffer,
} from './pixel-buffer';
export { encodePng, decodePng, isPng } from './png-codec';
export { encodeBuffer, decodeBuffer } from './buffer-codec';
export { stableStringify } from './stable-stringify';

// Actions and stacks
export {
  FILTER_NAMES,
  ENHANCEMENT_NAMES,
  MIN_ENHANCEMENT_FACTOR,
  MAX_ENHANCEMENT_FACTOR,
  isFilterName,
  isEnhancementName,
  createFilterAction,
  createEnhanceAction,
  parseAction,
  describeAction,
} from './action';
export { ActionStack, serializeActions } from './action-stack';
export { parseSelection } from './selection';

// Regions
export {
  fullRegion,
  emptyMask,
  resolveRect,
  resolveLasso,
  rasterizePolygon,
  resolveRegion,
  regionPixelCount,
  isEmptyRegion,
  isFullRegion,
} from './region-resolver';

// Operation library
export { applyOperation, referenceAdapter, convolve, enhance, KERNELS } from './operations';
export type { OperationAdapter, Kernel } from './operations';

// Cache
export { computeCacheKey, imageSignature, SIGNATURE_LENGTH } from './cache/cache-key';
export { ReplayCache, raceAbort } from './cache/replay-cache';
export type { ComputeFn, ReplayCacheOptions, GetOrComputeOptions } from './cache/replay-cache';
export { MemoryCacheBackend, DEFAULT_MAX_ENTRIES, DEFAULT_MAX_BYTES } from './cache/memory-backend';
export type { MemoryCacheOptions } from './cache/memory-backend';
export { FileCacheBackend } from './cache/file-backend';
export type { FileCacheOptions } from './cache/file-backend';

// Engine and sessions
export { ResolutionEngine } from './engine';
export type { ResolutionEngineOptions, ResolveRequest } from './engine';
export { createSessionStore } from './session-store';
export type { Session, SessionStore, SessionStoreState, SessionStoreActions } from './session-store';
export { EditService, DEFAULT_SESSION_TTL_MS } from './edit-service';
export type { EditServiceOptions } from './edit-service';
