/**
 * @replay-editor/types
 *
 * Shared type definitions for the replay editor.
 * This package contains zero runtime code: only TypeScript interfaces and
 * types that serve as the contract between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { PixelBuffer, Point, Size } from './common';

// Actions
export type {
  Action,
  ActionKind,
  EnhanceAction,
  EnhanceOperation,
  EnhancementName,
  FilterAction,
  FilterName,
  FilterOperation,
  LassoSelection,
  Operation,
  RectSelection,
  SelectionDescriptor,
} from './action';

// Resolved regions
export type { MaskRegion, RectRegion, ResolvedRegion } from './region';

// Replay cache
export type { CacheBackend, CacheLookup, CacheSource, CacheStats } from './cache';

// Sessions & results
export type {
  ResolveOptions,
  ResolveResult,
  SessionSummary,
  SubmitRequest,
  SubmitResult,
} from './session';

// Events
export type { EventBus, EventCallback, EventMap } from './events';
