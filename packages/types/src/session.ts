/**
 * @module session
 * Editing sessions and the results the edit service hands back to callers.
 */

import type { PixelBuffer } from './common';

/** Read-only view of a session for callers. */
export interface SessionSummary {
  /** Session identifier (UUID v4). */
  id: string;
  /** Short fingerprint of the uploaded image bytes. */
  signature: string;
  /** Canvas width in pixels. */
  width: number;
  /** Canvas height in pixels. */
  height: number;
  /** Number of actions on the stack. */
  stackLength: number;
  /** Mutation counter of the stack. */
  stackVersion: number;
  /** Canonical serialization of the stack. */
  stack: string;
  /** Epoch ms of creation. */
  createdAt: number;
  /** Epoch ms of the last call that touched the session. */
  lastAccessedAt: number;
}

/** Options accepted by every resolve entry point. */
export interface ResolveOptions {
  /**
   * Stop waiting when aborted. The shared computation keeps running for other
   * callers waiting on the same cache key.
   */
  signal?: AbortSignal;
}

/** Outcome of resolving a full action stack. */
export interface ResolveResult {
  /** The image after every action on the stack. */
  buffer: PixelBuffer;
  /** Wall-clock milliseconds spent resolving. */
  resolveTimeMs: number;
  /** Number of actions on the resolved stack. */
  stackLength: number;
  /** Prefixes served straight from the cache (0 or 1: the walk stops at the first hit). */
  hits: number;
  /** Prefixes this request computed itself. */
  computed: number;
  /** Prefixes this request obtained by joining another request's computation. */
  joined: number;
  /** Cache write failures. The buffer is still correct, only not memoized. */
  warnings: string[];
}

/**
 * A request carrying the client's copy of the stack, optionally with new
 * actions to append before resolving.
 */
export interface SubmitRequest {
  sessionId: string;
  /** Signature the client believes belongs to the session's image. */
  imageSignature: string;
  /** Canonical serialization of the client's stack. */
  stack: string;
  /** Raw actions to validate and append, in order. */
  append?: unknown[];
}

/** Result of {@link SubmitRequest}. */
export interface SubmitResult extends ResolveResult {
  /** The stack after appending, canonically serialized. */
  stack: string;
  /** Version of the stored stack. */
  stackVersion: number;
}
