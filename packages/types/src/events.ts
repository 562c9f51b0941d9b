/**
 * @module events
 * Type-safe event bus definitions for cross-module communication.
 * The cache, the engine and the edit service report what they do through it.
 */

/** Map of event names to their payload types. */
export interface EventMap {
  /** A new session was created, or an existing one was replaced by a new upload. */
  'session:reset': { sessionId: string; signature: string; replaced: boolean };
  /** A session was removed after its idle TTL elapsed. */
  'session:expired': { sessionId: string };
  /** An action was appended to a session's stack. */
  'stack:appended': { sessionId: string; version: number; length: number };
  /** A session's stack was truncated (undo). */
  'stack:truncated': { sessionId: string; version: number; length: number };
  /** A cache key was served from storage. */
  'cache:hit': { key: string };
  /** A cache key was not in storage and will be computed. */
  'cache:miss': { key: string };
  /** The backend failed on read; the key is treated as a miss. */
  'cache:read-failed': { key: string; message: string };
  /** The backend failed on write; the computed buffer is still returned. */
  'cache:write-failed': { key: string; message: string };
  /** A full stack was resolved. */
  'resolve:completed': { sessionId: string; stackLength: number; resolveTimeMs: number };
  /** Resolving a stack failed. */
  'resolve:failed': { sessionId: string; code: string; actionIndex: number | null };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event to every current subscriber. */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
