/**
 * @module edit-service
 * Session-level operations: upload, append, undo, resolve.
 *
 * The service owns the session store and drives the resolution engine.
 * Sessions idle for longer than `sessionTtlMs` are dropped, either by
 * {@link EditService.sweepExpired} or lazily when next looked up.
 */

import { randomUUID } from 'node:crypto';
import type {
  EventBus,
  ResolveOptions,
  ResolveResult,
  SessionSummary,
  SubmitRequest,
  SubmitResult,
} from '@replay-editor/types';
import { ActionStack } from './action-stack';
import { describeAction } from './action';
import { imageSignature } from './cache/cache-key';
import type { ResolutionEngine } from './engine';
import { SessionNotFound, ValidationError } from './errors';
import { notify } from './event-bus';
import { Logger } from './logger';
import { decodePng } from './png-codec';
import { createSessionStore, type Session, type SessionStore } from './session-store';

const log = new Logger('EditService');

/** Default idle lifetime of a session: 30 minutes. */
export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000;

export interface EditServiceOptions {
  engine: ResolutionEngine;
  /** Receives `session:*` and `stack:*` events. */
  bus?: EventBus;
  /** Existing store to use. Default: a fresh one. */
  store?: SessionStore;
  /** Idle lifetime in ms. 0 keeps sessions until replaced. */
  sessionTtlMs?: number;
  /** Clock. Default: `Date.now`. */
  now?: () => number;
  /** Session id generator. Default: `crypto.randomUUID`. */
  generateId?: () => string;
}

export class EditService {
  readonly store: SessionStore;

  private readonly engine: ResolutionEngine;
  private readonly bus: EventBus | undefined;
  private readonly sessionTtlMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: EditServiceOptions) {
    this.engine = options.engine;
    this.bus = options.bus;
    this.store = options.store ?? createSessionStore();
    this.sessionTtlMs = Math.max(0, options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS);
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Start a session on a new upload. When `previousSessionId` names a live
   * session it is dropped together with its stack.
   * @throws DecodeError when `imageBytes` is not a supported PNG.
   */
  resetSession(imageBytes: Uint8Array, previousSessionId?: string): string {
    const source = decodePng(imageBytes);
    const signature = imageSignature(imageBytes);
    const replaced =
      previousSessionId !== undefined && this.store.getState().removeSession(previousSessionId);

    const now = this.now();
    const session: Session = {
      id: this.generateId(),
      signature,
      source,
      stack: ActionStack.empty(),
      createdAt: now,
      lastAccessedAt: now,
    };
    this.store.getState().putSession(session);

    log.info(
      `Session ${session.id} started on ${source.width}x${source.height} image ${signature}` +
        (replaced ? ` (replaces ${previousSessionId})` : ''),
    );
    notify(this.bus, 'session:reset', { sessionId: session.id, signature, replaced }, log);
    return session.id;
  }

  /**
   * Validate `rawAction` and append it to the session's stack.
   * @returns The new stack version.
   * @throws ValidationError, InvalidSelection or UnknownOperation; the stack is left unchanged.
   */
  appendAction(sessionId: string, rawAction: unknown): number {
    const session = this.require(sessionId);
    const stack = session.stack.append(rawAction);
    this.commit(session, stack);
    log.debug(`Session ${sessionId} appended ${describeAction(stack.at(stack.length - 1))}`);
    notify(this.bus, 'stack:appended', { sessionId, version: stack.version, length: stack.length }, log);
    return stack.version;
  }

  /**
   * Keep only the first `n` actions (undo).
   * @returns The new stack version.
   * @throws OutOfRange when `n` is not an integer in `0..length`.
   */
  truncate(sessionId: string, n: number): number {
    const session = this.require(sessionId);
    const stack = session.stack.truncate(n);
    this.commit(session, stack);
    log.debug(`Session ${sessionId} truncated to ${n} actions`);
    notify(this.bus, 'stack:truncated', { sessionId, version: stack.version, length: stack.length }, log);
    return stack.version;
  }

  /** Resolve the session's current stack. */
  async resolve(sessionId: string, options: ResolveOptions = {}): Promise<ResolveResult> {
    const session = this.require(sessionId);
    this.store.getState().touch(sessionId, this.now());
    return this.engine.resolve(
      { sessionId, signature: session.signature, source: session.source, stack: session.stack },
      options,
    );
  }

  getSession(sessionId: string): SessionSummary {
    const session = this.require(sessionId);
    return {
      id: session.id,
      signature: session.signature,
      width: session.source.width,
      height: session.source.height,
      stackLength: session.stack.length,
      stackVersion: session.stack.version,
      stack: session.stack.serialize(),
      createdAt: session.createdAt,
      lastAccessedAt: session.lastAccessedAt,
    };
  }

  /**
   * Client-carried stack flow: adopt the client's stack, append any new
   * actions, store the result and resolve it.
   *
   * @throws ValidationError when `imageSignature` does not belong to the
   * session, or when the stack or an appended action is malformed.
   */
  async submit(request: SubmitRequest, options: ResolveOptions = {}): Promise<SubmitResult> {
    const session = this.require(request.sessionId);
    if (request.imageSignature !== session.signature) {
      throw new ValidationError(
        `Image signature ${request.imageSignature} does not match session ${session.id}`,
      );
    }

    const carried = ActionStack.deserialize(request.stack, session.stack.version);
    let stack = carried.equals(session.stack)
      ? session.stack
      : ActionStack.deserialize(request.stack, session.stack.version + 1);
    for (const raw of request.append ?? []) {
      stack = stack.append(raw);
    }

    if (stack !== session.stack) {
      this.commit(session, stack);
      notify(
        this.bus,
        'stack:appended',
        { sessionId: session.id, version: stack.version, length: stack.length },
        log,
      );
    }

    const result = await this.resolve(session.id, options);
    return { ...result, stack: stack.serialize(), stackVersion: stack.version };
  }

  /**
   * Drop every session idle for at least the TTL.
   * @returns Ids of the removed sessions.
   */
  sweepExpired(now: number = this.now()): string[] {
    if (this.sessionTtlMs === 0) return [];
    const expired = [...this.store.getState().sessions.values()]
      .filter((s) => now - s.lastAccessedAt >= this.sessionTtlMs)
      .map((s) => s.id);
    for (const id of expired) {
      this.expire(id);
    }
    return expired;
  }

  /** Ids of every live session. */
  listSessions(): string[] {
    return [...this.store.getState().sessions.keys()];
  }

  // ── helpers ──

  private require(sessionId: string): Session {
    const session = this.store.getState().sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFound(sessionId);
    }
    if (this.sessionTtlMs > 0 && this.now() - session.lastAccessedAt >= this.sessionTtlMs) {
      this.expire(sessionId);
      throw new SessionNotFound(sessionId);
    }
    return session;
  }

  private commit(session: Session, stack: ActionStack): void {
    this.store.getState().setStack(session.id, stack, this.now());
  }

  private expire(sessionId: string): void {
    if (this.store.getState().removeSession(sessionId)) {
      log.info(`Session ${sessionId} expired`);
      notify(this.bus, 'session:expired', { sessionId }, log);
    }
  }
}
