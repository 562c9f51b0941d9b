/**
 * @module session-store
 * Zustand vanilla store holding live editing sessions.
 *
 * Each session pairs a decoded upload with its action stack. The session
 * map is replaced on every change, never mutated, and stacks are immutable
 * values, so readers holding an older stack are unaffected.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type { PixelBuffer } from '@replay-editor/types';
import type { ActionStack } from './action-stack';

/** One editing session. */
export interface Session {
  readonly id: string;
  /** Fingerprint of the uploaded bytes. */
  readonly signature: string;
  /** Decoded upload, the buffer every stack is replayed onto. */
  readonly source: PixelBuffer;
  readonly stack: ActionStack;
  readonly createdAt: number;
  readonly lastAccessedAt: number;
}

/** Session store state shape. */
export interface SessionStoreState {
  sessions: ReadonlyMap<string, Session>;
}

/** Session store actions. */
export interface SessionStoreActions {
  /** Insert or replace a session. */
  putSession: (session: Session) => void;
  /** Remove a session. Returns false when it did not exist. */
  removeSession: (id: string) => boolean;
  /** Replace a session's stack and mark it accessed. */
  setStack: (id: string, stack: ActionStack, now: number) => void;
  /** Mark a session accessed. */
  touch: (id: string, now: number) => void;
}

export type SessionStore = StoreApi<SessionStoreState & SessionStoreActions>;

/** Create an empty session store. */
export function createSessionStore(): SessionStore {
  return createStore<SessionStoreState & SessionStoreActions>((set, get) => ({
    sessions: new Map(),

    putSession: (session) => {
      set({ sessions: new Map(get().sessions).set(session.id, session) });
    },

    removeSession: (id) => {
      const sessions = new Map(get().sessions);
      if (!sessions.delete(id)) return false;
      set({ sessions });
      return true;
    },

    setStack: (id, stack, now) => {
      const session = get().sessions.get(id);
      if (!session) return;
      set({ sessions: new Map(get().sessions).set(id, { ...session, stack, lastAccessedAt: now }) });
    },

    touch: (id, now) => {
      const session = get().sessions.get(id);
      if (!session) return;
      set({ sessions: new Map(get().sessions).set(id, { ...session, lastAccessedAt: now }) });
    },
  }));
}
