import { describe, it, expect } from 'vitest';
import { createSessionStore, type Session } from './session-store';
import { ActionStack } from './action-stack';
import { solidBuffer } from './pixel-buffer';

function session(id: string): Session {
  return {
    id,
    signature: 'sig',
    source: solidBuffer(1, 1, [0, 0, 0, 255]),
    stack: ActionStack.empty(),
    createdAt: 100,
    lastAccessedAt: 100,
  };
}

describe('createSessionStore', () => {
  it('starts empty', () => {
    expect(createSessionStore().getState().sessions.size).toBe(0);
  });

  it('puts and removes sessions', () => {
    const store = createSessionStore();
    store.getState().putSession(session('a'));

    expect(store.getState().sessions.get('a')?.signature).toBe('sig');
    expect(store.getState().removeSession('a')).toBe(true);
    expect(store.getState().removeSession('a')).toBe(false);
    expect(store.getState().sessions.has('a')).toBe(false);
  });

  it('replaces the map on every change', () => {
    const store = createSessionStore();
    store.getState().putSession(session('a'));
    const before = store.getState().sessions;

    store.getState().touch('a', 200);

    expect(store.getState().sessions).not.toBe(before);
    expect(before.get('a')?.lastAccessedAt).toBe(100);
    expect(store.getState().sessions.get('a')?.lastAccessedAt).toBe(200);
  });

  it('stores a new stack and marks the session accessed', () => {
    const store = createSessionStore();
    store.getState().putSession(session('a'));
    const stack = ActionStack.empty().append({ kind: 'filter', operation: 'blur' });

    store.getState().setStack('a', stack, 300);

    expect(store.getState().sessions.get('a')).toMatchObject({ stack, lastAccessedAt: 300, createdAt: 100 });
  });

  it('ignores updates to unknown sessions', () => {
    const store = createSessionStore();
    let notified = 0;
    store.subscribe(() => {
      notified++;
    });

    store.getState().touch('ghost', 1);
    store.getState().setStack('ghost', ActionStack.empty(), 1);

    expect(notified).toBe(0);
  });
});
