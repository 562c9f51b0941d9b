import { describe, it, expect } from 'vitest';
import { MemoryCacheBackend } from './memory-backend';

function bytes(n: number, fill = 1): Uint8Array {
  return new Uint8Array(n).fill(fill);
}

describe('MemoryCacheBackend', () => {
  it('stores, returns and deletes entries', async () => {
    const backend = new MemoryCacheBackend();

    await backend.put('a', bytes(3, 7));
    expect(await backend.get('a')).toEqual(bytes(3, 7));
    expect(await backend.get('missing')).toBeUndefined();
    expect(await backend.delete('a')).toBe(true);
    expect(await backend.delete('a')).toBe(false);
    expect(backend.bytes).toBe(0);
  });

  it('replaces an existing key without double-counting bytes', async () => {
    const backend = new MemoryCacheBackend();

    await backend.put('a', bytes(4));
    await backend.put('a', bytes(6));
    expect(backend.size).toBe(1);
    expect(backend.bytes).toBe(6);
  });

  it('evicts the least recently used entry past the entry limit', async () => {
    const backend = new MemoryCacheBackend({ maxEntries: 2 });

    await backend.put('a', bytes(1));
    await backend.put('b', bytes(1));
    await backend.get('a');
    await backend.put('c', bytes(1));

    expect(await backend.get('b')).toBeUndefined();
    expect(await backend.get('a')).toBeDefined();
    expect(await backend.get('c')).toBeDefined();
  });

  it('evicts oldest entries past the byte limit', async () => {
    const backend = new MemoryCacheBackend({ maxBytes: 10 });

    await backend.put('a', bytes(6));
    await backend.put('b', bytes(6));

    expect(await backend.get('a')).toBeUndefined();
    expect(backend.bytes).toBe(6);
  });

  it('does not store a value larger than the byte limit', async () => {
    const backend = new MemoryCacheBackend({ maxBytes: 10 });

    await backend.put('big', bytes(11));
    expect(await backend.get('big')).toBeUndefined();
    expect(backend.size).toBe(0);
  });

  it('expires entries after the TTL', async () => {
    let now = 1_000;
    const backend = new MemoryCacheBackend({ ttlMs: 500, now: () => now });

    await backend.put('a', bytes(2));
    now = 1_499;
    expect(await backend.get('a')).toBeDefined();
    now = 1_500;
    expect(await backend.get('a')).toBeUndefined();
    expect(backend.bytes).toBe(0);
  });

  it('prunes every expired entry at once', async () => {
    let now = 0;
    const backend = new MemoryCacheBackend({ ttlMs: 100, now: () => now });

    await backend.put('a', bytes(1));
    now = 50;
    await backend.put('b', bytes(1));
    now = 120;

    expect(backend.prune()).toBe(1);
    expect(backend.size).toBe(1);
  });

  it('clears everything', async () => {
    const backend = new MemoryCacheBackend();
    await backend.put('a', bytes(1));
    await backend.clear();

    expect(backend.size).toBe(0);
    expect(backend.bytes).toBe(0);
  });
});
