import { describe, it, expect, vi } from 'vitest';
import type { CacheBackend, PixelBuffer } from '@replay-editor/types';
import { ResolutionEngine, type ResolveRequest } from './engine';
import { ActionStack } from './action-stack';
import { ReplayCache } from './cache/replay-cache';
import { MemoryCacheBackend } from './cache/memory-backend';
import { referenceAdapter, type OperationAdapter } from './operations/apply';
import { CacheBackendError, ReplayError, ValidationError } from './errors';
import { EventBusImpl } from './event-bus';
import { buffersEqual, getPixel, solidBuffer } from './pixel-buffer';

const source: PixelBuffer = solidBuffer(64, 64, [100, 100, 100, 255]);

const blur = { kind: 'filter', operation: 'blur' };
const emboss = { kind: 'filter', operation: 'emboss' };
const brightenCorner = {
  kind: 'enhance',
  operation: { name: 'brightness', factor: 1.5 },
  selection: { type: 'rect', x: [0, 32], y: [0, 32] },
};
const darken = { kind: 'enhance', operation: { name: 'brightness', factor: 0.5 } };

function request(stack: ActionStack, sessionId = 's1'): ResolveRequest {
  return { sessionId, signature: 'sig', source, stack };
}

function setup(adapter?: OperationAdapter, backend: CacheBackend = new MemoryCacheBackend()) {
  const bus = new EventBusImpl();
  const cache = new ReplayCache(backend, { bus });
  const engine = new ResolutionEngine({ cache, adapter, bus });
  return { bus, cache, engine };
}

function spyAdapter() {
  const apply = vi.fn(referenceAdapter.apply);
  return { adapter: { apply }, apply };
}

describe('ResolutionEngine', () => {
  it('returns a copy of the source for an empty stack', async () => {
    const { engine } = setup();
    const result = await engine.resolve(request(ActionStack.empty()));

    expect(buffersEqual(result.buffer, source)).toBe(true);
    expect(result.buffer.data).not.toBe(source.data);
    expect(result).toMatchObject({ stackLength: 0, hits: 0, computed: 0, joined: 0, warnings: [] });
  });

  it('applies every action in order', async () => {
    const { engine } = setup();
    const stack = ActionStack.from([darken, darken]);
    const result = await engine.resolve(request(stack));

    expect(getPixel(result.buffer, 10, 10)).toEqual([25, 25, 25, 255]);
    expect(result.computed).toBe(2);
  });

  it('is deterministic across cache clears', async () => {
    const { engine, cache } = setup();
    const stack = ActionStack.from([brightenCorner, emboss, blur]);

    const first = await engine.resolve(request(stack));
    await cache.clear();
    const second = await engine.resolve(request(stack));

    expect(buffersEqual(first.buffer, second.buffer)).toBe(true);
    expect(second.computed).toBe(3);
  });

  it('serves a warm stack from a single cache hit', async () => {
    const { engine } = setup();
    const stack = ActionStack.from([brightenCorner, emboss]);

    const cold = await engine.resolve(request(stack));
    const warm = await engine.resolve(request(stack));

    expect(buffersEqual(cold.buffer, warm.buffer)).toBe(true);
    expect(cold).toMatchObject({ hits: 0, computed: 2 });
    expect(warm).toMatchObject({ hits: 1, computed: 0 });
  });

  it('only computes the uncached suffix', async () => {
    const { adapter, apply } = spyAdapter();
    const { engine } = setup(adapter);
    const stack = ActionStack.from([blur, brightenCorner]);

    await engine.resolve(request(stack));
    apply.mockClear();
    const longer = await engine.resolve(request(stack.append(emboss)));

    expect(apply).toHaveBeenCalledOnce();
    expect(longer).toMatchObject({ hits: 1, computed: 1, stackLength: 3 });
  });

  it('resolves a truncated stack to the same buffer as a fresh prefix', async () => {
    const { engine } = setup();
    const stack = ActionStack.from([brightenCorner, emboss, darken]);
    await engine.resolve(request(stack));

    const undone = await engine.resolve(request(stack.truncate(1)));
    const fresh = await setup().engine.resolve(request(ActionStack.from([brightenCorner])));

    expect(buffersEqual(undone.buffer, fresh.buffer)).toBe(true);
    expect(undone.hits).toBe(1);
  });

  it('keeps sessions apart', async () => {
    const { engine } = setup();
    const stack = ActionStack.from([blur]);

    await engine.resolve(request(stack, 's1'));
    const other = await engine.resolve(request(stack, 's2'));

    expect(other.computed).toBe(1);
  });

  it('coalesces concurrent identical requests onto one computation per prefix', async () => {
    const { adapter, apply } = spyAdapter();
    const { engine } = setup(adapter);
    const stack = ActionStack.from([blur, emboss]);

    const results = await Promise.all(Array.from({ length: 6 }, () => engine.resolve(request(stack))));

    expect(apply).toHaveBeenCalledTimes(2);
    for (const r of results) {
      expect(buffersEqual(r.buffer, results[0].buffer)).toBe(true);
    }
    expect(results.filter((r) => r.joined === 1)).toHaveLength(5);
  });

  it('tags adapter failures with the action index and caches nothing for them', async () => {
    const failing: OperationAdapter = {
      apply: (buffer, region, operation) => {
        if (operation.name === 'emboss') throw new ValidationError('emboss is unavailable');
        return referenceAdapter.apply(buffer, region, operation);
      },
    };
    const backend = new MemoryCacheBackend();
    const { engine, bus } = setup(failing, backend);
    const onFailed = vi.fn();
    bus.on('resolve:failed', onFailed);
    const stack = ActionStack.from([blur, emboss, darken]);

    const error = await engine.resolve(request(stack)).then(
      () => null,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ actionIndex: 1, message: 'emboss is unavailable' });
    expect(onFailed).toHaveBeenCalledWith({ sessionId: 's1', code: 'VALIDATION_ERROR', actionIndex: 1 });
    expect(backend.size).toBe(1);

    const recovered = await setup(referenceAdapter, backend).engine.resolve(request(stack));
    expect(recovered).toMatchObject({ hits: 1, computed: 2 });
  });

  it('propagates foreign errors without an action index', async () => {
    const broken: OperationAdapter = {
      apply: () => {
        throw new RangeError('out of memory');
      },
    };
    const { engine } = setup(broken);

    const error = await engine.resolve(request(ActionStack.from([blur]))).then(
      () => null,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(RangeError);
    expect(error).not.toBeInstanceOf(ReplayError);
  });

  it('reports cache write failures as warnings', async () => {
    const readOnly: CacheBackend = {
      name: 'read-only',
      get: async () => undefined,
      put: async () => {
        throw new CacheBackendError('read-only', 'writes disabled');
      },
      delete: async () => false,
      clear: async () => undefined,
    };
    const { engine } = setup(referenceAdapter, readOnly);

    const result = await engine.resolve(request(ActionStack.from([darken])));

    expect(getPixel(result.buffer, 0, 0)).toEqual([50, 50, 50, 255]);
    expect(result.warnings).toEqual(['Prefix 1 was not cached: [read-only] writes disabled']);
  });

  it('still returns the buffer when a write-failure listener throws', async () => {
    const readOnly: CacheBackend = {
      name: 'read-only',
      get: async () => undefined,
      put: async () => {
        throw new CacheBackendError('read-only', 'writes disabled');
      },
      delete: async () => false,
      clear: async () => undefined,
    };
    const { engine, bus } = setup(referenceAdapter, readOnly);
    bus.on('cache:write-failed', () => {
      throw new Error('metrics sink down');
    });

    const result = await engine.resolve(request(ActionStack.from([darken])));

    expect(getPixel(result.buffer, 0, 0)).toEqual([50, 50, 50, 255]);
    expect(result.warnings).toEqual(['Prefix 1 was not cached: [read-only] writes disabled']);
  });

  it('is not failed by a throwing resolve:completed listener', async () => {
    const { engine, bus } = setup();
    bus.on('resolve:completed', () => {
      throw new Error('listener failed');
    });

    const result = await engine.resolve(request(ActionStack.from([darken])));

    expect(result.computed).toBe(1);
  });

  it('keeps the original error when a resolve:failed listener throws', async () => {
    const failing: OperationAdapter = {
      apply: () => {
        throw new ValidationError('emboss is unavailable');
      },
    };
    const { engine, bus } = setup(failing);
    bus.on('resolve:failed', () => {
      throw new Error('listener failed');
    });

    await expect(engine.resolve(request(ActionStack.from([emboss])))).rejects.toMatchObject({
      message: 'emboss is unavailable',
      actionIndex: 0,
    });
  });

  it('rejects and caches nothing when an adapter changes the canvas size', async () => {
    const shrinking: OperationAdapter = {
      apply: () => solidBuffer(1, 1, [0, 0, 0, 255]),
    };
    const backend = new MemoryCacheBackend();
    const { engine } = setup(shrinking, backend);

    await expect(engine.resolve(request(ActionStack.from([blur])))).rejects.toThrow(
      "Operation 'blur' returned 1x1 for a 64x64 canvas",
    );
    expect(backend.size).toBe(0);
  });

  it('emits resolve:completed', async () => {
    const { engine, bus } = setup();
    const onCompleted = vi.fn();
    bus.on('resolve:completed', onCompleted);

    await engine.resolve(request(ActionStack.from([blur])));

    expect(onCompleted).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId: 's1', stackLength: 1 }),
    );
  });

  it('stops waiting when aborted but finishes the shared work', async () => {
    const { adapter, apply } = spyAdapter();
    const { engine, bus } = setup(adapter);
    const onFailed = vi.fn();
    bus.on('resolve:failed', onFailed);
    const stack = ActionStack.from([blur]);
    const controller = new AbortController();

    const abandoned = engine.resolve(request(stack), { signal: controller.signal });
    const other = engine.resolve(request(stack));
    controller.abort();

    await expect(abandoned).rejects.toMatchObject({ name: 'AbortError' });
    expect((await other).joined).toBe(1);
    expect(apply).toHaveBeenCalledOnce();
    expect(onFailed).toHaveBeenCalledWith({ sessionId: 's1', code: 'ABORTED', actionIndex: null });
  });

  it('replays the blur, corner brighten, undo scenario', async () => {
    const { engine } = setup();
    const b1Stack = ActionStack.from([blur]);
    const b2Stack = b1Stack.append(brightenCorner);

    const b1 = await engine.resolve(request(b1Stack));
    const b2 = await engine.resolve(request(b2Stack));
    const undone = await engine.resolve(request(b2Stack.truncate(1)));

    // Blurring a solid image changes nothing
    expect(buffersEqual(b1.buffer, source)).toBe(true);
    // The display-space rect (0..32, 0..32) is the bottom-left quadrant of the buffer
    expect(getPixel(b2.buffer, 0, 63)).toEqual([150, 150, 150, 255]);
    expect(getPixel(b2.buffer, 31, 32)).toEqual([150, 150, 150, 255]);
    expect(getPixel(b2.buffer, 0, 31)).toEqual([100, 100, 100, 255]);
    expect(getPixel(b2.buffer, 32, 63)).toEqual([100, 100, 100, 255]);
    expect(buffersEqual(undone.buffer, b1.buffer)).toBe(true);
    expect(undone.hits).toBe(1);
  });
});
