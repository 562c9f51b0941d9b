/**
 * @module engine
 * Resolves an action stack to a buffer by walking prefixes through the
 * replay cache.
 *
 * `resolve(0)` is the session's source image. `resolve(i)` looks up the key of
 * the first `i` actions; on a miss it resolves `i - 1`, applies action
 * `i - 1` inside its region and stores the result. The walk is top-down, so
 * only the uncached suffix of the stack is recomputed, and concurrent
 * requests sharing a prefix share its computation.
 */

import type { EventBus, PixelBuffer, ResolveOptions, ResolveResult } from '@replay-editor/types';
import type { ActionStack } from './action-stack';
import { describeAction } from './action';
import { computeCacheKey } from './cache/cache-key';
import type { ReplayCache } from './cache/replay-cache';
import { ReplayError } from './errors';
import { notify } from './event-bus';
import { Logger } from './logger';
import { referenceAdapter, type OperationAdapter } from './operations/apply';
import { cloneBuffer } from './pixel-buffer';
import { resolveRegion } from './region-resolver';

const log = new Logger('Engine');

export interface ResolutionEngineOptions {
  cache: ReplayCache;
  /** Operation library. Default: {@link referenceAdapter}. */
  adapter?: OperationAdapter;
  /** Receives `resolve:*` events. */
  bus?: EventBus;
}

/** Everything the engine needs to know about one session. */
export interface ResolveRequest {
  sessionId: string;
  signature: string;
  /** Decoded upload; never mutated. */
  source: PixelBuffer;
  stack: ActionStack;
}

export class ResolutionEngine {
  private readonly cache: ReplayCache;
  private readonly adapter: OperationAdapter;
  private readonly bus: EventBus | undefined;

  constructor(options: ResolutionEngineOptions) {
    this.cache = options.cache;
    this.adapter = options.adapter ?? referenceAdapter;
    this.bus = options.bus;
  }

  /**
   * Resolve the whole stack of `request`.
   *
   * Errors raised for an action carry its index in `actionIndex`. Aborting
   * `options.signal` rejects this call only; computations other requests are
   * waiting on run to completion.
   */
  async resolve(request: ResolveRequest, options: ResolveOptions = {}): Promise<ResolveResult> {
    const { sessionId, signature, source, stack } = request;
    const actions = stack.toArray();
    const started = performance.now();
    const result: Omit<ResolveResult, 'buffer' | 'resolveTimeMs'> = {
      stackLength: actions.length,
      hits: 0,
      computed: 0,
      joined: 0,
      warnings: [],
    };

    const step = async (i: number, signal?: AbortSignal): Promise<PixelBuffer> => {
      if (i === 0) return cloneBuffer(source);

      const key = computeCacheKey(sessionId, signature, actions.slice(0, i));
      const lookup = await this.cache.getOrCompute(
        key,
        async () => {
          const parent = await step(i - 1);
          const action = actions[i - 1];
          log.debug(`Applying #${i - 1} ${describeAction(action)} to ${parent.width}x${parent.height}`);
          try {
            const region = resolveRegion(action.selection, parent);
            const next = await this.adapter.apply(parent, region, action.operation);
            if (next.width !== parent.width || next.height !== parent.height) {
              throw new RangeError(
                `Operation '${action.operation.name}' returned ${next.width}x${next.height} ` +
                  `for a ${parent.width}x${parent.height} canvas`,
              );
            }
            return next;
          } catch (err) {
            if (err instanceof ReplayError) throw err.atAction(i - 1);
            throw err;
          }
        },
        { signal },
      );

      switch (lookup.source) {
        case 'hit':
          result.hits++;
          break;
        case 'computed':
          result.computed++;
          break;
        case 'joined':
          result.joined++;
          break;
      }
      if (lookup.writeError) {
        result.warnings.push(`Prefix ${i} was not cached: ${lookup.writeError.message}`);
      }
      return lookup.buffer;
    };

    let buffer: PixelBuffer;
    try {
      buffer = await step(actions.length, options.signal);
    } catch (err) {
      const code =
        err instanceof ReplayError ? err.code : options.signal?.aborted ? 'ABORTED' : 'INTERNAL';
      const actionIndex = err instanceof ReplayError ? err.actionIndex : null;
      log.warn(`Resolve of ${sessionId} failed (${code}, action ${String(actionIndex)})`);
      notify(this.bus, 'resolve:failed', { sessionId, code, actionIndex }, log);
      throw err;
    }

    const resolveTimeMs = performance.now() - started;
    log.debug(
      `Resolved ${sessionId} (${actions.length} actions) in ${resolveTimeMs.toFixed(1)}ms: ` +
        `${result.hits} hit, ${result.computed} computed, ${result.joined} joined`,
    );
    notify(this.bus, 'resolve:completed', { sessionId, stackLength: actions.length, resolveTimeMs }, log);
    return { ...result, buffer, resolveTimeMs };
  }
}
