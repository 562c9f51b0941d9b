/**
 * @module event-bus
 * Type-safe pub/sub emitter used by the cache, engine and edit service to
 * report what they do.
 *
 * @see {@link @replay-editor/types#EventBus} for the interface contract
 * @see {@link @replay-editor/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@replay-editor/types';
import { errorMessage } from './errors';
import type { Logger } from './logger';

type EventName = keyof EventMap;

/** A registered listener. `once` listeners are dropped before they run. */
interface Subscription {
  readonly callback: (payload: never) => void;
  readonly once: boolean;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners are kept in subscription order per event. Emission iterates a
 * snapshot, so listeners added or removed while emitting take effect on the
 * next emission. A throwing listener does not stop the others; the first
 * error is rethrown after every listener ran.
 */
export class EventBusImpl implements EventBus {
  private subscriptions = new Map<EventName, Subscription[]>();

  /** @inheritdoc */
  on<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    this.add(event, { callback, once: false });
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  once<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    this.add(event, { callback, once: true });
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  off<K extends EventName>(event: K, callback: EventCallback<K>): void {
    const list = this.subscriptions.get(event);
    const sub = list?.find((s) => s.callback === callback);
    if (sub) {
      this.remove(event, sub);
    }
  }

  /** @inheritdoc */
  emit<K extends EventName>(event: K, payload: EventMap[K]): void {
    const list = this.subscriptions.get(event);
    if (!list) return;

    let firstError: unknown = null;
    for (const sub of [...list]) {
      if (sub.once) {
        this.remove(event, sub);
      }
      try {
        (sub.callback as EventCallback<K>)(payload);
      } catch (err) {
        firstError ??= err;
      }
    }
    if (firstError !== null) {
      throw firstError;
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.subscriptions.clear();
  }

  /** Number of listeners currently registered for `event`. */
  listenerCount(event: EventName): number {
    return this.subscriptions.get(event)?.length ?? 0;
  }

  private remove(event: EventName, sub: Subscription): void {
    const list = this.subscriptions.get(event);
    if (!list) return;
    const index = list.indexOf(sub);
    if (index === -1) return;
    list.splice(index, 1);
    if (list.length === 0) {
      this.subscriptions.delete(event);
    }
  }

  private add(event: EventName, sub: Subscription): void {
    const list = this.subscriptions.get(event);
    if (list) {
      list.push(sub);
    } else {
      this.subscriptions.set(event, [sub]);
    }
  }
}

/**
 * Emit on an optional bus from code whose own result must not depend on
 * its listeners. A listener failure is logged on `log` and goes no further.
 */
export function notify<K extends EventName>(
  bus: EventBus | undefined,
  event: K,
  payload: EventMap[K],
  log: Logger,
): void {
  if (!bus) return;
  try {
    bus.emit(event, payload);
  } catch (err) {
    log.warn(`Listener for '${event}' failed: ${errorMessage(err)}`);
  }
}
