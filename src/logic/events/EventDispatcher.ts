import { createLogger, describeError } from '@/utils/log';

const log = createLogger('events');

export type EventMap = object;

export type EventListener<Events extends EventMap, K extends keyof Events> = (payload: Events[K]) => void;

type AnyListener = (payload: never) => void;

/**
 * Typed publish/subscribe. A listener that throws is logged and skipped so the
 * remaining listeners and the dispatching caller are unaffected.
 */
export class EventDispatcher<Events extends EventMap> {
  private listeners = new Map<keyof Events, Set<AnyListener>>();

  on<K extends keyof Events>(event: K, listener: EventListener<Events, K>): () => void {
    let bucket = this.listeners.get(event);
    if (!bucket) {
      bucket = new Set();
      this.listeners.set(event, bucket);
    }
    bucket.add(listener);
    return () => this.off(event, listener);
  }

  once<K extends keyof Events>(event: K, listener: EventListener<Events, K>): () => void {
    const wrapped: EventListener<Events, K> = (payload) => {
      this.off(event, wrapped);
      listener(payload);
    };
    return this.on(event, wrapped);
  }

  off<K extends keyof Events>(event: K, listener: EventListener<Events, K>): void {
    const bucket = this.listeners.get(event);
    if (!bucket) {
      return;
    }
    bucket.delete(listener);
    if (bucket.size === 0) {
      this.listeners.delete(event);
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  clear(): void {
    this.listeners.clear();
  }

  /** Returns the number of listeners that threw. */
  dispatch<K extends keyof Events>(event: K, payload: Events[K]): number {
    const bucket = this.listeners.get(event);
    if (!bucket) {
      return 0;
    }
    let failures = 0;
    for (const listener of Array.from(bucket)) {
      try {
        (listener as EventListener<Events, K>)(payload);
      } catch (error) {
        failures += 1;
        log.warn(`listener for '${String(event)}' threw: ${describeError(error)}`);
      }
    }
    return failures;
  }
}
