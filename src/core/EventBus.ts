import { Logger } from './Logger';

/**
 * Tiny event bus for simulation diagnostics (stats, logging) without coupling them to the model.
 */
export type EventMap = {
  fireworkLaunched: { x: number; y: number; speed: number; tick: number };
  fireworkDetonated: { x: number; y: number; particles: number };
  fireworksReaped: { count: number; tick: number };
};

type Handler<T> = (payload: T) => void;

type Listeners = { [K in keyof EventMap]: Set<Handler<EventMap[K]>> };

export class EventBus {
  private listeners: Listeners = {
    fireworkLaunched: new Set(),
    fireworkDetonated: new Set(),
    fireworksReaped: new Set(),
  };

  on<K extends keyof EventMap>(type: K, fn: Handler<EventMap[K]>): () => void {
    this.listeners[type].add(fn);
    return () => this.off(type, fn);
  }

  off<K extends keyof EventMap>(type: K, fn: Handler<EventMap[K]>): void {
    this.listeners[type].delete(fn);
  }

  emit<K extends keyof EventMap>(type: K, payload: EventMap[K]): void {
    const set: Set<Handler<EventMap[K]>> = this.listeners[type];
    if (set.size === 0) return;
    for (const fn of set) {
      try {
        fn(payload);
      } catch (err) {
        Logger.warn(`[EventBus] ${type} listener failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}

export const eventBus = new EventBus();
