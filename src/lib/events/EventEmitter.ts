/**
 * EventEmitter - Minimal synchronous event emitter.
 *
 * Handlers for an event are kept in a Set, so registering the same handler
 * twice has no effect. A handler that throws is logged and the remaining
 * handlers still run.
 *
 * Subclasses narrow the event map to get typed payloads:
 *
 * ```typescript
 * class Store extends EventEmitter<{ changed: [count: number] }> {}
 * ```
 */

export type EventMap = Record<string, unknown[]>;

export type EventHandler<Args extends unknown[] = unknown[]> = (...args: Args) => void;

type HandlerRegistry<Events extends EventMap> = {
  [K in keyof Events]?: Set<EventHandler<Events[K]>>;
};

export class EventEmitter<Events extends EventMap = EventMap> {
  private events: HandlerRegistry<Events> = Object.create(null);

  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    let handlers = this.events[event];
    if (!handlers) {
      handlers = new Set<EventHandler<Events[K]>>();
      this.events[event] = handlers;
    }
    handlers.add(handler);
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    const handlers = this.events[event];
    if (!handlers) {
      return;
    }
    handlers.delete(handler);
    if (handlers.size === 0) {
      delete this.events[event];
    }
  }

  /**
   * Register a handler that is removed after its first call.
   */
  once<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    const wrapper: EventHandler<Events[K]> = (...args) => {
      this.off(event, wrapper);
      handler(...args);
    };
    this.on(event, wrapper);
  }

  emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    const handlers = this.events[event];
    if (!handlers) {
      return;
    }

    // Copy so handlers can unsubscribe while we iterate
    for (const handler of Array.from(handlers)) {
      try {
        handler(...args);
      } catch (error) {
        console.error(`Error in event handler for "${String(event)}":`, error);
      }
    }
  }

  /**
   * Remove every handler for an event, or for all events when none is given.
   */
  removeAllListeners(event?: keyof Events): void {
    if (event === undefined) {
      this.events = Object.create(null);
    } else {
      delete this.events[event];
    }
  }

  listenerCount(event: keyof Events): number {
    return this.events[event]?.size ?? 0;
  }
}
