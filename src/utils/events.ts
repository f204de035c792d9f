/**
 * Type-Safe Event Bus
 *
 * Strongly-typed pub/sub used by the ingestion collaborator to push record
 * lifecycle events into the search engine.
 *
 * @module
 */

export type EventHandler<T> = (payload: T) => void;

type HandlerMap<Events extends object> = {
  [K in keyof Events]?: Set<EventHandler<Events[K]>>;
};

/**
 * Type-safe event emitter for decoupled communication.
 *
 * @example
 * ```typescript
 * const bus = new EventBus<IngestionEvents>();
 * bus.on("record:deleted", ({ id }) => console.log(id));
 * bus.emit("record:deleted", { id: "clip-1" });
 * ```
 */
export class EventBus<Events extends object> {
  private readonly handlers: HandlerMap<Events> = {};

  /**
   * Subscribes to an event.
   *
   * @returns Unsubscribe function
   */
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<Events[K]>>();
      this.handlers[event] = set;
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  /**
   * Emits an event to all subscribers, in subscription order.
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    for (const handler of [...set]) {
      handler(payload);
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.handlers[event]?.size ?? 0;
  }
}
