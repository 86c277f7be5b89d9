import type { Event, EventType } from "./types.js";

type EventPayloadMap = {
  [K in EventType]: Extract<Event, { type: K }>["payload"];
};
type EventHandler<T extends EventType> = (payload: EventPayloadMap[T]) => void;
type AnyHandler = (payload: unknown) => void;
type ErrorHandler = (error: unknown) => void;

export class EventBus {
  private handlers = new Map<EventType, AnyHandler[]>();

  private register(type: EventType, wrapped: AnyHandler): () => void {
    const existing = this.handlers.get(type);
    if (existing) {
      existing.push(wrapped);
    } else {
      this.handlers.set(type, [wrapped]);
    }

    return (): void => {
      const handlers = this.handlers.get(type);
      if (!handlers) {
        return;
      }
      const index = handlers.indexOf(wrapped);
      if (index >= 0) {
        handlers.splice(index, 1);
      }
      if (handlers.length === 0) {
        this.handlers.delete(type);
      }
    };
  }

  subscribe<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    return this.register(type, (payload) => handler(payload as EventPayloadMap[T]));
  }

  /** Like `subscribe`, but a throwing handler is reported to `onError` instead of the emitter. */
  subscribeSafe<T extends EventType>(
    type: T,
    handler: EventHandler<T>,
    onError: ErrorHandler
  ): () => void {
    return this.register(type, (payload) => {
      try {
        handler(payload as EventPayloadMap[T]);
      } catch (error) {
        onError(error);
      }
    });
  }

  emit(event: Event): void {
    const handlers = this.handlers.get(event.type);
    if (!handlers || handlers.length === 0) {
      return;
    }
    const snapshot = handlers.slice();
    snapshot.forEach((handler) => handler(event.payload));
  }
}
