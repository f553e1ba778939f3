import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyHandler = (event: any) => void;

/** Receives errors thrown by event listeners. */
export type ListenerErrorHandler = (error: unknown, event: DomainEvent) => void;

/**
 * Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`.
 *
 * Events are the only progress and diagnostics channel of an enrichment:
 * attach a logger or a progress bar with `onAny()`.
 */
export class EventBus {
  private readonly handlers = new Map<EventType, Set<AnyHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Set<AnyHandler>();
    existing.add(handler as AnyHandler);
    this.handlers.set(type, existing);
  }

  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler as AnyHandler);
  }

  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * Emit a domain event to typed handlers first, then wildcard handlers.
   * A throwing handler does not prevent others from executing and never
   * interrupts the run; its error is passed to `onListenerError`.
   */
  emit(event: DomainEvent): void {
    const handlers = [...(this.handlers.get(event.type) ?? []), ...this.wildcardHandlers];
    for (const handler of handlers) {
      try {
        handler(event);
      } catch (error) {
        this.onListenerError?.(error, event);
      }
    }
  }
}
