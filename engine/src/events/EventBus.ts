import type { ConductorEvent } from './EngineEvents.js';

/**
 * Event handler function signature
 */
export type EventHandler<T = unknown> = (event: ConductorEvent<T>) => void | Promise<void>;

/**
 * EventBus - pub/sub between engine components
 *
 * - Supervisors, the error handler and the task runner emit events
 * - The CLI, background-run subscribers and tests listen
 * - Handlers can be sync or async; a failing handler never affects the others
 * - Listen to every event with '*'
 *
 * @example
 * ```ts
 * const bus = new EventBus();
 *
 * bus.on('task.completed', (event) => {
 *   console.log('Task done:', event.payload);
 * });
 *
 * bus.on('*', (event) => {
 *   logger.debug(event.type);
 * });
 *
 * await bus.emit(createEvent('task.completed', { taskId: 't-1' }));
 * ```
 */
export class EventBus {
  private listeners: Map<string, EventHandler[]> = new Map();
  private wildcardListeners: EventHandler[] = [];

  /**
   * Subscribe to events of a specific type
   *
   * @param eventType - The event type to listen for, or '*' for all events
   * @returns Unsubscribe function
   */
  on(eventType: string, handler: EventHandler): () => void {
    if (eventType === '*') {
      this.wildcardListeners.push(handler);
      return () => {
        const index = this.wildcardListeners.indexOf(handler);
        if (index !== -1) {
          this.wildcardListeners.splice(index, 1);
        }
      };
    }

    let handlers = this.listeners.get(eventType);
    if (!handlers) {
      handlers = [];
      this.listeners.set(eventType, handlers);
    }
    handlers.push(handler);

    return () => {
      const current = this.listeners.get(eventType);
      if (current) {
        const index = current.indexOf(handler);
        if (index !== -1) {
          current.splice(index, 1);
        }
      }
    };
  }

  /**
   * Subscribe to multiple event types with the same handler
   */
  onMany(eventTypes: string[], handler: EventHandler): () => void {
    const unsubscribers = eventTypes.map((type) => this.on(type, handler));
    return () => {
      unsubscribers.forEach((unsub) => unsub());
    };
  }

  /**
   * Fire once then auto-unsubscribe
   */
  once(eventType: string, handler: EventHandler): void {
    const unsubscribe = this.on(eventType, (event) => {
      unsubscribe();
      return handler(event);
    });
  }

  /**
   * Emit an event to all subscribed handlers
   *
   * Handlers are called in registration order and async handlers are awaited.
   */
  async emit(event: ConductorEvent): Promise<void> {
    for (const handler of this.handlersFor(event.type)) {
      try {
        await handler(event);
      } catch (error) {
        reportHandlerError(event.type, error);
      }
    }
  }

  /**
   * Emit without awaiting async handlers
   */
  emitSync(event: ConductorEvent): void {
    for (const handler of this.handlersFor(event.type)) {
      try {
        const result = handler(event);
        if (result) {
          result.catch((error: unknown) => reportHandlerError(event.type, error));
        }
      } catch (error) {
        reportHandlerError(event.type, error);
      }
    }
  }

  /**
   * Remove all handlers for a specific event type
   */
  off(eventType: string): void {
    this.listeners.delete(eventType);
  }

  clear(): void {
    this.listeners.clear();
    this.wildcardListeners = [];
  }

  listenerCount(eventType: string): number {
    return (this.listeners.get(eventType) ?? []).length;
  }

  hasListeners(eventType: string): boolean {
    const handlers = this.listeners.get(eventType);
    return (handlers !== undefined && handlers.length > 0) || this.wildcardListeners.length > 0;
  }

  private handlersFor(eventType: string): EventHandler[] {
    return [...(this.listeners.get(eventType) ?? []), ...this.wildcardListeners];
  }
}

function reportHandlerError(eventType: string, error: unknown): void {
  console.error(`[EventBus] Handler error for event '${eventType}':`, error);
}
