// ============================================
// Event Bus
// Type-safe event system with Zod validation
// ============================================

import type { z } from "zod";

/**
 * Error thrown when EventBus.waitFor() times out waiting for an event.
 */
export class EventTimeoutError extends Error {
  readonly timeout: number;

  constructor(timeout: number, eventName: string) {
    super(`Timeout after ${timeout}ms waiting for event "${eventName}"`);
    this.name = "EventTimeoutError";
    this.timeout = timeout;
  }
}

/**
 * Defines a typed event with name and Zod schema for validation.
 */
export interface EventDefinition<T> {
  readonly name: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Factory function to create a type-safe event definition.
 *
 * @example
 * ```typescript
 * const budgetClosed = defineEvent("budget:closed", z.object({
 *   budget: z.string(),
 *   spent: z.bigint(),
 * }));
 *
 * bus.on(budgetClosed, (payload) => {
 *   // payload is typed as { budget: string; spent: bigint }
 * });
 * ```
 */
export function defineEvent<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): EventDefinition<T> {
  return { name, schema };
}

type Handler<T> = (payload: T) => void;

type Listener = (payload: unknown) => void;

/**
 * Type-safe event bus with subscription management.
 *
 * Every delivered payload is parsed against the event's schema, so a
 * malformed emit throws at the emitter instead of reaching handlers.
 * Handlers run synchronously in subscription order.
 *
 * @example
 * ```typescript
 * const bus = new EventBus();
 *
 * const unsubscribe = bus.on(retryAttempt, (payload) => {
 *   console.log(payload.modelId, payload.attempt);
 * });
 *
 * bus.emit(retryAttempt, { ... });
 * unsubscribe();
 * ```
 */
export class EventBus {
  private readonly listeners = new Map<string, Map<object, Listener>>();

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<T>(event: EventDefinition<T>, handler: Handler<T>): () => void {
    const listeners = this.getOrCreateListeners(event.name);
    listeners.set(handler, (payload) => handler(event.schema.parse(payload)));

    return () => {
      this.off(event, handler);
    };
  }

  /**
   * Subscribe to an event once. Handler auto-unsubscribes after first call.
   */
  once<T>(event: EventDefinition<T>, handler: Handler<T>): () => void {
    const wrappedHandler: Handler<T> = (payload) => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  off<T>(event: EventDefinition<T>, handler: Handler<T>): void {
    const listeners = this.listeners.get(event.name);
    if (listeners) {
      listeners.delete(handler);
      if (listeners.size === 0) {
        this.listeners.delete(event.name);
      }
    }
  }

  /**
   * Emit an event to all subscribed handlers.
   *
   * @throws ZodError if the payload does not match the event schema
   */
  emit<T>(event: EventDefinition<T>, payload: T): void {
    const listeners = this.listeners.get(event.name);
    if (!listeners) {
      return;
    }
    for (const listener of [...listeners.values()]) {
      listener(payload);
    }
  }

  hasListeners<T>(event: EventDefinition<T>): boolean {
    const listeners = this.listeners.get(event.name);
    return listeners !== undefined && listeners.size > 0;
  }

  /**
   * Remove all handlers for a specific event or all events.
   */
  clear<T>(event?: EventDefinition<T>): void {
    if (event) {
      this.listeners.delete(event.name);
    } else {
      this.listeners.clear();
    }
  }

  /**
   * Resolve with the next payload of `event` that passes `filter`.
   *
   * @throws EventTimeoutError if `timeout` is set and exceeded
   */
  waitFor<T>(
    event: EventDefinition<T>,
    options?: { filter?: (payload: T) => boolean; timeout?: number }
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const unsubscribe = this.on(event, (payload) => {
        if (options?.filter && !options.filter(payload)) {
          return;
        }
        cleanup();
        resolve(payload);
      });

      const cleanup = (): void => {
        if (timeoutId !== undefined) {
          clearTimeout(timeoutId);
        }
        unsubscribe();
      };

      if (options?.timeout !== undefined && options.timeout > 0) {
        const timeoutMs = options.timeout;
        timeoutId = setTimeout(() => {
          cleanup();
          reject(new EventTimeoutError(timeoutMs, event.name));
        }, timeoutMs);
      }
    });
  }

  private getOrCreateListeners(eventName: string): Map<object, Listener> {
    let listeners = this.listeners.get(eventName);
    if (!listeners) {
      listeners = new Map();
      this.listeners.set(eventName, listeners);
    }
    return listeners;
  }
}
