/**
 * EventBus - local publish/subscribe for peer events
 *
 * Maps event names to ordered handler registrations. A handler registered
 * twice fires twice. Faults in handlers are logged and never reach the
 * emitter.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger';
import type { EventHandler, HandlerArgs, HandlerMode } from './types';

/**
 * Handler storage type; method syntax keeps parameters bivariant so typed
 * handlers of every event fit one list
 */
type StoredHandler = {
  bivarianceHack(...args: unknown[]): void | Promise<void>;
}['bivarianceHack'];

interface HandlerRegistration {
  readonly mode: HandlerMode;
  readonly handler: StoredHandler;
}

export class EventBus {
  private readonly _handlers: Map<string, HandlerRegistration[]> = new Map();
  private readonly _logger: Logger;

  constructor(logger: Logger) {
    this._logger = logger.child({ component: 'EventBus' });
  }

  /**
   * Register a handler
   *
   * @param mode - 'inline' (default) runs inside emitLocal; 'deferred' runs on setImmediate
   */
  on<E extends string>(event: E, handler: EventHandler<E>, mode: HandlerMode = 'inline'): void {
    const registrations = this._handlers.get(event) ?? [];
    registrations.push({ mode, handler });
    this._handlers.set(event, registrations);
  }

  /**
   * Remove the first registration of `handler`, or every handler of the
   * event when no handler is given
   */
  off<E extends string>(event: E, handler?: EventHandler<E>): void {
    const registrations = this._handlers.get(event);
    if (!registrations) {
      return;
    }

    if (handler === undefined) {
      this._handlers.delete(event);
      return;
    }

    const index = registrations.findIndex((registration) => registration.handler === handler);
    if (index !== -1) {
      registrations.splice(index, 1);
    }
    if (registrations.length === 0) {
      this._handlers.delete(event);
    }
  }

  listenerCount(event: string): number {
    return this._handlers.get(event)?.length ?? 0;
  }

  /**
   * Invoke every registration of `event` in registration order
   */
  emitLocal<E extends string>(event: E, ...args: HandlerArgs<E>): void {
    const registrations = this._handlers.get(event);
    if (!registrations || registrations.length === 0) {
      return;
    }

    // Handlers may call on/off while we iterate
    for (const registration of [...registrations]) {
      if (registration.mode === 'deferred') {
        setImmediate(() => this.invoke(event, registration.handler, args));
      } else {
        this.invoke(event, registration.handler, args);
      }
    }
  }

  removeAllListeners(): void {
    this._handlers.clear();
  }

  private invoke(event: string, handler: StoredHandler, args: unknown[]): void {
    try {
      const result = handler(...args);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.logHandlerFault(event, error));
      }
    } catch (error) {
      this.logHandlerFault(event, error);
    }
  }

  private logHandlerFault(event: string, error: unknown): void {
    this._logger.error(
      {
        event: 'handler_failed',
        eventName: event,
        error: error instanceof Error ? error.message : String(error),
      },
      'Error in event handler'
    );
  }
}
