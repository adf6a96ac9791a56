/**
 * Typed event emitter used by the rapp manager and its parts.
 *
 * Extend `EventEmitterProtected` when only the owning class may emit, or use
 * `EventEmitter` when any holder of the emitter may trigger events.
 *
 * Listener failures (sync throws and rejected promises) never propagate into
 * the emitting code. They are handed to the `onListenerError` callback given
 * to the constructor, which the manager wires to its logger.
 */

import { isPromise } from './is-promise';

export type EventCallback<T> = (data: T) => void | Promise<void>;

export type ListenerErrorHandler = (event: string, error: unknown) => void;

export interface EventEmitterOptions {
  onListenerError?: ListenerErrorHandler;
}

export class EventEmitterProtected<
  TEventMap extends object = Record<string, unknown>,
> {
  private events: Map<keyof TEventMap, Set<EventCallback<never>>> = new Map();
  private onListenerError: ListenerErrorHandler;

  constructor(options: EventEmitterOptions = {}) {
    this.onListenerError =
      options.onListenerError ??
      ((event, error): void => {
        // eslint-disable-next-line no-console
        console.error(`Error in event handler for ${event}:`, error);
      });
  }

  /**
   * Subscribe to an event
   * @returns A function to unsubscribe from the event
   */
  public on<K extends keyof TEventMap & string>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    let callbacks = this.events.get(event);

    if (!callbacks) {
      callbacks = new Set();
      this.events.set(event, callbacks);
    }

    callbacks.add(callback);

    return () => {
      const current = this.events.get(event);
      if (current) {
        current.delete(callback);

        if (current.size === 0) {
          this.events.delete(event);
        }
      }
    };
  }

  /**
   * Subscribe to an event once - automatically unsubscribes after first emission
   */
  public once<K extends keyof TEventMap & string>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      return callback(data);
    });

    return unsubscribe;
  }

  public hasListeners(event: keyof TEventMap & string): boolean {
    return (this.events.get(event)?.size ?? 0) > 0;
  }

  public listenerCount(event: keyof TEventMap & string): number {
    return this.events.get(event)?.size ?? 0;
  }

  /**
   * Remove all event listeners, or only those of one event
   */
  public clear(event?: keyof TEventMap & string): void {
    if (event) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
  }

  /**
   * Emit an event. Protected so only derived classes can trigger events.
   */
  protected emit<K extends keyof TEventMap & string>(
    event: K,
    data: TEventMap[K],
  ): void {
    const callbacks = this.events.get(event);
    if (!callbacks) {
      return;
    }

    // Copy so once() unsubscribing during iteration doesn't skip listeners
    for (const callback of [...callbacks]) {
      try {
        const result = (callback as EventCallback<TEventMap[K]>)(data);

        if (isPromise(result)) {
          result.catch((error: unknown) => {
            this.onListenerError(event, error);
          });
        }
      } catch (error) {
        this.onListenerError(event, error);
      }
    }
  }
}

/**
 * Event emitter with a public emit method.
 */
export class EventEmitter<
  TEventMap extends object = Record<string, unknown>,
> extends EventEmitterProtected<TEventMap> {
  public override emit<K extends keyof TEventMap & string>(
    event: K,
    data: TEventMap[K],
  ): void {
    super.emit(event, data);
  }
}
