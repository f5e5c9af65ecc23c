import { EventEmitter } from 'node:events';

/**
 * Any event carried by an {@link EventBus}; `type` is the routing key.
 */
export interface BusEvent {
  type: string;
  timestamp: string;
}

export type EventHandler<TEvent extends BusEvent> = (event: TEvent) => void;

const WILDCARD = '*';

/**
 * Typed wrapper over `EventEmitter`. Every event is delivered to handlers of
 * its own type and to wildcard handlers. A throwing handler is reported to
 * `onHandlerError` and does not stop delivery to the others.
 */
export class EventBus<TEvent extends BusEvent> {
  private emitter = new EventEmitter();
  private onHandlerError: (error: unknown, event: TEvent) => void;

  constructor(options: { maxListeners?: number; onHandlerError?: (error: unknown, event: TEvent) => void } = {}) {
    this.emitter.setMaxListeners(options.maxListeners ?? 50);
    this.onHandlerError = options.onHandlerError ?? (() => undefined);
  }

  publish(event: TEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit(WILDCARD, event);
  }

  subscribe<TType extends TEvent['type']>(
    eventType: TType,
    handler: EventHandler<Extract<TEvent, { type: TType }>>
  ): () => void {
    const listener = (event: Extract<TEvent, { type: TType }>) => {
      try {
        handler(event);
      } catch (error) {
        this.onHandlerError(error, event);
      }
    };
    this.emitter.on(eventType, listener);
    return () => {
      this.emitter.off(eventType, listener);
    };
  }

  subscribeAll(handler: EventHandler<TEvent>): () => void {
    const listener = (event: TEvent) => {
      try {
        handler(event);
      } catch (error) {
        this.onHandlerError(error, event);
      }
    };
    this.emitter.on(WILDCARD, listener);
    return () => {
      this.emitter.off(WILDCARD, listener);
    };
  }

  listenerCount(eventType?: string): number {
    return this.emitter.listenerCount(eventType ?? WILDCARD);
  }

  removeAllListeners(eventType?: string): void {
    this.emitter.removeAllListeners(eventType);
  }
}
