import { EventEmitter } from 'events';
import { EventListener, EventName, EventPayload, TypedEmitter } from './types';
import { logger } from '../utils/logger';

type RawListener = (payload: unknown) => void;

/**
 * Type-safe bus for call lifecycle events. A throwing listener is logged and
 * does not stop the remaining listeners or the emitter.
 */
class TypedEventBus implements TypedEmitter {
  private static instance: TypedEventBus;
  private readonly emitter = new EventEmitter();
  // listener -> function registered on the emitter, per event
  private readonly wrapped = new Map<EventName, Map<(payload: never) => void, RawListener>>();

  constructor(maxListeners = 100) {
    this.emitter.setMaxListeners(maxListeners);
  }

  static getInstance(): TypedEventBus {
    if (!TypedEventBus.instance) {
      TypedEventBus.instance = new TypedEventBus();
    }
    return TypedEventBus.instance;
  }

  emit<K extends EventName>(event: K, payload: EventPayload<K>): boolean {
    logger.debug('Event emitted', { operation: 'event_emit', eventType: event }, { payload });
    return this.emitter.emit(event, payload);
  }

  on<K extends EventName>(event: K, listener: EventListener<K>): this {
    this.emitter.on(event, this.wrap(event, listener));
    return this;
  }

  once<K extends EventName>(event: K, listener: EventListener<K>): this {
    this.emitter.once(event, this.wrap(event, listener, true));
    return this;
  }

  off<K extends EventName>(event: K, listener: EventListener<K>): this {
    const registered = this.wrapped.get(event);
    const raw = registered?.get(listener);
    if (raw) {
      this.emitter.off(event, raw);
      registered?.delete(listener);
    }
    return this;
  }

  removeAllListeners(event?: EventName): this {
    if (event) {
      this.emitter.removeAllListeners(event);
      this.wrapped.delete(event);
    } else {
      this.emitter.removeAllListeners();
      this.wrapped.clear();
    }
    return this;
  }

  listenerCount(event: EventName): number {
    return this.emitter.listenerCount(event);
  }

  getStats(): { totalListeners: number; eventCounts: Record<string, number> } {
    const eventCounts: Record<string, number> = {};
    let totalListeners = 0;
    for (const name of this.emitter.eventNames()) {
      const count = this.emitter.listenerCount(name);
      eventCounts[String(name)] = count;
      totalListeners += count;
    }
    return { totalListeners, eventCounts };
  }

  private wrap<K extends EventName>(event: K, listener: EventListener<K>, once = false): RawListener {
    const registered = this.wrapped.get(event) ?? new Map<(payload: never) => void, RawListener>();
    this.wrapped.set(event, registered);

    const raw = (payload: unknown) => {
      if (once) {
        registered.delete(listener);
      }
      try {
        // Only emit() puts values on the emitter, always typed by event name.
        listener(payload as EventPayload<K>);
      } catch (error) {
        logger.error('Event listener error', error as Error, {
          operation: 'event_listener_error',
          eventType: event
        });
      }
    };
    registered.set(listener, raw);
    return raw;
  }
}

export const eventBus = TypedEventBus.getInstance();

export { TypedEventBus };
