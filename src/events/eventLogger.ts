import { eventBus } from './bus';
import { logger } from '../utils/logger';
import { EventListener, EventName } from './types';

/**
 * Writes every call lifecycle event to the log.
 */
class EventLogger {
  private static instance: EventLogger;
  private readonly subscriptions: Array<() => void> = [];

  constructor() {
    this.subscribe('call_start', (payload) => {
      logger.info('Call started', {
        sessionId: payload.sessionId,
        storeName: payload.storeName,
        operation: 'call_start',
        eventType: 'lifecycle'
      }, { callerNumber: payload.callerNumber });
    });

    this.subscribe('call_end', (payload) => {
      logger.info('Call ended', {
        sessionId: payload.sessionId,
        intent: payload.intent ?? undefined,
        operation: 'call_end',
        eventType: 'lifecycle'
      }, {
        durationMs: payload.durationMs,
        escalated: payload.escalated,
        persisted: payload.persisted,
        usage: payload.usage
      });
    });

    this.subscribe('escalation', (payload) => {
      logger.warn('Call escalated', {
        sessionId: payload.sessionId,
        operation: 'escalation',
        eventType: 'lifecycle'
      }, { reason: payload.reason, transferTo: payload.transferTo });
    });

    this.subscribe('intent_detected', (payload) => {
      logger.debug('Intent detected', {
        sessionId: payload.sessionId,
        intent: payload.intent,
        operation: 'intent_detected',
        eventType: 'lifecycle'
      }, { entities: payload.entities });
    });
  }

  static getInstance(): EventLogger {
    if (!EventLogger.instance) {
      EventLogger.instance = new EventLogger();
    }
    return EventLogger.instance;
  }

  stop(): void {
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
  }

  private subscribe<K extends EventName>(event: K, listener: EventListener<K>): void {
    eventBus.on(event, listener);
    this.subscriptions.push(() => eventBus.off(event, listener));
  }
}

export { EventLogger };
