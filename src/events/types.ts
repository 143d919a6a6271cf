import { Intent } from '../nlu/intents';
import type { UsageSummary } from '../services/conversationService';

/**
 * Event payload interfaces for the call lifecycle
 */

export interface CallStartEvent {
  sessionId: string;
  callerNumber: string;
  storeName?: string;
}

export interface CallEndEvent {
  sessionId: string;
  durationMs: number;
  escalated: boolean;
  intent: Intent | null;
  persisted: boolean;
  usage: UsageSummary;
}

export interface EscalationEvent {
  sessionId: string;
  reason: string;
  transferTo?: string;
}

export interface IntentDetectedEvent {
  sessionId: string;
  intent: Intent;
  entities: Record<string, unknown>;
}

export interface Events {
  call_start: CallStartEvent;
  call_end: CallEndEvent;
  escalation: EscalationEvent;
  intent_detected: IntentDetectedEvent;
}

export type EventName = keyof Events;

export type EventPayload<T extends EventName> = Events[T];

export type EventListener<T extends EventName> = (payload: EventPayload<T>) => void;

export interface TypedEmitter {
  emit<K extends EventName>(event: K, payload: EventPayload<K>): boolean;
  on<K extends EventName>(event: K, listener: EventListener<K>): this;
  once<K extends EventName>(event: K, listener: EventListener<K>): this;
  off<K extends EventName>(event: K, listener: EventListener<K>): this;
  removeAllListeners(event?: EventName): this;
  listenerCount(event: EventName): number;
}
