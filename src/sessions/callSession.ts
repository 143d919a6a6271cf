import { v4 as uuidv4 } from 'uuid';
import { ConversationTurn, Intent } from '../nlu/intents';

export const ESCALATION_PHRASES = ['speak to human', 'talk to agent', 'agent please'] as const;

export const mentionsEscalation = (utterance: string): boolean => {
  const lowered = utterance.toLowerCase();
  return ESCALATION_PHRASES.some((phrase) => lowered.includes(phrase));
};

export interface ConversationRecord {
  conversation: string;
  userId: string;
  storeId: string;
  sessionId: string;
  sessionTime: Date;
  durationOfCall: number;
  callReason: Intent | null;
  escalation: boolean;
  queryType: Intent | null;
}

export interface CallSessionInit {
  callerNumber: string;
  calleeNumber: string;
  callSid?: string;
  storeName?: string;
  startTime?: Date;
}

/**
 * In-memory state of one phone call, from relay setup until the socket closes.
 */
export class CallSession {
  readonly sessionId = `session_${uuidv4()}`;
  readonly startTime: Date;
  readonly callerNumber: string;
  readonly calleeNumber: string;
  readonly callSid?: string;
  readonly storeName?: string;

  customerId: string | null = null;
  private readonly history: ConversationTurn[] = [];
  private readonly intents: Intent[] = [];
  private escalated = false;

  constructor(init: CallSessionInit) {
    this.callerNumber = init.callerNumber;
    this.calleeNumber = init.calleeNumber;
    this.callSid = init.callSid;
    this.storeName = init.storeName;
    this.startTime = init.startTime ?? new Date();
  }

  /**
   * Records what the caller said. Returns true when the utterance asks for a human.
   */
  addUserTurn(text: string): boolean {
    this.history.push({ role: 'user', text });
    if (mentionsEscalation(text)) {
      this.escalated = true;
    }
    return this.escalated;
  }

  addAgentTurn(text: string): void {
    this.history.push({ role: 'agent', text });
  }

  recordIntent(intent: Intent): void {
    this.intents.push(intent);
  }

  markEscalated(): void {
    this.escalated = true;
  }

  get isEscalated(): boolean {
    return this.escalated;
  }

  get turns(): ConversationTurn[] {
    return [...this.history];
  }

  get callReason(): Intent | null {
    return this.intents[0] ?? null;
  }

  get latestIntent(): Intent | null {
    return this.intents[this.intents.length - 1] ?? null;
  }

  transcript(): string {
    return this.history.map((turn) => `${turn.role.toUpperCase()}:\n${turn.text}\n\n`).join('');
  }

  durationSeconds(now: Date = new Date()): number {
    return Math.max(0, Math.floor((now.getTime() - this.startTime.getTime()) / 1000));
  }

  toRecord(now: Date = new Date()): ConversationRecord {
    return {
      conversation: this.transcript(),
      userId: this.customerId ?? this.callerNumber,
      storeId: this.calleeNumber,
      sessionId: this.sessionId,
      sessionTime: this.startTime,
      durationOfCall: this.durationSeconds(now),
      callReason: this.callReason,
      escalation: this.escalated,
      queryType: this.latestIntent
    };
  }
}
