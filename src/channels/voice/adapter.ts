import express from 'express';
import twilio from 'twilio';
import { WebSocket } from 'ws';
import { ShopifyClient } from '../../commerce/shopifyClient';
import { eventBus } from '../../events/bus';
import { KnowledgeSearcher } from '../../knowledge/knowledgeSearcher';
import { UtteranceAnalysis } from '../../nlu/entityExtractor';
import { ConversationHistory } from '../../nlu/intents';
import { ConversationService } from '../../services/conversationService';
import { CallSession, ConversationRecord } from '../../sessions/callSession';
import { StoreProfile } from '../../stores/storeDirectory';
import { CallContext } from '../../tools/context';
import { logger } from '../../utils/logger';
import {
  HANDOFF_REASON_CODE,
  RelayMessageOf,
  RelayResponse,
  handoffDataSchema,
  relayMessageSchema
} from './types';

export const GENERIC_GREETING = 'Hello, welcome to our online store. How can I help you today?';
export const APOLOGY = "I apologize, but I'm experiencing technical difficulties. Please try again.";

export const greetingFor = (store: StoreProfile | null): string =>
  store ? `Hello, welcome to ${store.storeName}. How can I help you today?` : GENERIC_GREETING;

export interface VoiceAdapterDeps {
  stores: { lookup(phoneNumber: string): Promise<StoreProfile | null> };
  conversations: { save(record: ConversationRecord): Promise<boolean> };
  analyzer: { analyze(history: ConversationHistory, utterance: string): Promise<UtteranceAnalysis> } | null;
  conversation: ConversationService;
  knowledge: KnowledgeSearcher;
  commerceFor: (store: StoreProfile) => ShopifyClient;
  transferNumber?: string;
  /** Host used in TwiML URLs; the request's Host header when unset. */
  publicHost?: string;
}

/**
 * State of one ConversationRelay socket.
 */
export interface RelayConnection {
  send(response: RelayResponse): void;
  call: CallContext | null;
  customerLookup?: Promise<void>;
}

/**
 * Voice channel over Twilio ConversationRelay. Twilio does speech recognition
 * and synthesis; this adapter exchanges text with it over a WebSocket and
 * drives one storefront agent turn per caller prompt.
 */
export class VoiceAdapter {
  constructor(private readonly deps: VoiceAdapterDeps) {}

  /**
   * TwiML connecting an incoming call to the relay socket. When the relay
   * session ends, Twilio posts to the handoff URL.
   */
  processVoiceWebhook(req: express.Request, res: express.Response): void {
    const params = req.method === 'POST' ? req.body : req.query;
    logger.info(`Voice webhook received (${req.method})`, {
      operation: 'voice_webhook',
      adapterName: 'voice',
      callSid: typeof params?.CallSid === 'string' ? params.CallSid : undefined
    }, { from: params?.From, to: params?.To });

    const host = this.deps.publicHost || req.get('host') || 'localhost';
    const secure = Boolean(this.deps.publicHost) || req.get('x-forwarded-proto') === 'https' || req.secure;

    const response = new twilio.twiml.VoiceResponse();
    const connect = response.connect({ action: `${secure ? 'https' : 'http'}://${host}/voice/handoff` });
    connect.conversationRelay({ url: `${secure ? 'wss' : 'ws'}://${host}/conversation-relay` });

    res.type('text/xml');
    res.send(response.toString());
  }

  /**
   * Answers the callback Twilio makes when the relay session ends. A
   * live-agent handoff dials the transfer number; anything else hangs up.
   */
  processHandoff(req: express.Request, res: express.Response): void {
    const response = new twilio.twiml.VoiceResponse();
    const raw = typeof req.body?.HandoffData === 'string' ? req.body.HandoffData : '';

    let transferTo: string | undefined;
    if (raw) {
      try {
        const parsed = handoffDataSchema.safeParse(JSON.parse(raw));
        if (parsed.success && parsed.data.reasonCode === HANDOFF_REASON_CODE) {
          transferTo = parsed.data.transferTo;
        }
      } catch (error) {
        logger.warn('Unreadable handoff data', { operation: 'voice_handoff' }, { error: (error as Error).message });
      }
    }

    if (transferTo) {
      logger.info('Dialling transfer number', { operation: 'voice_handoff' }, { transferTo });
      response.dial(transferTo);
    } else {
      response.hangup();
    }

    res.type('text/xml');
    res.send(response.toString());
  }

  /**
   * Binds a relay WebSocket to a new connection and routes its messages.
   */
  processConversationRelay(ws: WebSocket, req: express.Request): RelayConnection {
    const connection: RelayConnection = {
      call: null,
      send: (response) => {
        if (ws.readyState === WebSocket.OPEN) {
          ws.send(JSON.stringify(response));
        }
      }
    };

    logger.info('Voice WebSocket connection established', {
      operation: 'voice_websocket_connection',
      adapterName: 'voice'
    }, { remoteAddress: req.ip });

    let pending: Promise<void> = Promise.resolve();
    ws.on('message', (data) => {
      pending = pending.then(() => this.handleMessage(connection, data.toString()));
    });

    ws.on('close', (code: number) => {
      logger.info('Voice WebSocket connection closed', {
        sessionId: connection.call?.session.sessionId,
        operation: 'voice_websocket_close',
        adapterName: 'voice'
      }, { code });
      pending = pending
        .then(() => this.handleClose(connection))
        .then(
          () => undefined,
          (error: Error) => {
            logger.error('Failed to finish call', error, { operation: 'voice_call_end', adapterName: 'voice' });
          }
        );
    });

    ws.on('error', (error: Error) => {
      logger.error('Voice WebSocket error', error, {
        sessionId: connection.call?.session.sessionId,
        operation: 'voice_websocket_error',
        adapterName: 'voice'
      });
    });

    return connection;
  }

  /**
   * Handles one raw relay message. Never rejects: failures are logged and the
   * caller hears an apology.
   */
  async handleMessage(connection: RelayConnection, raw: string): Promise<void> {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      logger.warn('Voice message is not JSON', { operation: 'voice_message', adapterName: 'voice' }, {
        error: (error as Error).message
      });
      return;
    }

    const parsed = relayMessageSchema.safeParse(payload);
    if (!parsed.success) {
      logger.warn('Unknown voice message type', { operation: 'voice_message', adapterName: 'voice' }, {
        issues: parsed.error.issues.map((issue) => issue.message)
      });
      return;
    }

    const message = parsed.data;
    try {
      switch (message.type) {
        case 'setup':
          await this.handleSetup(connection, message);
          break;
        case 'prompt':
          await this.handlePrompt(connection, message.voicePrompt);
          break;
        case 'dtmf':
          await this.handlePrompt(connection, `DTMF: ${message.digit}`);
          break;
        case 'interrupt':
          logger.debug('Caller interrupted playback', {
            sessionId: connection.call?.session.sessionId,
            operation: 'voice_interrupt',
            adapterName: 'voice'
          }, { heard: message.utteranceUntilInterrupt });
          break;
        case 'error':
          logger.warn('ConversationRelay reported an error', {
            sessionId: connection.call?.session.sessionId,
            operation: 'voice_relay_error',
            adapterName: 'voice'
          }, { description: message.description });
          break;
      }
    } catch (error) {
      logger.error('Voice message processing failed', error as Error, {
        sessionId: connection.call?.session.sessionId,
        operation: 'voice_message',
        adapterName: 'voice'
      });
      connection.send({ type: 'text', token: APOLOGY, last: true });
    }
  }

  async handleSetup(connection: RelayConnection, message: RelayMessageOf<'setup'>): Promise<void> {
    const store = await this.deps.stores.lookup(message.to);
    const session = new CallSession({
      callerNumber: message.from,
      calleeNumber: message.to,
      callSid: message.callSid,
      storeName: store?.storeName
    });
    const commerce = store ? this.deps.commerceFor(store) : null;

    connection.call = {
      session,
      store,
      commerce,
      knowledge: this.deps.knowledge,
      transferNumber: this.deps.transferNumber
    };

    if (commerce && message.from) {
      connection.customerLookup = this.resolveCustomer(session, commerce);
    }
    if (!store) {
      logger.error('Failed to retrieve store info for phone number', undefined, {
        sessionId: session.sessionId,
        callSid: message.callSid,
        operation: 'voice_setup',
        adapterName: 'voice'
      }, { calleeNumber: message.to });
    }

    eventBus.emit('call_start', {
      sessionId: session.sessionId,
      callerNumber: message.from,
      storeName: store?.storeName
    });

    const greeting = greetingFor(store);
    session.addAgentTurn(greeting);
    connection.send({ type: 'text', token: greeting, last: true });
  }

  async handlePrompt(connection: RelayConnection, utterance: string): Promise<void> {
    const ctx = connection.call;
    const text = utterance.trim();
    if (!ctx) {
      logger.warn('Prompt received before setup', { operation: 'voice_prompt', adapterName: 'voice' });
      connection.send({ type: 'text', token: APOLOGY, last: true });
      return;
    }
    if (!text) {
      return;
    }

    const { session } = ctx;
    const history = session.turns;
    if (session.addUserTurn(text)) {
      logger.info('Caller asked for a human', { sessionId: session.sessionId, operation: 'voice_prompt' });
    }

    if (this.deps.analyzer) {
      const analysis = await this.deps.analyzer.analyze(history, text);
      ctx.analysis = analysis;
      session.recordIntent(analysis.intent);
      eventBus.emit('intent_detected', {
        sessionId: session.sessionId,
        intent: analysis.intent,
        entities: analysis.entities
      });
    }

    let reply: string;
    try {
      reply = await this.deps.conversation.processTurn(ctx, text);
    } catch (error) {
      logger.error('Agent turn failed', error as Error, {
        sessionId: session.sessionId,
        storeName: ctx.store?.storeName,
        operation: 'voice_prompt',
        adapterName: 'voice'
      });
      reply = APOLOGY;
    }

    session.addAgentTurn(reply);
    connection.send({ type: 'text', token: reply, last: true });

    if (ctx.handoff) {
      connection.send({
        type: 'end',
        handoffData: JSON.stringify({
          reasonCode: HANDOFF_REASON_CODE,
          reason: ctx.handoff.reason,
          transferTo: ctx.handoff.transferTo
        })
      });
    }
  }

  /**
   * Persists the finished call. Returns whether the call log row was written.
   */
  async handleClose(connection: RelayConnection): Promise<boolean> {
    const ctx = connection.call;
    if (!ctx) {
      return false;
    }
    connection.call = null;

    await connection.customerLookup;
    const now = new Date();
    const record = ctx.session.toRecord(now);
    const persisted = await this.deps.conversations.save(record);
    const usage = this.deps.conversation.endSession(ctx.session.sessionId);

    eventBus.emit('call_end', {
      sessionId: ctx.session.sessionId,
      durationMs: now.getTime() - ctx.session.startTime.getTime(),
      escalated: ctx.session.isEscalated,
      intent: ctx.session.callReason,
      persisted,
      usage
    });
    logger.logCallEnd(ctx.session.sessionId, record.durationOfCall, ctx.session.turns.length, usage);
    return persisted;
  }

  private async resolveCustomer(session: CallSession, commerce: ShopifyClient): Promise<void> {
    try {
      const customerId = await commerce.fetchCustomerId(session.callerNumber);
      if (customerId && !session.customerId) {
        session.customerId = customerId;
      }
      logger.debug('Caller customer lookup finished', {
        sessionId: session.sessionId,
        operation: 'customer_lookup'
      }, { found: Boolean(customerId) });
    } catch (error) {
      logger.warn('Caller customer lookup failed', {
        sessionId: session.sessionId,
        operation: 'customer_lookup'
      }, { error: (error as Error).message });
    }
  }
}
