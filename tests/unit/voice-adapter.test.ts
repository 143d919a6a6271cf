import { Agent, type AgentInputItem } from '@openai/agents';
import { createStorefrontAgent } from '../../src/agents/storefront';
import { APOLOGY, GENERIC_GREETING, RelayConnection, VoiceAdapter, VoiceAdapterDeps } from '../../src/channels/voice/adapter';
import { ShopifyClient } from '../../src/commerce/shopifyClient';
import { SqlClient } from '../../src/db/sqlClient';
import { eventBus } from '../../src/events/bus';
import { CallEndEvent, CallStartEvent } from '../../src/events/types';
import { KnowledgeSearcher } from '../../src/knowledge/knowledgeSearcher';
import { PgVectorIndex } from '../../src/knowledge/vectorIndex';
import { ConversationService, TurnOutcome, emptyUsage } from '../../src/services/conversationService';
import { StoreProfile } from '../../src/stores/storeDirectory';
import { CallContext } from '../../src/tools/context';
import { logger } from '../../src/utils/logger';

const STORE_NUMBER = '+15550002222';
const CALLER_NUMBER = '+15550001111';
const GREETING = 'Hello, welcome to Acme Outfitters. How can I help you today?';

const store: StoreProfile = {
  phoneNumber: STORE_NUMBER,
  storeName: 'Acme Outfitters',
  storeDetails: 'Outdoor gear since 1990',
  accessToken: 'test-token',
  shopDomain: 'acme.myshopify.com',
  transferNumber: '+15550009999'
};

const setupMessage = JSON.stringify({
  type: 'setup',
  sessionId: 'VX-test',
  callSid: 'CA-test',
  from: CALLER_NUMBER,
  to: STORE_NUMBER
});

const prompt = (voicePrompt: string) => JSON.stringify({ type: 'prompt', voicePrompt, lang: 'en-US', last: true });

describe('VoiceAdapter', () => {
  let runTurn: jest.Mock<Promise<TurnOutcome>, [Agent<CallContext>, AgentInputItem[], CallContext]>;
  let analyze: jest.Mock;
  let lookup: jest.Mock;
  let save: jest.Mock;
  let commerce: ShopifyClient;
  let deps: VoiceAdapterDeps;
  let adapter: VoiceAdapter;
  let connection: RelayConnection;
  let send: jest.Mock;

  const replyWith = (finalOutput: string) =>
    runTurn.mockImplementation(async (_agent, input) => ({ finalOutput, history: input }));

  const activeCall = (): CallContext => {
    if (!connection.call) {
      throw new Error('no active call');
    }
    return connection.call;
  };

  beforeEach(() => {
    jest.clearAllMocks();

    const sql: SqlClient = { query: jest.fn().mockResolvedValue({ rows: [] }) };
    const knowledge = new KnowledgeSearcher(
      new PgVectorIndex(sql),
      { embed: jest.fn().mockResolvedValue([0.1]) },
      { documents: 'knowledge_documents', products: 'knowledge_products' }
    );
    commerce = new ShopifyClient({ shopDomain: store.shopDomain, accessToken: store.accessToken });
    jest.spyOn(commerce, 'fetchCustomerId').mockResolvedValue('9');

    runTurn = jest.fn();
    analyze = jest.fn().mockResolvedValue({ intent: 'order', entities: { order_id: '1001' }, query: '' });
    lookup = jest.fn().mockResolvedValue(store);
    save = jest.fn().mockResolvedValue(true);

    deps = {
      stores: { lookup },
      conversations: { save },
      analyzer: { analyze },
      conversation: new ConversationService(createStorefrontAgent('gpt-4o-mini'), runTurn),
      knowledge,
      commerceFor: jest.fn().mockReturnValue(commerce)
    };
    adapter = new VoiceAdapter(deps);
    send = jest.fn();
    connection = { call: null, send };
  });

  afterEach(() => {
    eventBus.removeAllListeners();
  });

  describe('setup', () => {
    it('should greet the caller by store name and start the customer lookup', async () => {
      const starts: CallStartEvent[] = [];
      eventBus.on('call_start', (payload) => starts.push(payload));

      await adapter.handleMessage(connection, setupMessage);

      const call = activeCall();
      expect(lookup).toHaveBeenCalledWith(STORE_NUMBER);
      expect(send).toHaveBeenCalledWith({ type: 'text', token: GREETING, last: true });
      expect(call.store).toEqual(store);
      expect(call.commerce).toBe(commerce);
      expect(call.session.callerNumber).toBe(CALLER_NUMBER);
      expect(call.session.callSid).toBe('CA-test');
      expect(call.session.turns).toEqual([{ role: 'agent', text: GREETING }]);

      await connection.customerLookup;
      expect(call.session.customerId).toBe('9');
      expect(starts).toEqual([
        { sessionId: call.session.sessionId, callerNumber: CALLER_NUMBER, storeName: 'Acme Outfitters' }
      ]);
    });

    it('should fall back to a generic greeting for an unknown number', async () => {
      lookup.mockResolvedValue(null);

      await adapter.handleMessage(connection, setupMessage);

      expect(send).toHaveBeenCalledWith({ type: 'text', token: GENERIC_GREETING, last: true });
      expect(activeCall().commerce).toBeNull();
      expect(connection.customerLookup).toBeUndefined();
      expect(logger.error).toHaveBeenCalledWith(
        'Failed to retrieve store info for phone number',
        undefined,
        expect.objectContaining({ operation: 'voice_setup' }),
        { calleeNumber: STORE_NUMBER }
      );
    });

    it('should pass the configured transfer number to the call', async () => {
      adapter = new VoiceAdapter({ ...deps, transferNumber: '+15550008888' });

      await adapter.handleMessage(connection, setupMessage);

      expect(activeCall().transferNumber).toBe('+15550008888');
    });
  });

  describe('message validation', () => {
    it('should ignore payloads that are not JSON', async () => {
      await adapter.handleMessage(connection, 'not json');

      expect(send).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        'Voice message is not JSON',
        expect.objectContaining({ operation: 'voice_message' }),
        expect.objectContaining({ error: expect.any(String) })
      );
    });

    it('should ignore unknown message types', async () => {
      await adapter.handleMessage(connection, JSON.stringify({ type: 'mystery' }));

      expect(send).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith('Unknown voice message type', expect.anything(), expect.anything());
    });

    it('should only log interrupts and relay errors', async () => {
      await adapter.handleMessage(connection, setupMessage);
      send.mockClear();

      await adapter.handleMessage(connection, JSON.stringify({ type: 'interrupt', utteranceUntilInterrupt: 'Hello, wel' }));
      await adapter.handleMessage(connection, JSON.stringify({ type: 'error', description: 'tts failed' }));

      expect(send).not.toHaveBeenCalled();
      expect(runTurn).not.toHaveBeenCalled();
    });
  });

  describe('prompts', () => {
    it('should apologise for a prompt that arrives before setup', async () => {
      await adapter.handleMessage(connection, prompt('hello'));

      expect(send).toHaveBeenCalledWith({ type: 'text', token: APOLOGY, last: true });
      expect(runTurn).not.toHaveBeenCalled();
    });

    it('should analyse the utterance, run the agent and speak the reply', async () => {
      replyWith('Order 1001 shipped yesterday.');
      await adapter.handleMessage(connection, setupMessage);

      await adapter.handleMessage(connection, prompt('  where is order 1001 '));

      const call = activeCall();
      expect(analyze).toHaveBeenCalledWith([{ role: 'agent', text: GREETING }], 'where is order 1001');
      expect(call.analysis?.intent).toBe('order');
      expect(call.session.callReason).toBe('order');
      expect(runTurn).toHaveBeenCalledWith(expect.anything(), [{ role: 'user', content: 'where is order 1001' }], call);
      expect(send).toHaveBeenLastCalledWith({ type: 'text', token: 'Order 1001 shipped yesterday.', last: true });
      expect(call.session.turns.map((turn) => turn.role)).toEqual(['agent', 'user', 'agent']);
    });

    it('should skip empty prompts', async () => {
      await adapter.handleMessage(connection, setupMessage);
      send.mockClear();

      await adapter.handleMessage(connection, prompt('   '));

      expect(send).not.toHaveBeenCalled();
      expect(analyze).not.toHaveBeenCalled();
    });

    it('should run the agent without analysis when the analyzer is disabled', async () => {
      adapter = new VoiceAdapter({ ...deps, analyzer: null });
      replyWith('Sure.');
      await adapter.handleMessage(connection, setupMessage);

      await adapter.handleMessage(connection, prompt('hi'));

      expect(activeCall().analysis).toBeUndefined();
      expect(send).toHaveBeenLastCalledWith({ type: 'text', token: 'Sure.', last: true });
    });

    it('should treat keypad digits as a prompt', async () => {
      replyWith('Got it.');
      await adapter.handleMessage(connection, setupMessage);

      await adapter.handleMessage(connection, JSON.stringify({ type: 'dtmf', digit: '5' }));

      expect(analyze).toHaveBeenCalledWith(expect.any(Array), 'DTMF: 5');
      expect(send).toHaveBeenLastCalledWith({ type: 'text', token: 'Got it.', last: true });
    });

    it('should apologise when the agent turn fails', async () => {
      runTurn.mockRejectedValue(new Error('model unavailable'));
      await adapter.handleMessage(connection, setupMessage);

      await adapter.handleMessage(connection, prompt('hello'));

      expect(send).toHaveBeenLastCalledWith({ type: 'text', token: APOLOGY, last: true });
      expect(activeCall().session.turns[2]).toEqual({ role: 'agent', text: APOLOGY });
    });

    it('should apologise when the analysis fails', async () => {
      analyze.mockRejectedValue(new Error('classifier down'));
      await adapter.handleMessage(connection, setupMessage);

      await adapter.handleMessage(connection, prompt('hello'));

      expect(runTurn).not.toHaveBeenCalled();
      expect(send).toHaveBeenLastCalledWith({ type: 'text', token: APOLOGY, last: true });
      expect(logger.error).toHaveBeenCalledWith(
        'Voice message processing failed',
        expect.any(Error),
        expect.objectContaining({ operation: 'voice_message' })
      );
    });

    it('should end the relay session with handoff data after a transfer', async () => {
      runTurn.mockImplementation(async (_agent, input, context) => {
        context.handoff = { reason: 'Billing dispute', transferTo: '+15550009999' };
        return { finalOutput: 'Connecting you to a colleague now.', history: input };
      });
      await adapter.handleMessage(connection, setupMessage);

      await adapter.handleMessage(connection, prompt('I need a person for a billing issue'));

      expect(send.mock.calls.slice(-2)).toEqual([
        [{ type: 'text', token: 'Connecting you to a colleague now.', last: true }],
        [
          {
            type: 'end',
            handoffData: '{"reasonCode":"live-agent-handoff","reason":"Billing dispute","transferTo":"+15550009999"}'
          }
        ]
      ]);
    });
  });

  describe('handleClose', () => {
    it('should do nothing without an active call', async () => {
      await expect(adapter.handleClose(connection)).resolves.toBe(false);
      expect(save).not.toHaveBeenCalled();
    });

    it('should persist the call once and announce its end', async () => {
      const ends: CallEndEvent[] = [];
      eventBus.on('call_end', (payload) => ends.push(payload));
      replyWith('Order 1001 shipped yesterday.');
      await adapter.handleMessage(connection, setupMessage);
      await adapter.handleMessage(connection, prompt('where is order 1001'));
      const call = activeCall();

      await expect(adapter.handleClose(connection)).resolves.toBe(true);
      await expect(adapter.handleClose(connection)).resolves.toBe(false);

      expect(save).toHaveBeenCalledTimes(1);
      expect(save).toHaveBeenCalledWith(
        expect.objectContaining({
          conversation: `AGENT:\n${GREETING}\n\nUSER:\nwhere is order 1001\n\nAGENT:\nOrder 1001 shipped yesterday.\n\n`,
          userId: '9',
          storeId: STORE_NUMBER,
          sessionId: call.session.sessionId,
          callReason: 'order',
          queryType: 'order',
          escalation: false
        })
      );
      expect(deps.conversation.historyLength(call.session.sessionId)).toBe(0);
      expect(ends).toEqual([
        expect.objectContaining({ sessionId: call.session.sessionId, escalated: false, intent: 'order', persisted: true })
      ]);
      expect(logger.logCallEnd).toHaveBeenCalledWith(call.session.sessionId, expect.any(Number), 3, emptyUsage());
      expect(connection.call).toBeNull();
    });

    it('should report the model usage of the call when it ends', async () => {
      const usage = { requests: 2, inputTokens: 1200, outputTokens: 80, totalTokens: 1280 };
      const ends: CallEndEvent[] = [];
      eventBus.on('call_end', (payload) => ends.push(payload));
      runTurn.mockImplementation(async (_agent, input) => ({ finalOutput: 'It shipped.', history: input, usage }));
      await adapter.handleMessage(connection, setupMessage);
      await adapter.handleMessage(connection, prompt('where is order 1001'));
      const sessionId = activeCall().session.sessionId;

      await adapter.handleClose(connection);

      expect(ends).toEqual([expect.objectContaining({ sessionId, usage })]);
      expect(logger.logCallEnd).toHaveBeenCalledWith(sessionId, expect.any(Number), 3, usage);
    });

    it('should fall back to the caller number when no customer matches', async () => {
      jest.spyOn(commerce, 'fetchCustomerId').mockResolvedValue(null);
      await adapter.handleMessage(connection, setupMessage);

      await adapter.handleClose(connection);

      expect(save).toHaveBeenCalledWith(expect.objectContaining({ userId: CALLER_NUMBER, callReason: null }));
    });

    it('should report a call whose log could not be written', async () => {
      save.mockResolvedValue(false);
      await adapter.handleMessage(connection, setupMessage);

      await expect(adapter.handleClose(connection)).resolves.toBe(false);
    });
  });
});
