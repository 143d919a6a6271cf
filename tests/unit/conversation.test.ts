import { Agent, type AgentInputItem } from '@openai/agents';
import { createStorefrontAgent } from '../../src/agents/storefront';
import { SqlClient } from '../../src/db/sqlClient';
import { KnowledgeSearcher } from '../../src/knowledge/knowledgeSearcher';
import { PgVectorIndex } from '../../src/knowledge/vectorIndex';
import { ConversationService, FALLBACK_REPLY, TurnOutcome, emptyUsage } from '../../src/services/conversationService';
import { CallSession } from '../../src/sessions/callSession';
import { CallContext } from '../../src/tools/context';
import { logger } from '../../src/utils/logger';

const makeContext = (): CallContext => {
  const sql: SqlClient = { query: jest.fn().mockResolvedValue({ rows: [] }) };
  return {
    session: new CallSession({ callerNumber: '+15550001111', calleeNumber: '+15550002222' }),
    store: null,
    commerce: null,
    knowledge: new KnowledgeSearcher(
      new PgVectorIndex(sql),
      { embed: jest.fn().mockResolvedValue([0.1]) },
      { documents: 'knowledge_documents', products: 'knowledge_products' }
    )
  };
};

describe('ConversationService', () => {
  let runTurn: jest.Mock<Promise<TurnOutcome>, [Agent<CallContext>, AgentInputItem[], CallContext]>;
  let service: ConversationService;

  beforeEach(() => {
    jest.clearAllMocks();
    runTurn = jest.fn();
    service = new ConversationService(createStorefrontAgent('gpt-4o-mini'), runTurn);
  });

  it('should send the utterance and return the trimmed reply', async () => {
    const ctx = makeContext();
    runTurn.mockImplementation(async (_agent, input) => ({ finalOutput: '  Your order shipped.  ', history: input }));

    await expect(service.processTurn(ctx, 'where is my order')).resolves.toBe('Your order shipped.');
    expect(runTurn).toHaveBeenCalledWith(expect.anything(), [{ role: 'user', content: 'where is my order' }], ctx);
    expect(service.historyLength(ctx.session.sessionId)).toBe(1);
  });

  it('should carry the history of earlier turns into the next one', async () => {
    const ctx = makeContext();
    runTurn.mockImplementation(async (_agent, input) => ({ finalOutput: 'ok', history: input }));

    await service.processTurn(ctx, 'first');
    await service.processTurn(ctx, 'second');

    expect(runTurn.mock.calls[1][1]).toEqual([
      { role: 'user', content: 'first' },
      { role: 'user', content: 'second' }
    ]);
  });

  it('should keep histories apart per call', async () => {
    const first = makeContext();
    const second = makeContext();
    runTurn.mockImplementation(async (_agent, input) => ({ finalOutput: 'ok', history: input }));

    await service.processTurn(first, 'hello');
    await service.processTurn(second, 'hi');

    expect(runTurn.mock.calls[1][1]).toEqual([{ role: 'user', content: 'hi' }]);
  });

  it('should fall back to an apology on an empty reply', async () => {
    runTurn.mockResolvedValue({ finalOutput: '   ', history: [] });

    await expect(service.processTurn(makeContext(), 'hello')).resolves.toBe(FALLBACK_REPLY);
  });

  it('should propagate runner failures', async () => {
    runTurn.mockRejectedValue(new Error('model unavailable'));

    await expect(service.processTurn(makeContext(), 'hello')).rejects.toThrow('model unavailable');
  });

  it('should log each completed turn', async () => {
    const ctx = makeContext();
    runTurn.mockResolvedValue({ finalOutput: 'ok', history: [] });

    await service.processTurn(ctx, 'hello');

    expect(logger.debug).toHaveBeenCalledWith(
      'Conversation turn completed',
      expect.objectContaining({ sessionId: ctx.session.sessionId, operation: 'conversation_turn' }),
      expect.objectContaining({ historyLength: 0, handoff: false })
    );
  });

  it('should forget a call once it ends', async () => {
    const ctx = makeContext();
    runTurn.mockImplementation(async (_agent, input) => ({ finalOutput: 'ok', history: input }));
    await service.processTurn(ctx, 'hello');

    service.endSession(ctx.session.sessionId);

    expect(service.historyLength(ctx.session.sessionId)).toBe(0);
  });

  it('should total model usage per call and hand it back when the call ends', async () => {
    const ctx = makeContext();
    const other = makeContext();
    runTurn
      .mockImplementationOnce(async (_agent, input) => ({
        finalOutput: 'ok',
        history: input,
        usage: { requests: 1, inputTokens: 400, outputTokens: 20, totalTokens: 420 }
      }))
      .mockImplementationOnce(async (_agent, input) => ({
        finalOutput: 'ok',
        history: input,
        usage: { requests: 2, inputTokens: 650, outputTokens: 35, totalTokens: 685 }
      }))
      .mockImplementation(async (_agent, input) => ({ finalOutput: 'ok', history: input }));

    await service.processTurn(ctx, 'first');
    await service.processTurn(ctx, 'second');
    await service.processTurn(ctx, 'third');
    await service.processTurn(other, 'hello');

    expect(service.usageOf(other.session.sessionId)).toEqual(emptyUsage());
    expect(service.endSession(ctx.session.sessionId)).toEqual({
      requests: 3,
      inputTokens: 1050,
      outputTokens: 55,
      totalTokens: 1105
    });
    expect(service.usageOf(ctx.session.sessionId)).toEqual(emptyUsage());
  });
});
