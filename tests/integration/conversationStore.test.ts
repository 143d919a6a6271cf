import { newDb } from 'pg-mem';
import { SqlClient, fromPool } from '../../src/db/sqlClient';
import { CallSession } from '../../src/sessions/callSession';
import { ConversationStore } from '../../src/sessions/conversationStore';
import { logger } from '../../src/utils/logger';

const setupDatabase = (): SqlClient => {
  const db = newDb();
  const { Pool } = db.adapters.createPg();
  return fromPool(new Pool());
};

describe('ConversationStore (pg-mem)', () => {
  let sql: SqlClient;
  let store: ConversationStore;

  beforeEach(async () => {
    jest.clearAllMocks();
    sql = setupDatabase();
    store = new ConversationStore(sql);
    await store.init();
  });

  it('should create the table idempotently', async () => {
    await expect(store.init()).resolves.toBeUndefined();
    const result = await sql.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM conversations');
    expect(result.rows[0]?.count).toBe(0);
  });

  it('should persist a finished call and read it back by session', async () => {
    const session = new CallSession({
      callerNumber: '+15550001111',
      calleeNumber: '+15550002222',
      startTime: new Date('2026-03-02T10:00:00.000Z')
    });
    session.addAgentTurn('Hello, welcome to Acme Outfitters. How can I help you today?');
    session.addUserTurn('cancel order 1001 and let me speak to human');
    session.recordIntent('cancel_order');
    session.customerId = '9';

    await expect(store.save(session.toRecord(new Date('2026-03-02T10:02:03.000Z')))).resolves.toBe(true);

    const rows = await store.findBySession(session.sessionId);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      conversation:
        'AGENT:\nHello, welcome to Acme Outfitters. How can I help you today?\n\nUSER:\ncancel order 1001 and let me speak to human\n\n',
      user_id: '9',
      store_id: '+15550002222',
      session_id: session.sessionId,
      duration_of_call: 123,
      call_reason: 'cancel_order',
      escalation: true,
      query_type: 'cancel_order'
    });
  });

  it('should keep calls from different sessions apart', async () => {
    const first = new CallSession({ callerNumber: '+1', calleeNumber: '+2' });
    const second = new CallSession({ callerNumber: '+3', calleeNumber: '+2' });

    await store.save(first.toRecord());
    await store.save(second.toRecord());

    const rows = await store.findBySession(second.sessionId);
    expect(rows.map((row) => row.user_id)).toEqual(['+3']);
    expect(rows[0]?.call_reason).toBeNull();
  });

  it('should report a failed insert instead of throwing', async () => {
    const broken: SqlClient = { query: jest.fn().mockRejectedValue(new Error('connection reset')) };
    const session = new CallSession({ callerNumber: '+1', calleeNumber: '+2' });

    await expect(new ConversationStore(broken).save(session.toRecord())).resolves.toBe(false);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to save conversation',
      expect.any(Error),
      { sessionId: session.sessionId, operation: 'conversation_save' }
    );
  });
});
