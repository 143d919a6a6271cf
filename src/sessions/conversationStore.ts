import { SqlClient } from '../db/sqlClient';
import { logger } from '../utils/logger';
import { ConversationRecord } from './callSession';

export const CONVERSATIONS_DDL = [
  `CREATE TABLE IF NOT EXISTS conversations (
    id SERIAL PRIMARY KEY,
    conversation TEXT NOT NULL,
    user_id VARCHAR(255) NOT NULL,
    store_id VARCHAR(255) NOT NULL,
    session_id VARCHAR(255) NOT NULL,
    session_time TIMESTAMP NOT NULL,
    duration_of_call INTEGER NOT NULL,
    call_reason VARCHAR(50),
    escalation BOOLEAN NOT NULL DEFAULT FALSE,
    query_type VARCHAR(50),
    created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  'CREATE INDEX IF NOT EXISTS idx_conversations_session_id ON conversations (session_id)',
  'CREATE INDEX IF NOT EXISTS idx_conversations_user_id ON conversations (user_id)',
  'CREATE INDEX IF NOT EXISTS idx_conversations_store_id ON conversations (store_id)',
  'CREATE INDEX IF NOT EXISTS idx_conversations_session_time ON conversations (session_time)'
];

export interface ConversationRow {
  id: number;
  conversation: string;
  user_id: string;
  store_id: string;
  session_id: string;
  session_time: Date;
  duration_of_call: number;
  call_reason: string | null;
  escalation: boolean;
  query_type: string | null;
  created_at: Date;
  updated_at: Date;
}

/**
 * Call log persisted to the `conversations` table, one row per finished call.
 */
export class ConversationStore {
  constructor(private readonly sql: SqlClient) {}

  async init(): Promise<void> {
    for (const statement of CONVERSATIONS_DDL) {
      await this.sql.query(statement);
    }
    logger.info('Conversation log table ready', { operation: 'conversation_store_init' });
  }

  async save(record: ConversationRecord): Promise<boolean> {
    try {
      await this.sql.query(
        `INSERT INTO conversations
          (conversation, user_id, store_id, session_id, session_time, duration_of_call,
           call_reason, escalation, query_type, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)`,
        [
          record.conversation,
          record.userId,
          record.storeId,
          record.sessionId,
          record.sessionTime,
          record.durationOfCall,
          record.callReason,
          record.escalation,
          record.queryType
        ]
      );

      logger.info('Conversation saved', { sessionId: record.sessionId, operation: 'conversation_save' }, {
        durationOfCall: record.durationOfCall,
        escalation: record.escalation
      });
      return true;
    } catch (error) {
      logger.error('Failed to save conversation', error as Error, {
        sessionId: record.sessionId,
        operation: 'conversation_save'
      });
      return false;
    }
  }

  async findBySession(sessionId: string): Promise<ConversationRow[]> {
    const result = await this.sql.query<ConversationRow>(
      'SELECT * FROM conversations WHERE session_id = $1 ORDER BY id',
      [sessionId]
    );
    return result.rows;
  }
}
