#!/usr/bin/env tsx

/**
 * Creates the call log table and the knowledge partitions.
 *
 * Usage:
 *   npm run db:provision
 *   npm run db:provision -- --skip-knowledge   # call log table only
 */

import 'dotenv/config';
import { initializeEnvironment } from '../src/config/environment';
import { createPool, fromPool } from '../src/db/sqlClient';
import { PgVectorIndex } from '../src/knowledge/vectorIndex';
import { ConversationStore } from '../src/sessions/conversationStore';
import { logger } from '../src/utils/logger';

async function main(): Promise<void> {
  const skipKnowledge = process.argv.includes('--skip-knowledge');
  const config = initializeEnvironment();
  const pool = createPool(config.database.connectionString, config.database.ssl);
  const sql = fromPool(pool);

  try {
    await new ConversationStore(sql).init();
    console.log('✅ conversations table ready');

    if (!skipKnowledge) {
      const index = new PgVectorIndex(sql);
      for (const partition of [config.knowledge.documentPartition, config.knowledge.productPartition]) {
        await index.ensurePartition(partition, config.knowledge.dimensions);
        console.log(`✅ ${partition} ready (${await index.count(partition)} rows)`);
      }
    }
  } finally {
    await pool.end();
  }
}

main().catch((error: Error) => {
  logger.error('Database provisioning failed', error, { operation: 'db_provision' });
  console.error('💥 Database provisioning failed:', error.message);
  process.exit(1);
});
