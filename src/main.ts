import 'dotenv/config';
import Redis from 'ioredis';
import { Runner } from '@openai/agents';
import { createStorefrontAgent } from './agents/storefront';
import { VoiceAdapter } from './channels/voice/adapter';
import { ShopifyClient } from './commerce/shopifyClient';
import { initializeEnvironment } from './config/environment';
import { createPool, fromPool } from './db/sqlClient';
import { EventLogger } from './events/eventLogger';
import { OpenAIEmbedder } from './knowledge/embeddings';
import { KnowledgeSearcher } from './knowledge/knowledgeSearcher';
import { PgVectorIndex } from './knowledge/vectorIndex';
import { AgentCompletionModel } from './nlu/completion';
import { EntityExtractor, UtteranceAnalyzer } from './nlu/entityExtractor';
import { IntentClassifier } from './nlu/intentClassifier';
import { createServer } from './server';
import { ConversationService, sdkTurnRunner } from './services/conversationService';
import { ConversationStore } from './sessions/conversationStore';
import { StoreDirectory } from './stores/storeDirectory';
import { logger } from './utils/logger';

async function main() {
  const config = initializeEnvironment();

  logger.info('Storefront voice agent starting', {
    operation: 'application_start'
  }, {
    port: config.voice.port,
    agentModel: config.models.agent,
    analyzeUtterances: config.analyzeUtterances,
    logLevel: config.logLevel
  });

  EventLogger.getInstance();

  const pool = createPool(config.database.connectionString, config.database.ssl);
  const sql = fromPool(pool);
  const redis = new Redis(config.redis.url);

  const conversations = new ConversationStore(sql);
  await conversations.init();

  const knowledge = new KnowledgeSearcher(
    new PgVectorIndex(sql),
    new OpenAIEmbedder(config.openaiApiKey, config.models.embedding),
    { documents: config.knowledge.documentPartition, products: config.knowledge.productPartition }
  );

  const classifierModel = new AgentCompletionModel({
    name: 'Intent Classifier',
    model: config.models.classifier,
    temperature: config.models.classifierTemperature
  });
  const analyzer = config.analyzeUtterances
    ? new UtteranceAnalyzer(
        new IntentClassifier(classifierModel, { defaultIntent: config.classifier.defaultIntent }),
        new EntityExtractor(classifierModel)
      )
    : null;

  const conversation = new ConversationService(
    createStorefrontAgent(config.models.agent),
    sdkTurnRunner(new Runner({ workflowName: 'Storefront voice call' }), config.maxTurns)
  );

  const voiceAdapter = new VoiceAdapter({
    stores: new StoreDirectory(redis),
    conversations,
    analyzer,
    conversation,
    knowledge,
    commerceFor: (store) =>
      new ShopifyClient({
        shopDomain: store.shopDomain,
        accessToken: store.accessToken,
        apiVersion: config.commerce.apiVersion,
        timeoutMs: config.commerce.timeoutMs
      }),
    transferNumber: config.voice.transferNumber,
    publicHost: config.voice.publicHost || undefined
  });

  const server = createServer(voiceAdapter).listen(config.voice.port, () => {
    logger.info('Voice server listening', { operation: 'voice_server_ready' }, { port: config.voice.port });
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`, { operation: 'application_shutdown' });
    server.close();
    Promise.all([pool.end(), redis.quit()])
      .then(() => process.exit(0))
      .catch((error: Error) => {
        logger.error('Error during shutdown', error, { operation: 'application_shutdown' });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', reason instanceof Error ? reason : new Error(String(reason)), {
    operation: 'unhandled_rejection'
  });
});

main().catch((error: Error) => {
  logger.error('Failed to start storefront voice agent', error, { operation: 'application_start' });
  console.error('💥 Failed to start storefront voice agent:', error.message);
  process.exit(1);
});
