import { Intent, INTENTS, isIntent } from '../nlu/intents';

type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface EnvironmentConfig {
  openaiApiKey: string;
  logLevel: LogLevelName;
  maxTurns: number;
  analyzeUtterances: boolean;
  models: {
    agent: string;
    classifier: string;
    classifierTemperature: number;
    embedding: string;
  };
  classifier: {
    defaultIntent: Intent;
  };
  database: {
    connectionString: string;
    ssl: boolean;
  };
  redis: {
    url: string;
  };
  knowledge: {
    documentPartition: string;
    productPartition: string;
    dimensions: number;
  };
  commerce: {
    apiVersion: string;
    timeoutMs: number;
  };
  voice: {
    port: number;
    publicHost: string;
    transferNumber?: string;
  };
}

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

const parseLogLevel = (value: string | undefined): LogLevelName =>
  LOG_LEVELS.find((level) => level === value) ?? 'info';

const parseDefaultIntent = (value: string | undefined): Intent => {
  if (value === undefined) {
    return 'store_info';
  }
  if (!isIntent(value)) {
    throw new Error(`CLASSIFIER_DEFAULT_INTENT must be one of: ${INTENTS.join(', ')}`);
  }
  return value;
};

export const initializeEnvironment = (): EnvironmentConfig => {
  const config: EnvironmentConfig = {
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    maxTurns: parseInt(process.env.MAX_TURNS || '10'),
    analyzeUtterances: process.env.ANALYZE_UTTERANCES !== 'false',
    models: {
      agent: process.env.AGENT_MODEL || 'gpt-4o',
      classifier: process.env.CLASSIFIER_MODEL || 'gpt-4o',
      classifierTemperature: parseFloat(process.env.CLASSIFIER_TEMPERATURE || '0.2'),
      embedding: process.env.EMBEDDING_MODEL || 'text-embedding-3-small'
    },
    classifier: {
      defaultIntent: parseDefaultIntent(process.env.CLASSIFIER_DEFAULT_INTENT)
    },
    database: {
      connectionString: process.env.DATABASE_URL || 'postgres://postgres@localhost:5432/voice_agent',
      ssl: process.env.DATABASE_SSL === 'true'
    },
    redis: {
      url: process.env.REDIS_URL || 'redis://localhost:6379/0'
    },
    knowledge: {
      documentPartition: process.env.KNOWLEDGE_DOCUMENT_TABLE || 'knowledge_documents',
      productPartition: process.env.KNOWLEDGE_PRODUCT_TABLE || 'knowledge_products',
      dimensions: parseInt(process.env.EMBEDDING_DIMENSIONS || '1536')
    },
    commerce: {
      apiVersion: process.env.SHOPIFY_API_VERSION || '2025-01',
      timeoutMs: parseInt(process.env.SHOPIFY_TIMEOUT_MS || '10000')
    },
    voice: {
      port: parseInt(process.env.PORT_VOICE || '3001'),
      publicHost: process.env.PUBLIC_HOST || '',
      transferNumber: process.env.TRANSFER_PHONE_NUMBER || undefined
    }
  };

  if (!config.openaiApiKey) {
    throw new Error('OPENAI_API_KEY environment variable is required');
  }

  return config;
};
