#!/usr/bin/env tsx

/**
 * Loads store knowledge into the vector index.
 *
 * Usage:
 *   npm run ingest -- --products --phone +15550000000
 *   npm run ingest -- --documents ./docs.json --store "Demo Store"
 *
 * A documents file is a JSON array of { id, text, type, source, storeDetails? }.
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import Redis from 'ioredis';
import { z } from 'zod';
import { ShopifyClient } from '../src/commerce/shopifyClient';
import { initializeEnvironment } from '../src/config/environment';
import { createPool, fromPool } from '../src/db/sqlClient';
import { OpenAIEmbedder } from '../src/knowledge/embeddings';
import { KnowledgeIngestor, documentChunk, productChunk } from '../src/knowledge/ingestion';
import { PgVectorIndex } from '../src/knowledge/vectorIndex';
import { StoreDirectory } from '../src/stores/storeDirectory';
import { logger } from '../src/utils/logger';

const documentsSchema = z.array(
  z.object({
    id: z.string().min(1),
    text: z.string(),
    type: z.string().default('store_document'),
    source: z.string().default('Unknown'),
    storeDetails: z.string().optional()
  })
);

interface IngestOptions {
  products: boolean;
  phone?: string;
  documents?: string;
  store?: string;
}

function parseArgs(): IngestOptions {
  const args = process.argv.slice(2);
  const options: IngestOptions = { products: false };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--products':
        options.products = true;
        break;
      case '--phone':
        options.phone = args[++i];
        break;
      case '--documents':
        options.documents = args[++i];
        break;
      case '--store':
        options.store = args[++i];
        break;
    }
  }

  return options;
}

async function main(): Promise<void> {
  const options = parseArgs();
  const config = initializeEnvironment();
  const pool = createPool(config.database.connectionString, config.database.ssl);
  const index = new PgVectorIndex(fromPool(pool));
  const ingestor = new KnowledgeIngestor(index, new OpenAIEmbedder(config.openaiApiKey, config.models.embedding));

  try {
    if (options.products) {
      if (!options.phone) {
        throw new Error('--phone is required with --products');
      }
      const redis = new Redis(config.redis.url);
      const profile = await new StoreDirectory(redis).lookup(options.phone).finally(() => redis.quit());
      if (!profile) {
        throw new Error(`No complete store mapping for ${options.phone}`);
      }

      const client = new ShopifyClient({
        shopDomain: profile.shopDomain,
        accessToken: profile.accessToken,
        apiVersion: config.commerce.apiVersion
      });
      const products = await client.getAllProducts();
      await index.ensurePartition(config.knowledge.productPartition, config.knowledge.dimensions);
      const written = await ingestor.ingest(
        config.knowledge.productPartition,
        products.map((product) => productChunk(product, profile.storeName))
      );
      console.log(`✅ ${written} products ingested for ${profile.storeName}`);
    }

    if (options.documents) {
      if (!options.store) {
        throw new Error('--store is required with --documents');
      }
      const storeName = options.store;
      const documents = documentsSchema.parse(JSON.parse(readFileSync(options.documents, 'utf8')));
      await index.ensurePartition(config.knowledge.documentPartition, config.knowledge.dimensions);
      const written = await ingestor.ingest(
        config.knowledge.documentPartition,
        documents.map((document) => documentChunk(document, storeName))
      );
      console.log(`✅ ${written} documents ingested for ${storeName}`);
    }

    if (!options.products && !options.documents) {
      console.log('Nothing to ingest. Pass --products --phone <number> or --documents <file> --store <name>.');
    }
  } finally {
    await pool.end();
  }
}

main().catch((error: Error) => {
  logger.error('Knowledge ingestion failed', error, { operation: 'knowledge_ingest' });
  console.error('💥 Knowledge ingestion failed:', error.message);
  process.exit(1);
});
