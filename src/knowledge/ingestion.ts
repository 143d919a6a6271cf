import { ShopifyProduct } from '../commerce/types';
import { logger } from '../utils/logger';
import { Embedder } from './embeddings';
import { PRODUCT_TYPE } from './knowledgeSearcher';
import { Metadata, PgVectorIndex, VectorPoint } from './vectorIndex';

export interface KnowledgeChunk {
  id: string;
  content: string;
  metadata: Metadata;
}

export interface SourceDocument {
  id: string;
  text: string;
  type: string;
  source: string;
  storeDetails?: string;
}

/**
 * Strips HTML and markdown markup, URLs and redundant whitespace from scraped text.
 */
export const cleanText = (text: string): string =>
  text
    .replace(/<[^>]*>/g, '')
    .replace(/(^|\n)#+\s/g, '$1')
    .replace(/!\[.*?\]\(.*?\)/g, '')
    .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
    .replace(/(\*\*|__)(.*?)\1/g, '$2')
    .replace(/(\*|_)(.*?)\1/g, '$2')
    .replace(/https?:\/\/\S+|www\.\S+/g, '')
    .replace(/\s+/g, ' ')
    .trim();

export const productChunk = (product: ShopifyProduct, storeName: string): KnowledgeChunk => {
  const price = product.variants?.[0]?.price ?? 'N/A';
  return {
    id: String(product.id),
    content: `Product: ${product.title}\nDescription: ${product.body_html ?? ''}\nPrice: ${price}`,
    metadata: {
      type: PRODUCT_TYPE,
      store: storeName,
      product_id: String(product.id),
      title: product.title,
      vendor: product.vendor || 'N/A',
      product_type: product.product_type || 'N/A',
      tags: (product.tags ?? '')
        .split(',')
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0)
    }
  };
};

export const documentChunk = (document: SourceDocument, storeName: string): KnowledgeChunk => {
  const metadata: Metadata = {
    type: document.type,
    store: storeName,
    source: document.source
  };
  if (document.storeDetails) {
    metadata.store_details = document.storeDetails;
  }
  return { id: document.id, content: cleanText(document.text), metadata };
};

/**
 * Embeds chunks and writes them into a knowledge partition.
 */
export class KnowledgeIngestor {
  constructor(
    private readonly index: PgVectorIndex,
    private readonly embedder: Embedder
  ) {}

  async ingest(partition: string, chunks: KnowledgeChunk[]): Promise<number> {
    const points: VectorPoint[] = [];
    for (const chunk of chunks) {
      if (chunk.content.length === 0) {
        logger.warn('Skipping empty knowledge chunk', { operation: 'knowledge_ingest', partition }, { id: chunk.id });
        continue;
      }
      points.push({ ...chunk, embedding: await this.embedder.embed(chunk.content) });
    }

    const written = await this.index.upsert(partition, points);
    logger.info('Knowledge chunks ingested', { operation: 'knowledge_ingest', partition }, { written });
    return written;
  }
}
