import { logger } from '../utils/logger';
import { Embedder } from './embeddings';
import { MetadataCondition, MetadataValue, equalityConditions } from './filters';
import { Metadata, PgVectorIndex, StoredPoint } from './vectorIndex';

export const PRODUCT_TYPE = 'shopify_product';
const STORE_DETAILS_QUERY = 'store information description about';
const SCAN_PAGE_SIZE = 100;

export interface DocumentMatch {
  id: string;
  score: number;
  text: string;
  metadata: Metadata;
}

export interface ProductMatch {
  id: string;
  score: number;
  title: string;
  product_id: string;
  vendor: string;
  product_type: string;
  tags: string[];
  store: string;
}

export interface DocumentSearchOptions {
  storeName?: string;
  docType?: string;
  source?: string;
  limit?: number;
  scoreThreshold?: number;
}

export interface ProductSearchOptions {
  storeName?: string;
  productType?: string;
  vendor?: string;
  tags?: string[];
  limit?: number;
  scoreThreshold?: number;
}

export interface CombinedSearchOptions {
  storeName?: string;
  limit?: number;
  scoreThreshold?: number;
}

export type StoreDetails =
  | { store_name: string; store_details: string; source: string }
  | { store_name: string; store_details: string; text_sample: string; note: string };

export type MetadataRecord = { id: string } & Metadata;

export interface KnowledgePartitions {
  documents: string;
  products: string;
}

const stringField = (metadata: Metadata, key: string): string => {
  const value = metadata[key];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
};

const stringList = (metadata: Metadata, key: string): string[] => {
  const value = metadata[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
};

const withoutText = (metadata: Metadata): Metadata => {
  const { text: _text, ...rest } = metadata;
  return rest;
};

/**
 * Semantic retrieval over the document and product partitions of the
 * knowledge index. Backend failures are logged and yield an empty result.
 */
export class KnowledgeSearcher {
  constructor(
    private readonly index: PgVectorIndex,
    private readonly embedder: Embedder,
    private readonly partitions: KnowledgePartitions
  ) {}

  async searchDocuments(query: string, options: DocumentSearchOptions = {}): Promise<DocumentMatch[]> {
    try {
      const embedding = await this.embedder.embed(query);
      const conditions = equalityConditions({
        store: options.storeName,
        type: options.docType,
        source: options.source
      });

      const points = await this.index.search(this.partitions.documents, embedding, {
        conditions,
        limit: options.limit ?? 5,
        scoreThreshold: options.scoreThreshold ?? 0.7
      });

      return points.map((point) => ({
        id: point.id,
        score: point.score,
        text: point.content,
        metadata: withoutText(point.metadata)
      }));
    } catch (error) {
      logger.error('Document search failed', error as Error, {
        operation: 'search_documents',
        partition: this.partitions.documents,
        storeName: options.storeName
      });
      return [];
    }
  }

  async searchProducts(query: string, options: ProductSearchOptions = {}): Promise<ProductMatch[]> {
    try {
      const embedding = await this.embedder.embed(query);
      const conditions: MetadataCondition[] = [
        { key: 'type', equals: PRODUCT_TYPE },
        ...equalityConditions({
          store: options.storeName,
          product_type: options.productType,
          vendor: options.vendor
        })
      ];
      if (options.tags && options.tags.length > 0) {
        conditions.push({ key: 'tags', anyOf: options.tags });
      }

      const points = await this.index.search(this.partitions.products, embedding, {
        conditions,
        limit: options.limit ?? 5,
        scoreThreshold: options.scoreThreshold ?? 0.7
      });

      return points.map((point) => ({
        id: point.id,
        score: point.score,
        title: stringField(point.metadata, 'title'),
        product_id: stringField(point.metadata, 'product_id'),
        vendor: stringField(point.metadata, 'vendor'),
        product_type: stringField(point.metadata, 'product_type'),
        tags: stringList(point.metadata, 'tags'),
        store: stringField(point.metadata, 'store')
      }));
    } catch (error) {
      logger.error('Product search failed', error as Error, {
        operation: 'search_products',
        partition: this.partitions.products,
        storeName: options.storeName
      });
      return [];
    }
  }

  async searchAll(
    query: string,
    options: CombinedSearchOptions = {}
  ): Promise<{ documents: DocumentMatch[]; products: ProductMatch[] }> {
    const shared = {
      storeName: options.storeName,
      limit: options.limit ?? 10,
      scoreThreshold: options.scoreThreshold ?? 0.7
    };
    const [documents, products] = await Promise.all([
      this.searchDocuments(query, shared),
      this.searchProducts(query, shared)
    ]);
    return { documents, products };
  }

  async searchByMetadata(
    field: string,
    value: MetadataValue,
    partition: string = this.partitions.documents,
    limit = 100
  ): Promise<MetadataRecord[]> {
    try {
      const points = await this.index.scroll(partition, {
        conditions: [{ key: field, equals: value }],
        limit
      });
      return points.map((point) => ({ ...point.metadata, id: point.id }));
    } catch (error) {
      logger.error('Metadata search failed', error as Error, {
        operation: 'search_by_metadata',
        partition
      }, { field });
      return [];
    }
  }

  async getAllStoreNames(): Promise<string[]> {
    const names = new Set<string>();
    try {
      for (let offset = 0; ; offset += SCAN_PAGE_SIZE) {
        const page = await this.index.scroll(this.partitions.documents, { limit: SCAN_PAGE_SIZE, offset });
        for (const point of page) {
          const store = stringField(point.metadata, 'store');
          if (store) {
            names.add(store);
          }
        }
        if (page.length < SCAN_PAGE_SIZE) {
          break;
        }
      }
      return [...names].sort();
    } catch (error) {
      logger.error('Store name scan failed', error as Error, {
        operation: 'get_all_store_names',
        partition: this.partitions.documents
      });
      return [];
    }
  }

  async getStoreDetails(storeName: string): Promise<StoreDetails | null> {
    try {
      const conditions: MetadataCondition[] = [{ key: 'store', equals: storeName }];
      const points = await this.index.scroll(this.partitions.documents, { conditions, limit: SCAN_PAGE_SIZE });

      const explicit = points.find((point: StoredPoint) => 'store_details' in point.metadata);
      if (explicit) {
        return {
          store_name: storeName,
          store_details: stringField(explicit.metadata, 'store_details'),
          source: stringField(explicit.metadata, 'source') || 'Unknown'
        };
      }

      if (points.length === 0) {
        return null;
      }

      const embedding = await this.embedder.embed(STORE_DETAILS_QUERY);
      const related = await this.index.search(this.partitions.documents, embedding, { conditions, limit: 5 });
      if (related.length === 0) {
        return null;
      }

      const combined = related.map((point) => point.content.slice(0, 1000)).join('\n\n');
      return {
        store_name: storeName,
        store_details: `Store information compiled from ${related.length} documents`,
        text_sample: `${combined.slice(0, 500)}...`,
        note: 'No explicit store_details found; this is compiled from relevant documents'
      };
    } catch (error) {
      logger.error('Store details lookup failed', error as Error, {
        operation: 'get_store_details',
        storeName
      });
      return null;
    }
  }
}
