import { SqlClient } from '../../src/db/sqlClient';
import { KnowledgeIngestor, cleanText, documentChunk, productChunk } from '../../src/knowledge/ingestion';
import { PgVectorIndex } from '../../src/knowledge/vectorIndex';
import { logger } from '../../src/utils/logger';

describe('Knowledge ingestion', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('cleanText', () => {
    it('should strip markup, links and urls', () => {
      expect(cleanText('<p>Visit **our** [shop](https://x.y) at https://example.com now</p>')).toBe(
        'Visit our shop at now'
      );
    });

    it('should drop heading markers and collapse whitespace', () => {
      expect(cleanText('# Returns\n\nWithin _30_ days')).toBe('Returns Within 30 days');
    });
  });

  describe('productChunk', () => {
    it('should render the catalogue entry and its metadata', () => {
      const chunk = productChunk(
        {
          id: 7,
          title: 'Mug',
          body_html: '<p>Big</p>',
          vendor: '',
          product_type: null,
          tags: 'kitchen, gift ,',
          variants: [{ price: '12.00' }]
        },
        'Acme'
      );

      expect(chunk).toEqual({
        id: '7',
        content: 'Product: Mug\nDescription: <p>Big</p>\nPrice: 12.00',
        metadata: {
          type: 'shopify_product',
          store: 'Acme',
          product_id: '7',
          title: 'Mug',
          vendor: 'N/A',
          product_type: 'N/A',
          tags: ['kitchen', 'gift']
        }
      });
    });

    it('should mark a missing price', () => {
      expect(productChunk({ id: 8, title: 'Tea' }, 'Acme').content).toBe('Product: Tea\nDescription: \nPrice: N/A');
    });
  });

  describe('documentChunk', () => {
    it('should clean the text and carry explicit store details', () => {
      expect(
        documentChunk(
          { id: 'about', text: '<h1>About</h1> us', type: 'store_info', source: 'site', storeDetails: 'Since 1990' },
          'Acme'
        )
      ).toEqual({
        id: 'about',
        content: 'About us',
        metadata: { type: 'store_info', store: 'Acme', source: 'site', store_details: 'Since 1990' }
      });
    });
  });

  describe('KnowledgeIngestor', () => {
    it('should embed non-empty chunks and upsert them', async () => {
      const sql: SqlClient = { query: jest.fn().mockResolvedValue({ rows: [] }) };
      const index = new PgVectorIndex(sql);
      const upsert = jest.spyOn(index, 'upsert').mockResolvedValue(1);
      const embed = jest.fn<Promise<number[]>, [string]>().mockResolvedValue([0.3, 0.4]);
      const ingestor = new KnowledgeIngestor(index, { embed });

      const written = await ingestor.ingest('knowledge_documents', [
        { id: 'a', content: 'Open daily', metadata: { store: 'Acme' } },
        { id: 'b', content: '', metadata: { store: 'Acme' } }
      ]);

      expect(written).toBe(1);
      expect(embed).toHaveBeenCalledTimes(1);
      expect(upsert).toHaveBeenCalledWith('knowledge_documents', [
        { id: 'a', content: 'Open daily', metadata: { store: 'Acme' }, embedding: [0.3, 0.4] }
      ]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Skipping empty knowledge chunk',
        { operation: 'knowledge_ingest', partition: 'knowledge_documents' },
        { id: 'b' }
      );
    });
  });
});
