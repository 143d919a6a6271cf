import { RunContext, tool } from '@openai/agents';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { CallContext, errorMessage, requireCallContext, toolLogContext } from './context';

export interface ProductSummary {
  product_id: string;
  title: string;
  vendor: string;
  product_type: string;
  tags: string[];
}

export interface ProductInformationResult {
  products: ProductSummary[];
  additional_info: string;
  error?: string;
}

export const getProductInformation = async (
  ctx: CallContext,
  productQuery: string
): Promise<ProductInformationResult> => {
  const logContext = toolLogContext(ctx, 'get_product_information');
  logger.logToolCall('get_product_information', { productQuery }, logContext);

  try {
    const storeName = ctx.store?.storeName;
    const [products, documents] = await Promise.all([
      ctx.knowledge.searchProducts(productQuery, { storeName, limit: 3, scoreThreshold: 0.6 }),
      ctx.knowledge.searchDocuments(productQuery, {
        storeName,
        docType: 'product_document',
        limit: 2,
        scoreThreshold: 0.6
      })
    ]);

    logger.logToolResult('get_product_information', true, logContext);
    return {
      products: products.map(({ product_id, title, vendor, product_type, tags }) => ({
        product_id,
        title,
        vendor,
        product_type,
        tags
      })),
      additional_info:
        documents.length > 0
          ? documents.map((document) => document.text).join('\n\n')
          : 'No additional product details available.'
    };
  } catch (error) {
    logger.error('Product lookup failed', error as Error, logContext);
    logger.logToolResult('get_product_information', false, logContext);
    return {
      error: `I encountered an error while retrieving product information: ${errorMessage(error)}`,
      products: [],
      additional_info: ''
    };
  }
};

export const productInformationTool = tool({
  name: 'get_product_information',
  description:
    'Search for product information based on the customer\'s product query. Returns product names, vendors, types, tags and descriptions.',
  parameters: z.object({
    product_query: z.string().describe('The product search query or product name')
  }),
  execute: async ({ product_query }, runContext?: RunContext<CallContext>) =>
    getProductInformation(requireCallContext(runContext), product_query)
});
