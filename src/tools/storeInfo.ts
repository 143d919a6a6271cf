import { RunContext, tool } from '@openai/agents';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { CallContext, errorMessage, requireCallContext, toolLogContext } from './context';

export interface StoreInformationResult {
  store_name: string;
  general_info: string;
  relevant_info: string;
  error?: string;
}

export const getStoreInformation = async (
  ctx: CallContext,
  specificInfo?: string | null
): Promise<StoreInformationResult> => {
  const logContext = toolLogContext(ctx, 'get_store_information');
  logger.logToolCall('get_store_information', { specificInfo }, logContext);

  const storeName = ctx.store?.storeName ?? '';
  const storeDetails = ctx.store?.storeDetails ?? '';

  try {
    const documents = await ctx.knowledge.searchDocuments(specificInfo || 'store information', {
      storeName: storeName || undefined,
      limit: 3,
      scoreThreshold: 0.6
    });

    let generalInfo = storeDetails;
    if (!generalInfo && storeName) {
      const indexed = await ctx.knowledge.getStoreDetails(storeName);
      generalInfo = indexed?.store_details ?? '';
    }

    logger.logToolResult('get_store_information', true, logContext);
    return {
      store_name: storeName,
      general_info: generalInfo || 'No general store information available.',
      relevant_info:
        documents.length > 0
          ? documents.map((document) => document.text).join('\n\n')
          : 'No specific information found for your query.'
    };
  } catch (error) {
    logger.error('Store information lookup failed', error as Error, logContext);
    return {
      error: `I encountered an error while retrieving store information: ${errorMessage(error)}`,
      store_name: storeName,
      general_info: storeDetails,
      relevant_info: ''
    };
  }
};

export const storeInformationTool = tool({
  name: 'get_store_information',
  description: 'Get information about the store, such as contact details, business hours and policies.',
  parameters: z.object({
    specific_info: z.string().nullable().describe('Specific store information to retrieve (hours, policies, etc.)')
  }),
  execute: async ({ specific_info }, runContext?: RunContext<CallContext>) =>
    getStoreInformation(requireCallContext(runContext), specific_info)
});
