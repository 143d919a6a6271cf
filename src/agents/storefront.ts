import { Agent, RunContext } from '@openai/agents';
import { UtteranceAnalysis } from '../nlu/entityExtractor';
import { StoreProfile } from '../stores/storeDirectory';
import { storefrontTools } from '../tools';
import { CallContext } from '../tools/context';

const TOOL_GUIDE = `When customers ask about products, use the get_product_information function.
When customers ask about orders, use the get_order_status function.
When customers ask to update orders, use the update_order function.
When customers ask to cancel orders, use the cancel_order function.
When customers ask about store policies or information, use the get_store_information function.
When customers ask for a human, or you cannot help them, use the transfer_to_agent function.`;

export const FALLBACK_INSTRUCTIONS = `You are a voice assistant for an online store. You can help with product inquiries, order status, and general customer support.
Please note that we're experiencing some technical difficulties retrieving the store information. Do your best to help with the caller's query.
Keep your responses clear, concise and conversational, and avoid punctuation that would be awkward when spoken.

${TOOL_GUIDE}`;

const describeAnalysis = (analysis?: UtteranceAnalysis): string => {
  if (!analysis) {
    return '';
  }
  return `

## Latest caller request
Detected intent: ${analysis.intent}
Extracted details: ${JSON.stringify(analysis.entities)}`;
};

export const storeInstructions = (store: StoreProfile | null, analysis?: UtteranceAnalysis): string => {
  if (!store) {
    return FALLBACK_INSTRUCTIONS + describeAnalysis(analysis);
  }

  return `You are a voice assistant for ${store.storeName}. Your interface with users will be voice.
You can deal with customer's orders, product inquiries, and general customer support.
You should use short and concise responses, avoiding usage of unpronounceable punctuation.

## Store details
${store.storeDetails || 'No additional store details on file.'}

## Tools
${TOOL_GUIDE}

Always be helpful and polite. If you cannot assist a customer with their request, apologize and offer to connect them with a human representative.${describeAnalysis(analysis)}`;
};

/**
 * One agent serves every call; its instructions are rebuilt per turn from the
 * call's store profile and the latest utterance analysis.
 */
export const createStorefrontAgent = (model: string): Agent<CallContext> =>
  new Agent<CallContext>({
    name: 'Storefront Voice Agent',
    instructions: (runContext: RunContext<CallContext>) =>
      storeInstructions(runContext.context.store, runContext.context.analysis),
    model,
    tools: storefrontTools
  });
