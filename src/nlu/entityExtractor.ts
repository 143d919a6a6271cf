import { z } from 'zod';
import { logger } from '../utils/logger';
import { CompletionModel } from './completion';
import { ConversationHistory, Intent } from './intents';
import { IntentClassifier } from './intentClassifier';
import {
  extractAddress,
  extractEmail,
  extractOrderId,
  extractPhone,
  extractProductKeywords
} from './patterns';

export type Entities = Record<string, unknown>;

export interface UtteranceAnalysis {
  intent: Intent;
  entities: Entities;
  query: string;
}

type ExtractingIntent = Exclude<Intent, 'general'>;

const EXTRACTION_INSTRUCTIONS: Record<ExtractingIntent, string> = {
  order: `Extract all information related to an order status query.
Focus on:
1. Order IDs/numbers (look for patterns like #12345, order 12345, etc.)
2. Timeframes mentioned (e.g., "ordered last week")
3. Specific products mentioned in relation to the order
4. Any customer identifiers (name, email, phone)

Return a JSON object with all extracted information.
If information is not present, set the value to null.
If you're unsure about a value, use your best guess but mark it with "uncertain: true".`,

  update_order: `Extract all information related to an order update request.
Focus on:
1. Order ID/number if present
2. Contact information (email, phone)
3. Address details (complete address or parts like city, state, zip)
4. What specifically needs to be updated (shipping address, email, phone, etc.)

For addresses, extract as much detail as possible: street address (line 1, line 2),
city, state/province, ZIP/postal code and country.
For phone numbers, standardize to E.164 format if possible.
For emails, verify they contain @ and a domain.

Return a JSON object with all extracted information.`,

  cancel_order: `Extract all information related to an order cancellation request.
Focus on:
1. Order ID/number if present
2. Reason for cancellation (if mentioned)
3. Any timeframe mentioned (e.g., "ordered yesterday")
4. Customer identifiers (name, email, phone)

Return a JSON object with all extracted information.`,

  product: `Extract all product-related information from this query.
Focus on:
1. Product type (e.g., shirt, shoes, electronics)
2. Specific product name if mentioned
3. Product attributes (color, size, material, etc.)
4. Price information or budget constraints
5. Preferences or requirements (e.g., "waterproof", "formal", "casual")

Return a JSON object with all extracted information.`,

  store_info: `Extract all store-related information from this query.
Focus on:
1. What specific information is being requested (hours, location, policies)
2. Any specific location mentioned
3. Any specific policy type mentioned (returns, shipping, payment)

Return a JSON object with all extracted information.`
};

const entitiesSchema = z.record(z.unknown());

export const buildExtractionPrompt = (intent: ExtractingIntent, utterance: string): string =>
  `${EXTRACTION_INSTRUCTIONS[intent]}\n\nCustomer query: ${utterance}\n\nJSON:`;

/**
 * Parses a model reply as a JSON object, tolerating a surrounding markdown fence.
 * Throws when the reply is not a JSON object.
 */
export const parseEntities = (raw: string): Entities => {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
  const body = (fenced ? fenced[1] : raw).trim();
  return entitiesSchema.parse(JSON.parse(body));
};

export const fallbackEntities = (intent: Intent, utterance: string): Entities => {
  switch (intent) {
    case 'order':
    case 'cancel_order': {
      const orderId = extractOrderId(utterance);
      return orderId ? { order_id: orderId } : {};
    }
    case 'update_order': {
      const entities: Entities = {};
      const orderId = extractOrderId(utterance);
      const email = extractEmail(utterance);
      const phone = extractPhone(utterance);
      if (orderId) entities.order_id = orderId;
      if (email) entities.email = email;
      if (phone) entities.phone = phone;
      return { ...entities, ...extractAddress(utterance) };
    }
    case 'product':
      return { product_keywords: extractProductKeywords(utterance) };
    case 'store_info':
      return { query_type: 'store_info' };
    case 'general':
      return { query: utterance };
  }
};

export class EntityExtractor {
  constructor(private readonly model: CompletionModel) {}

  async extract(utterance: string, intent: Intent): Promise<Entities> {
    if (intent === 'general') {
      return { query: utterance };
    }

    try {
      const raw = await this.model.complete(buildExtractionPrompt(intent, utterance));
      return parseEntities(raw);
    } catch (error) {
      logger.warn('Entity extraction fell back to patterns', {
        operation: 'entity_extraction',
        intent
      }, { error: (error as Error).message });
      return fallbackEntities(intent, utterance);
    }
  }
}

/**
 * Classification followed by intent-specific extraction.
 */
export class UtteranceAnalyzer {
  constructor(
    private readonly classifier: IntentClassifier,
    private readonly extractor: EntityExtractor
  ) {}

  async analyze(history: ConversationHistory, utterance: string): Promise<UtteranceAnalysis> {
    const intent = await this.classifier.classify(history, utterance);
    const entities = await this.extractor.extract(utterance, intent);
    return { intent, entities, query: utterance };
  }
}
