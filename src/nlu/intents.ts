import intentExamples from '../../data/intent-examples.json';

export const INTENTS = [
  'product',
  'order',
  'update_order',
  'cancel_order',
  'store_info',
  'general'
] as const;

export type Intent = (typeof INTENTS)[number];

export const isIntent = (value: string): value is Intent =>
  INTENTS.some((intent) => intent === value);

export const INTENT_DESCRIPTIONS: Record<Intent, string> = {
  product: 'Questions about products, items, prices, availability, recommendations, etc.',
  order: 'Questions about order status, tracking, delivery times, etc.',
  update_order: 'Requests to change order details like shipping address, email, phone, etc.',
  cancel_order: 'Requests to cancel orders or get refunds.',
  store_info: 'Questions about store hours, locations, policies, contact information, etc.',
  general: 'Greetings, thanks, goodbyes and anything that fits no other intent.'
};

/**
 * Labelled utterances used as few-shot examples in the classification prompt.
 */
export const INTENT_EXAMPLES: Record<Intent, string[]> = intentExamples;

export type ConversationTurn = { role: 'user' | 'agent'; text: string };

/**
 * Prior conversation handed to the classifier: either a rendered transcript or
 * the individual turns.
 */
export type ConversationHistory = string | ConversationTurn[];

export const renderHistory = (history: ConversationHistory): string => {
  if (typeof history === 'string') {
    return history.trim();
  }
  return history.map((turn) => `${turn.role.toUpperCase()}: ${turn.text}`).join('\n');
};
