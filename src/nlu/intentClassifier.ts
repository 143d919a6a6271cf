import { logger } from '../utils/logger';
import { CompletionModel } from './completion';
import {
  ConversationHistory,
  INTENTS,
  INTENT_DESCRIPTIONS,
  INTENT_EXAMPLES,
  Intent,
  isIntent,
  renderHistory
} from './intents';

export interface IntentClassifierOptions {
  defaultIntent?: Intent;
  examplesPerIntent?: number;
}

export const buildClassificationPrompt = (
  history: ConversationHistory,
  utterance: string,
  examplesPerIntent = 3
): string => {
  const labels = INTENTS.map((intent) => `- ${intent}: ${INTENT_DESCRIPTIONS[intent]}`).join('\n');
  const examples = INTENTS.flatMap((intent) =>
    INTENT_EXAMPLES[intent]
      .slice(0, examplesPerIntent)
      .map((example) => `Query: ${example}\nIntent: ${intent}`)
  ).join('\n\n');

  return `You are an intent classification system for an e-commerce customer service platform.
Classify the user's query into one of these intents:
${labels}

Examples:

${examples}

Return only the intent name and nothing else. No explanations, no punctuation, just the single intent word.
When the user enters their phone number, customer ID, or address details classify as 'update_order'.

History: ${renderHistory(history)}

Query: ${utterance}
Intent:`;
};

/**
 * Reduces raw model output to a candidate label: "Intent: Order." -> "order".
 */
export const normalizeLabel = (raw: string): string =>
  raw
    .trim()
    .toLowerCase()
    .replace(/^intent\s*:\s*/, '')
    .replace(/^["'`]+|["'`.!]+$/g, '')
    .trim();

export class IntentClassifier {
  private readonly defaultIntent: Intent;
  private readonly examplesPerIntent: number;

  constructor(private readonly model: CompletionModel, options: IntentClassifierOptions = {}) {
    this.defaultIntent = options.defaultIntent ?? 'store_info';
    this.examplesPerIntent = options.examplesPerIntent ?? 3;
  }

  async classify(history: ConversationHistory, utterance: string): Promise<Intent> {
    const prompt = buildClassificationPrompt(history, utterance, this.examplesPerIntent);

    let raw: string;
    try {
      raw = await this.model.complete(prompt);
    } catch (error) {
      logger.error('Intent classification call failed', error as Error, {
        operation: 'intent_classification'
      });
      return this.defaultIntent;
    }

    const label = normalizeLabel(raw);
    if (!isIntent(label)) {
      logger.warn('Unexpected intent label, using default', {
        operation: 'intent_classification'
      }, { raw, defaultIntent: this.defaultIntent });
      return this.defaultIntent;
    }

    return label;
  }
}
