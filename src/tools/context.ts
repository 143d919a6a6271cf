import { RunContext } from '@openai/agents';
import { ShopifyClient } from '../commerce/shopifyClient';
import { KnowledgeSearcher } from '../knowledge/knowledgeSearcher';
import { UtteranceAnalysis } from '../nlu/entityExtractor';
import { CallSession } from '../sessions/callSession';
import { StoreProfile } from '../stores/storeDirectory';

export interface HandoffRequest {
  reason: string;
  transferTo: string;
}

/**
 * Per-call state handed to every tool through the runner's context.
 */
export interface CallContext {
  session: CallSession;
  store: StoreProfile | null;
  commerce: ShopifyClient | null;
  knowledge: KnowledgeSearcher;
  transferNumber?: string;
  analysis?: UtteranceAnalysis;
  handoff?: HandoffRequest;
}

export const requireCallContext = (runContext?: RunContext<CallContext>): CallContext => {
  if (!runContext) {
    throw new Error('Tool invoked outside of a call');
  }
  return runContext.context;
};

export const toolLogContext = (ctx: CallContext, toolName: string) => ({
  sessionId: ctx.session.sessionId,
  storeName: ctx.store?.storeName,
  toolName,
  operation: toolName
});

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
