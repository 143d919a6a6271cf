import { RunContext, tool } from '@openai/agents';
import { z } from 'zod';
import { eventBus } from '../events/bus';
import { logger } from '../utils/logger';
import { CallContext, requireCallContext, toolLogContext } from './context';

export const DEFAULT_TRANSFER_REASON = 'Customer requested human assistance';

export interface TransferResult {
  success: boolean;
  transfer_to?: string;
  message?: string;
  error?: string;
}

/**
 * Marks the call for handoff. The voice channel sends the agent's reply and
 * then ends the relay session with the handoff data; the handoff callback
 * dials `transferTo`.
 */
export const transferToAgent = async (
  ctx: CallContext,
  reason: string = DEFAULT_TRANSFER_REASON
): Promise<TransferResult> => {
  const logContext = toolLogContext(ctx, 'transfer_to_agent');
  logger.logToolCall('transfer_to_agent', { reason }, logContext);

  const transferTo = ctx.transferNumber || ctx.store?.transferNumber;
  if (!transferTo) {
    logger.warn('No transfer number configured', logContext);
    logger.logToolResult('transfer_to_agent', false, logContext);
    return { success: false, error: 'No transfer number configured for this store.' };
  }

  ctx.handoff = { reason, transferTo };
  ctx.session.markEscalated();
  eventBus.emit('escalation', { sessionId: ctx.session.sessionId, reason, transferTo });

  logger.logToolResult('transfer_to_agent', true, logContext);
  return {
    success: true,
    transfer_to: transferTo,
    message: 'Transferring the call to a human agent'
  };
};

export const transferTool = tool({
  name: 'transfer_to_agent',
  description:
    'Transfer the call to a human agent. Use this when the customer explicitly asks for a human, or when their query is too complex to handle.',
  parameters: z.object({
    reason: z.string().nullable().describe('Reason for transferring to a human agent')
  }),
  execute: async ({ reason }, runContext?: RunContext<CallContext>) =>
    transferToAgent(requireCallContext(runContext), reason ?? undefined)
});
