import { Agent, Runner, type AgentInputItem } from '@openai/agents';
import { logger } from '../utils/logger';
import { CallContext } from '../tools/context';

export interface UsageSummary {
  requests: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface TurnOutcome {
  finalOutput: string;
  history: AgentInputItem[];
  usage?: UsageSummary;
}

export const emptyUsage = (): UsageSummary => ({ requests: 0, inputTokens: 0, outputTokens: 0, totalTokens: 0 });

export const addUsage = (total: UsageSummary, turn: UsageSummary): UsageSummary => ({
  requests: total.requests + turn.requests,
  inputTokens: total.inputTokens + turn.inputTokens,
  outputTokens: total.outputTokens + turn.outputTokens,
  totalTokens: total.totalTokens + turn.totalTokens
});

/**
 * Runs one agent turn over the given input. Production uses the SDK runner;
 * tests hand in scripted runners.
 */
export type TurnRunner = (
  agent: Agent<CallContext>,
  input: AgentInputItem[],
  context: CallContext
) => Promise<TurnOutcome>;

export const sdkTurnRunner = (runner: Runner, maxTurns: number): TurnRunner =>
  async (agent, input, context) => {
    const result = await runner.run(agent, input, { context, maxTurns });
    const usage = result.rawResponses.reduce((total, response) => addUsage(total, response.usage), emptyUsage());
    return { finalOutput: result.finalOutput ?? '', history: result.history, usage };
  };

export const FALLBACK_REPLY = "I apologize, but I'm having trouble processing your request right now.";

/**
 * Keeps each call's agent input history and model usage, and runs the
 * storefront agent turn by turn.
 */
export class ConversationService {
  private readonly histories = new Map<string, AgentInputItem[]>();
  private readonly usage = new Map<string, UsageSummary>();
  private readonly SLOW_TURN_THRESHOLD_MS = 3000;

  constructor(
    private readonly agent: Agent<CallContext>,
    private readonly runTurn: TurnRunner
  ) {}

  async processTurn(ctx: CallContext, utterance: string): Promise<string> {
    const sessionId = ctx.session.sessionId;
    const startTime = Date.now();
    const input: AgentInputItem[] = [
      ...(this.histories.get(sessionId) ?? []),
      { role: 'user', content: utterance }
    ];

    const outcome = await this.runTurn(this.agent, input, ctx);
    this.histories.set(sessionId, outcome.history);
    if (outcome.usage) {
      this.usage.set(sessionId, addUsage(this.usageOf(sessionId), outcome.usage));
    }

    const elapsedMs = Date.now() - startTime;
    const log = elapsedMs > this.SLOW_TURN_THRESHOLD_MS ? logger.warn.bind(logger) : logger.debug.bind(logger);
    log('Conversation turn completed', {
      sessionId,
      storeName: ctx.store?.storeName,
      intent: ctx.analysis?.intent,
      operation: 'conversation_turn'
    }, {
      elapsedMs,
      historyLength: outcome.history.length,
      handoff: Boolean(ctx.handoff)
    });

    return outcome.finalOutput.trim() || FALLBACK_REPLY;
  }

  historyLength(sessionId: string): number {
    return this.histories.get(sessionId)?.length ?? 0;
  }

  usageOf(sessionId: string): UsageSummary {
    return this.usage.get(sessionId) ?? emptyUsage();
  }

  /**
   * Drops the call's history and returns its accumulated model usage.
   */
  endSession(sessionId: string): UsageSummary {
    const usage = this.usageOf(sessionId);
    this.histories.delete(sessionId);
    this.usage.delete(sessionId);
    return usage;
  }
}
