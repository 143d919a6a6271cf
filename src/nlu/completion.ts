import { Agent, Runner } from '@openai/agents';

/**
 * Single prompt in, raw model text out. The classifier and the entity
 * extractor depend on this seam rather than on a provider SDK.
 */
export interface CompletionModel {
  complete(prompt: string): Promise<string>;
}

export interface AgentCompletionOptions {
  name: string;
  model: string;
  temperature: number;
}

export class AgentCompletionModel implements CompletionModel {
  private readonly agent: Agent;
  private readonly runner: Runner;

  constructor(options: AgentCompletionOptions) {
    this.agent = new Agent({
      name: options.name,
      instructions: 'Complete the task described in the user message. Reply with the requested output only.',
      model: options.model,
      modelSettings: { temperature: options.temperature }
    });
    this.runner = new Runner({ workflowName: options.name });
  }

  async complete(prompt: string): Promise<string> {
    const result = await this.runner.run(this.agent, prompt);
    return result.finalOutput ?? '';
  }
}
