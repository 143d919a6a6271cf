import OpenAI from 'openai';

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;

  constructor(apiKey: string, private readonly model: string = 'text-embedding-3-small') {
    this.client = new OpenAI({ apiKey });
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text.replace(/\n/g, ' ')
    });
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error('Embedding response contained no vectors');
    }
    return embedding;
  }
}
