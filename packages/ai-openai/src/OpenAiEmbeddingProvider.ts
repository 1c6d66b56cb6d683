import OpenAI from 'openai';
import type { EmbeddingProvider } from '@doc-quiz/core';

export interface OpenAiEmbeddingProviderConfig {
  client?: OpenAI;
  apiKey?: string;
  model?: string;
  /** Number of texts sent in a single embeddings call */
  batchSize?: number;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly batchSize: number;

  constructor(config: OpenAiEmbeddingProviderConfig = {}) {
    const apiKey = config.client ? undefined : config.apiKey ?? process.env.OPENAI_API_KEY;

    if (!config.client && !apiKey) {
      throw new Error('OPENAI_API_KEY is required to instantiate OpenAiEmbeddingProvider');
    }

    this.client = config.client ?? new OpenAI({ apiKey });
    this.model = config.model ?? 'text-embedding-3-small';
    this.batchSize = config.batchSize ?? 100;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await this.client.embeddings.create({
        model: this.model,
        input: batch,
        encoding_format: 'float'
      });

      // Items are matched to inputs by index, not position.
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map(item => item.embedding));
    }

    return vectors;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedDocuments([text]);
    if (!vector) {
      throw new Error('OpenAI embeddings response was empty');
    }
    return vector;
  }

  getModelName(): string {
    return this.model;
  }
}
