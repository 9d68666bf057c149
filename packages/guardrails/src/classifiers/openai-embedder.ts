/**
 * FILE PURPOSE: TextEmbedder backed by the embeddings endpoint of the LiteLLM proxy
 */

import type { TextEmbedder } from '../types.js';
import { createLLMClient, type OpenAI } from './llm-client.js';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export class OpenAIEmbedder implements TextEmbedder {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options?: { client?: OpenAI; model?: string }) {
    this.client = options?.client ?? createLLMClient();
    this.model = options?.model ?? process.env.EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODEL;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await this.client.embeddings.create({ model: this.model, input: texts });
      // The API may return items out of order; `index` is authoritative.
      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((d) => d.embedding);
    } catch (err) {
      throw new Error(
        `Embedding request failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }
}
