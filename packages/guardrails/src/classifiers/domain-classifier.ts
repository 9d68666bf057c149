/**
 * FILE PURPOSE: Semantic food-domain similarity over a fixed set of exemplar intents
 *
 * WHY: Prompts with no food keyword still need a domain decision
 *      ("what should I make for my anniversary" is on-topic).
 * HOW: Exemplar intents are embedded once, lazily, on first use. Concurrent
 *      first callers share the same initialization promise; a failed
 *      initialization is cleared so the next call can retry.
 */

import type { TextEmbedder } from '../types.js';
import { cosineSimilarity } from './similarity.js';

export const FOOD_INTENT_EXEMPLARS: readonly string[] = [
  'write a recipe for pizza',
  'ingredients list for pasta',
  'cooking steps for burger',
  'plating photo of food',
  'food photography',
  'restaurant menu item',
  'recipe for chicken',
  'how to cook pasta',
  'dinner idea',
  'create a food image',
  'generate food photo',
  'recipe for pasta',
  'cooking instructions',
  'food preparation',
  'dish presentation',
  'meal planning',
];

export interface DomainSimilarity {
  /** Highest cosine similarity against any exemplar. */
  maxScore: number;
  closestExemplar: string;
}

export class EmbeddingDomainClassifier {
  private exemplarVectors: Promise<number[][]> | null = null;

  constructor(
    private readonly embedder: TextEmbedder,
    private readonly exemplars: readonly string[] = FOOD_INTENT_EXEMPLARS,
  ) {
    if (exemplars.length === 0) {
      throw new Error('EmbeddingDomainClassifier needs at least one exemplar');
    }
  }

  /** Embed the exemplars once. Safe to call concurrently. */
  warmUp(): Promise<number[][]> {
    if (this.exemplarVectors) return this.exemplarVectors;

    const pending = this.embedExemplars();
    this.exemplarVectors = pending;
    void pending.catch(() => {
      if (this.exemplarVectors === pending) this.exemplarVectors = null;
    });
    return pending;
  }

  private async embedExemplars(): Promise<number[][]> {
    const vectors = await this.embedder.embed([...this.exemplars]);
    if (vectors.length !== this.exemplars.length) {
      throw new Error(`Embedder returned ${vectors.length} vectors for ${this.exemplars.length} exemplars`);
    }
    return vectors;
  }

  async similarity(text: string): Promise<DomainSimilarity> {
    const exemplarVectors = await this.warmUp();
    const [textVector] = await this.embedder.embed([text]);
    if (!textVector) {
      throw new Error('Embedder returned no vector for the prompt');
    }

    let maxScore = -Infinity;
    let closestExemplar = this.exemplars[0] ?? '';
    exemplarVectors.forEach((vector, i) => {
      const score = cosineSimilarity(textVector, vector);
      if (score > maxScore) {
        maxScore = score;
        closestExemplar = this.exemplars[i] ?? closestExemplar;
      }
    });

    if (!Number.isFinite(maxScore)) {
      throw new Error('Embedder returned vectors with no finite similarity');
    }
    return { maxScore, closestExemplar };
  }
}
