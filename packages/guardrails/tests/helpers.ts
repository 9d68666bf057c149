/**
 * Shared fakes for guardrail tests: deterministic embedder, scripted image
 * classifier and generated images.
 */

import sharp from 'sharp';
import { vi } from 'vitest';
import type { ImageClassifier, SanitizedImage, TextEmbedder } from '../src/types.js';
import { POSITIVE_LABELS } from '../src/image/labels.js';

export const ON_TOPIC = [1, 0];
export const OFF_TOPIC = [0, 1];

/** Returns a fixed vector per text; unknown texts (including all exemplars) get ON_TOPIC. */
export class FakeEmbedder implements TextEmbedder {
  readonly calls: string[][] = [];
  failWith: Error | null = null;

  constructor(private readonly vectors: Record<string, number[]> = {}) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    if (this.failWith) throw this.failWith;
    return texts.map((t) => this.vectors[t] ?? ON_TOPIC);
  }
}

/** Score a label list from a sparse label → score map; unnamed labels score 0. */
export function scoresFor(labels: readonly string[], hot: Record<string, number>): number[] {
  return labels.map((label) => hot[label] ?? 0);
}

export const FOOD_PHOTO: Record<string, number> = { 'a photo of food': 0.9, portrait: 0.05 };

export const RAMEN: Record<string, number> = {
  'a photo of ramen, a type of food': 0.7,
  'a photo of pho, a type of food': 0.2,
  'a photo of udon, a type of food': 0.05,
};

/**
 * Classifier that answers the primary food/safety call with `primary` and the
 * category call with `categories`.
 */
export function scriptedClassifier(
  primary: Record<string, number>,
  categories: Record<string, number> = RAMEN,
) {
  const classify = vi.fn(async (_image: SanitizedImage, labels: readonly string[]) =>
    scoresFor(labels, labels[0] === POSITIVE_LABELS[0] ? primary : categories),
  );
  const classifier: ImageClassifier = { classify };
  return { classifier, classify };
}

export function solidPng(width = 8, height = 8): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 120, b: 40 } },
  })
    .png()
    .toBuffer();
}

export async function sanitized(width = 8, height = 8): Promise<SanitizedImage> {
  return { data: await solidPng(width, height), width, height, format: 'png' };
}
