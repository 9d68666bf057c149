/**
 * FILE PURPOSE: ImageClassifier backed by a zero-shot image classification endpoint
 *
 * HOW: POSTs the sanitized PNG (base64) with the candidate labels to a
 *      CLIP-style inference server using the Hugging Face inference payload:
 *        { inputs: "<base64>", parameters: { candidate_labels: [...] } }
 *      → [{ label, score }, ...]
 *      Scores are re-ordered to match the requested label order.
 *      Errors propagate; the image stage turns them into a fail-closed BLOCK.
 */

import { z } from 'zod';
import type { ImageClassifier, SanitizedImage } from '../types.js';

const DEFAULT_TIMEOUT_MS = 15_000;

const responseSchema = z.array(z.object({ label: z.string(), score: z.number() }));

export interface HttpImageClassifierOptions {
  endpointUrl?: string;
  apiToken?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class HttpImageClassifier implements ImageClassifier {
  private readonly endpointUrl: string;
  private readonly apiToken: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpImageClassifierOptions = {}) {
    const endpointUrl = options.endpointUrl ?? process.env.CLIP_ENDPOINT_URL;
    if (!endpointUrl) {
      throw new Error('HttpImageClassifier requires an endpoint URL (set CLIP_ENDPOINT_URL)');
    }
    this.endpointUrl = endpointUrl;
    this.apiToken = options.apiToken ?? process.env.CLIP_API_TOKEN;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async classify(image: SanitizedImage, labels: readonly string[]): Promise<number[]> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.endpointUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiToken ? { Authorization: `Bearer ${this.apiToken}` } : {}),
        },
        body: JSON.stringify({
          inputs: image.data.toString('base64'),
          parameters: { candidate_labels: labels },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Image classifier returned HTTP ${response.status}`);
      }

      const parsed = responseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Image classifier returned an unexpected payload');
      }

      const byLabel = new Map(parsed.data.map((item) => [item.label, item.score]));
      return labels.map((label) => {
        const score = byLabel.get(label);
        if (score === undefined) {
          throw new Error(`Image classifier returned no score for label "${label}"`);
        }
        return score;
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
