/**
 * FILE PURPOSE: Downstream generation call, made only after a guardrail PASS
 *
 * HOW: @google/genai generateContent with the prompt and, when present, the
 *      sanitized PNG as inline data. Text parts are concatenated; the last
 *      inline image part becomes the result image (base64).
 *      Errors come back as a text result; the caller stores them as the
 *      request's result_text.
 */

import { GoogleGenAI } from '@google/genai';
import type { GenerateContentParameters, GenerateContentResponse, Part } from '@google/genai';
import type { SanitizedImage } from '@platecheck/guardrails';

export const GENERATION_MODEL = 'gemini-2.5-flash-image';

export const SYSTEM_PROMPT =
  'You are a food photography assistant. Produce appetizing, realistic food imagery ' +
  'and short descriptions. Keep the focus on the dish, its ingredients and its presentation.';

export interface GenerationResult {
  text: string;
  /** Base64 image, null when the model returned text only. */
  image: string | null;
}

export type GenerateContentFn = (prompt: string, image: SanitizedImage | null) => Promise<GenerationResult>;

/** The slice of the SDK this module calls. `new GoogleGenAI(...).models` satisfies it. */
export interface GenerateContentClient {
  generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
}

export interface GeminiGeneratorOptions {
  apiKey?: string;
  model?: string;
  client?: GenerateContentClient;
}

export function extractGenerationResult(response: Pick<GenerateContentResponse, 'candidates'>): GenerationResult {
  const parts: Part[] = response.candidates?.[0]?.content?.parts ?? [];
  let text = '';
  let image: string | null = null;

  for (const part of parts) {
    if (part.text) {
      text += `${part.text}\n`;
    } else if (part.inlineData?.data) {
      image = part.inlineData.data;
    }
  }

  const trimmed = text.trim();
  if (trimmed) return { text: trimmed, image };
  return { text: image ? 'Generated successfully.' : 'No response generated.', image };
}

export function createGeminiGenerator(options: GeminiGeneratorOptions = {}): GenerateContentFn {
  const apiKey = options.apiKey ?? process.env.GEMINI_API_KEY;
  const model = options.model ?? GENERATION_MODEL;

  if (!apiKey && !options.client) {
    process.stderr.write('WARN: GEMINI_API_KEY not set; generation returns an error text\n');
    return async () => ({ text: 'Error: GEMINI_API_KEY not configured.', image: null });
  }

  const client = options.client ?? new GoogleGenAI({ apiKey }).models;

  return async (prompt, image) => {
    const parts: Part[] = [{ text: prompt }];
    if (image) {
      parts.push({ inlineData: { mimeType: 'image/png', data: image.data.toString('base64') } });
    }

    try {
      const response = await client.generateContent({
        model,
        contents: [{ role: 'user', parts }],
        config: { systemInstruction: SYSTEM_PROMPT },
      });
      const result = extractGenerationResult(response);
      process.stderr.write(`INFO: Generation finished (image: ${result.image !== null})\n`);
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`ERROR: Generation failed: ${message}\n`);
      return { text: `Generation error: ${message}`, image: null };
    }
  };
}
