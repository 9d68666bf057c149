/**
 * FILE PURPOSE: OpenAI-compatible client pointed at the LiteLLM proxy
 *
 * WHY: Embedding calls go through one gateway so model choice, keys and
 *      fallbacks live in proxy config, not here.
 */
import OpenAI from 'openai';

export interface LLMClientOptions {
  apiKey?: string;
  baseURL?: string;
  /** Extra default headers sent on every request. */
  headers?: Record<string, string>;
}

export function createLLMClient(options: LLMClientOptions = {}): OpenAI {
  const baseURL = options.baseURL || process.env.LITELLM_PROXY_URL || 'http://localhost:4000/v1';
  const key = options.apiKey || process.env.LITELLM_API_KEY || '';

  return new OpenAI({
    baseURL,
    apiKey: key,
    ...(options.headers ? { defaultHeaders: options.headers } : {}),
  });
}

export type { OpenAI };
