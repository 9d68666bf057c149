/**
 * FILE PURPOSE: Build a GuardrailEngine wired to the production collaborators
 *
 * Embeddings: LiteLLM proxy. Image classification: CLIP_ENDPOINT_URL.
 * Cache: Redis when REDIS_URL is set, otherwise process memory.
 */

import type { CacheStore, ImageClassifier, TextEmbedder } from './types.js';
import { loadGuardrailConfig, type GuardrailConfig } from './config.js';
import { GuardrailEngine } from './engine.js';
import { DecisionCache } from './cache/decision-cache.js';
import { createCacheStore } from './cache/stores.js';
import { EmbeddingDomainClassifier } from './classifiers/domain-classifier.js';
import { OpenAIEmbedder } from './classifiers/openai-embedder.js';
import { HttpImageClassifier } from './classifiers/clip-client.js';

export interface CreateGuardrailEngineOptions {
  config?: GuardrailConfig;
  embedder?: TextEmbedder;
  imageClassifier?: ImageClassifier;
  cacheStore?: CacheStore;
}

export function createGuardrailEngine(options: CreateGuardrailEngineOptions = {}): GuardrailEngine {
  const config = options.config ?? loadGuardrailConfig();
  const embedder = options.embedder ?? new OpenAIEmbedder();
  const store = options.cacheStore ?? createCacheStore();

  return new GuardrailEngine({
    domainClassifier: new EmbeddingDomainClassifier(embedder),
    imageClassifier: options.imageClassifier ?? new HttpImageClassifier(),
    cache: new DecisionCache(store, config.cacheTtlSeconds),
    config,
  });
}
