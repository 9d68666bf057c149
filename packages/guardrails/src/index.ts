/**
 * FILE PURPOSE: Barrel export for the guardrail pipeline
 *
 * Import: `import { createGuardrailEngine, GuardrailEngine } from '@platecheck/guardrails'`
 */

export { GuardrailEngine, prefixImageScores, IMAGE_LEG_REASON_PREFIX } from './engine.js';
export type { GuardrailEngineDeps } from './engine.js';
export { createGuardrailEngine } from './factory.js';
export type { CreateGuardrailEngineOptions } from './factory.js';

export {
  loadGuardrailConfig,
  GuardrailConfigError,
  DEFAULT_GUARDRAIL_CONFIG,
} from './config.js';
export type { GuardrailConfig } from './config.js';

export { SCORE_KEYS, pass, block, fault } from './types.js';
export type {
  GuardrailStatus,
  GuardrailResult,
  GuardrailMetadata,
  CachedDecision,
  UseCase,
  Scores,
  ScoreValue,
  SanitizedImage,
  FoodIdentification,
  FoodCandidate,
  StageOutcome,
  TextEmbedder,
  ImageClassifier,
  CacheStore,
} from './types.js';

// ─── Fingerprint & decision cache ───────────────────────────────────────────
export { fingerprint, computeImageHash, sha256Hex } from './cache/fingerprint.js';
export { DecisionCache, cacheKey, toCachedDecision, CACHE_KEY_PREFIX } from './cache/decision-cache.js';
export { RedisCacheStore, MemoryCacheStore, createCacheStore } from './cache/stores.js';
export { SingleFlight } from './cache/single-flight.js';

// ─── Stages ─────────────────────────────────────────────────────────────────
export { sanitizeImage } from './hygiene/sanitizer.js';
export type { HygieneLimits } from './hygiene/sanitizer.js';
export { runTextStages, checkPromptLength, checkInjection, checkPolicy, checkFoodDomain } from './text/index.js';
export { checkFoodImage } from './image/food-check.js';
export { POSITIVE_LABELS, NEGATIVE_LABELS } from './image/labels.js';
export { routeUseCase, IMAGE_LED_PROMPTS, IMAGE_LED_GENERATION_PROMPT } from './router.js';

// ─── Classifier collaborators ───────────────────────────────────────────────
export { EmbeddingDomainClassifier, FOOD_INTENT_EXEMPLARS } from './classifiers/domain-classifier.js';
export { OpenAIEmbedder } from './classifiers/openai-embedder.js';
export { HttpImageClassifier } from './classifiers/clip-client.js';
export { createLLMClient } from './classifiers/llm-client.js';
export { cosineSimilarity } from './classifiers/similarity.js';
