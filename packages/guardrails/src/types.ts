/**
 * FILE PURPOSE: Type definitions for the prompt/image guardrail pipeline
 *
 * WHY: Every stage returns data (StageOutcome) instead of throwing, so the
 *      engine's short-circuit logic is plain control flow over values.
 *      GuardrailResult is the only value that leaves the pipeline.
 */

import type { ScoreValue } from '@platecheck/shared-types';

export type { ScoreValue };

/** Final decision. ERROR is never produced here; callers wrap unexpected exceptions. */
export type GuardrailStatus = 'PASS' | 'BLOCK';

/** Which composition governs a request. */
export type UseCase = 'IMAGE_LED' | 'PROMPT_LED';

/** Open, namespaced metric map. Known keys are listed in SCORE_KEYS. */
export type Scores = Record<string, ScoreValue>;

/**
 * Every score key a stage writes. Stages own disjoint keys; the prompt-led
 * image leg re-publishes the image keys under the `image_` prefix.
 */
export const SCORE_KEYS = {
  // text domain stage
  DOMAIN_SCORE: 'domain_score',
  METHOD: 'method',
  MATCHED_KEYWORDS: 'matched_keywords',
  // image stage
  FOOD_SCORE: 'food_score',
  NON_FOOD_SCORE: 'non_food_score',
  TOP_NEGATIVE_LABEL: 'top_negative_label',
  IDENTIFIED_FOOD: 'identified_food',
  FOOD_TYPE_CONFIDENCE: 'food_type_confidence',
  // prompt-led image leg
  IMAGE_FOOD_SCORE: 'image_food_score',
  IMAGE_NON_FOOD_SCORE: 'image_non_food_score',
  IMAGE_IDENTIFIED_FOOD: 'image_identified_food',
  IMAGE_FOOD_TYPE_CONFIDENCE: 'image_food_type_confidence',
} as const;

/** A decoded, metadata-free image. `data` is PNG bytes rebuilt from raw RGB pixels. */
export interface SanitizedImage {
  data: Buffer;
  width: number;
  height: number;
  format: 'png';
}

export interface FoodCandidate {
  label: string;
  /** Percent, 0–100. */
  confidence: number;
}

/** Fine-grained identification of an already-approved food image. */
export interface FoodIdentification {
  foodType: string;
  /** Percent, 0–100. */
  confidence: number;
  topCandidates: FoodCandidate[];
}

/** Transient side-channel data. Never written to the decision cache. */
export interface GuardrailMetadata {
  useCase?: UseCase;
  hasImage?: boolean;
  sanitizedImage?: SanitizedImage;
  foodIdentification?: FoodIdentification;
  /** true when the result came from the decision cache. */
  cacheHit?: boolean;
  /** true when a collaborator error forced the BLOCK. Such results are not cached. */
  collaboratorFault?: boolean;
}

export interface GuardrailResult {
  status: GuardrailStatus;
  /** Empty iff status is PASS. */
  reasons: string[];
  scores: Scores;
  metadata: GuardrailMetadata;
}

/** The serializable subset of a GuardrailResult stored in the decision cache. */
export type CachedDecision = Pick<GuardrailResult, 'status' | 'reasons' | 'scores'>;

/**
 * Outcome of a single stage: success with a value, or failure with reasons.
 * `fault` marks a fail-closed BLOCK caused by a collaborator error rather
 * than by the content itself.
 */
export type StageOutcome<T = undefined> =
  | { ok: true; value: T; scores: Scores }
  | { ok: false; reasons: string[]; scores: Scores; fault?: boolean };

/** Build a passing stage outcome. */
export function pass<T>(value: T, scores: Scores = {}): StageOutcome<T> {
  return { ok: true, value, scores };
}

/** Build a blocking stage outcome. At least one reason is required. */
export function block<T = never>(reason: string | string[], scores: Scores = {}): StageOutcome<T> {
  const reasons = Array.isArray(reason) ? reason : [reason];
  if (reasons.length === 0) {
    throw new Error('A blocking outcome needs at least one reason');
  }
  return { ok: false, reasons, scores };
}

/** Fail-closed BLOCK for a collaborator error. */
export function fault<T = never>(reason: string, scores: Scores = {}): StageOutcome<T> {
  return { ok: false, reasons: [reason], scores, fault: true };
}

/** Embeds text into vectors. Implementations may batch. */
export interface TextEmbedder {
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * Zero-shot image classifier. Returns one score per label, in label order,
 * summing to 1 (softmax over image-text similarity logits).
 */
export interface ImageClassifier {
  classify(image: SanitizedImage, labels: readonly string[]): Promise<number[]>;
}

/** Key-value store used by the decision cache. */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Release connections. Stores without any omit it. */
  close?(): Promise<void>;
}
