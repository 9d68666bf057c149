/**
 * FILE PURPOSE: Contrastive food/safety check for a sanitized image
 *
 * HOW: One classify() call over POSITIVE_LABELS + NEGATIVE_LABELS.
 *      BLOCK when max_pos < max_neg + margin. The reason names NSFW content
 *      when the winning negative label is NSFW-flavored; the decision itself
 *      does not depend on that.
 *      With identifyType, a second call over the fine-grained categories runs
 *      only after the primary PASS and reports the top match + top 3.
 *      Classifier exceptions become a BLOCK (fail-closed).
 */

import type {
  FoodCandidate,
  FoodIdentification,
  ImageClassifier,
  SanitizedImage,
  Scores,
  StageOutcome,
} from '../types.js';
import { SCORE_KEYS, block, fault, pass } from '../types.js';
import { FOOD_CATEGORIES } from '../data.js';
import { FOOD_CATEGORY_LABELS, NEGATIVE_LABELS, POSITIVE_LABELS, isNsfwLabel } from './labels.js';

export interface FoodCheckOptions {
  margin: number;
  identifyType: boolean;
}

export interface FoodCheckValue {
  foodIdentification: FoodIdentification | null;
}

const TOP_CANDIDATES = 3;

interface Ranked {
  index: number;
  score: number;
}

/** Highest score and its index. Ties keep the earliest label. */
function argmax(scores: readonly number[]): Ranked {
  let best: Ranked = { index: -1, score: -Infinity };
  scores.forEach((score, index) => {
    if (score > best.score) best = { index, score };
  });
  return best;
}

function toPercent(score: number): number {
  return Math.round(score * 1000) / 10;
}

function assertScores(scores: readonly number[], expected: number): void {
  if (scores.length !== expected) {
    throw new Error(`classifier returned ${scores.length} scores for ${expected} labels`);
  }
  if (!scores.every(Number.isFinite)) {
    throw new Error('classifier returned a non-finite score');
  }
}

async function identifyFood(image: SanitizedImage, classifier: ImageClassifier): Promise<FoodIdentification> {
  const scores = await classifier.classify(image, FOOD_CATEGORY_LABELS);
  assertScores(scores, FOOD_CATEGORY_LABELS.length);

  const topCandidates: FoodCandidate[] = scores
    .map((score, index) => ({ label: FOOD_CATEGORIES[index] ?? 'unknown', score }))
    .sort((a, b) => b.score - a.score)
    .slice(0, TOP_CANDIDATES)
    .map(({ label, score }) => ({ label, confidence: toPercent(score) }));

  const top = topCandidates[0] ?? { label: 'unknown', confidence: 0 };
  return { foodType: top.label, confidence: top.confidence, topCandidates };
}

export async function checkFoodImage(
  image: SanitizedImage,
  classifier: ImageClassifier,
  options: FoodCheckOptions,
): Promise<StageOutcome<FoodCheckValue>> {
  try {
    const labels = [...POSITIVE_LABELS, ...NEGATIVE_LABELS];
    const probs = await classifier.classify(image, labels);
    assertScores(probs, labels.length);

    const pos = argmax(probs.slice(0, POSITIVE_LABELS.length));
    const neg = argmax(probs.slice(POSITIVE_LABELS.length));
    const maxPos = pos.score;
    const maxNeg = neg.score;

    if (maxPos < maxNeg + options.margin) {
      const negLabel = NEGATIVE_LABELS[neg.index] ?? 'unknown';
      const reason = isNsfwLabel(negLabel)
        ? `NSFW content detected: ${negLabel}`
        : `Image not clearly food (pos: ${maxPos.toFixed(2)}, neg: ${maxNeg.toFixed(2)})`;
      return block(reason, {
        [SCORE_KEYS.FOOD_SCORE]: maxPos,
        [SCORE_KEYS.NON_FOOD_SCORE]: maxNeg,
        [SCORE_KEYS.TOP_NEGATIVE_LABEL]: negLabel,
      });
    }

    const scores: Scores = {
      [SCORE_KEYS.FOOD_SCORE]: maxPos,
      [SCORE_KEYS.NON_FOOD_SCORE]: maxNeg,
    };

    if (!options.identifyType) {
      return pass({ foodIdentification: null }, scores);
    }

    const foodIdentification = await identifyFood(image, classifier);
    scores[SCORE_KEYS.IDENTIFIED_FOOD] = foodIdentification.foodType;
    scores[SCORE_KEYS.FOOD_TYPE_CONFIDENCE] = foodIdentification.confidence;
    process.stderr.write(`INFO: Food identified: ${foodIdentification.foodType} (${foodIdentification.confidence}%)\n`);
    return pass({ foodIdentification }, scores);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`ERROR: Image classification failed: ${message}\n`);
    return fault(`Image classification failed: ${message}`);
  }
}
