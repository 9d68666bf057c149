/**
 * FILE PURPOSE: Food-domain relevance check for prompts
 *
 * HOW: Three tiers, cheapest first:
 *   1. keyword fast path: any food keyword substring passes at a fixed 0.95
 *   2. person fast-block: "generate an image of <person>" with no food in the subject
 *   3. embedding similarity against exemplar intents, blocked below threshold
 *      Embedder failure blocks (fail-closed).
 */

import type { Scores, StageOutcome } from '../types.js';
import { SCORE_KEYS, block, fault, pass } from '../types.js';
import { FOOD_KEYWORDS } from '../data.js';
import type { EmbeddingDomainClassifier } from '../classifiers/domain-classifier.js';

export const KEYWORD_MATCH_SCORE = 0.95;
const MAX_REPORTED_KEYWORDS = 5;

export const NOT_FOOD_REASON = 'Prompt does not contain food-related items or context';

const IMAGE_OF_PATTERN = /\b(?:generate|create|make|show|display)\b.*\bimage\b.*\bof\s+(.+)$/is;

const PERSON_WORDS = /\b(?:person|people|man|men|woman|women|boy|girl|child|baby|portrait|selfie|celebrity|actor|actress|model|singer|artist|politician|president|influencer|face)\b/;

export function findFoodKeywords(text: string): string[] {
  const lower = text.toLowerCase();
  return FOOD_KEYWORDS.filter((keyword) => lower.includes(keyword));
}

/** The subject of an "image of …" request, if the prompt has that shape. */
export function extractImageSubject(prompt: string): string | null {
  const match = IMAGE_OF_PATTERN.exec(prompt.trim());
  const subject = match?.[1]?.trim();
  return subject ? subject : null;
}

export function looksLikePerson(subject: string): boolean {
  return PERSON_WORDS.test(subject.toLowerCase());
}

export async function checkFoodDomain(
  prompt: string,
  classifier: EmbeddingDomainClassifier,
  threshold: number,
): Promise<StageOutcome> {
  const keywords = findFoodKeywords(prompt);
  if (keywords.length > 0) {
    return pass(undefined, {
      [SCORE_KEYS.DOMAIN_SCORE]: KEYWORD_MATCH_SCORE,
      [SCORE_KEYS.METHOD]: 'keyword_match',
      [SCORE_KEYS.MATCHED_KEYWORDS]: keywords.slice(0, MAX_REPORTED_KEYWORDS),
    });
  }

  const subject = extractImageSubject(prompt);
  if (subject && looksLikePerson(subject) && findFoodKeywords(subject).length === 0) {
    process.stderr.write(`INFO: Domain check: person subject without food context ("${subject.slice(0, 60)}")\n`);
    return block(NOT_FOOD_REASON, {
      [SCORE_KEYS.DOMAIN_SCORE]: 0,
      [SCORE_KEYS.METHOD]: 'pattern_block',
    });
  }

  let maxScore: number;
  try {
    ({ maxScore } = await classifier.similarity(prompt));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`ERROR: Domain check failed: ${message}\n`);
    return fault(`Domain check failed: ${message}`);
  }

  const scores: Scores = {
    [SCORE_KEYS.DOMAIN_SCORE]: maxScore,
    [SCORE_KEYS.METHOD]: 'embedding',
  };
  if (maxScore < threshold) {
    return block(`Prompt not related to food items or context (score: ${maxScore.toFixed(2)})`, scores);
  }
  return pass(undefined, scores);
}
