/**
 * FILE PURPOSE: Run the four prompt checks in order, stopping at the first BLOCK
 *
 * Order: length cap → injection → denylist → food domain. Only the domain
 * stage contributes scores.
 */

import type { StageOutcome } from '../types.js';
import { pass } from '../types.js';
import type { EmbeddingDomainClassifier } from '../classifiers/domain-classifier.js';
import { checkPromptLength } from './length.js';
import { checkInjection } from './injection.js';
import { checkPolicy } from './policy.js';
import { checkFoodDomain } from './domain.js';

export interface TextStageOptions {
  maxPromptChars: number;
  domainThreshold: number;
  domainClassifier: EmbeddingDomainClassifier;
}

export async function runTextStages(prompt: string, options: TextStageOptions): Promise<StageOutcome> {
  const syncStages = [
    () => checkPromptLength(prompt, options.maxPromptChars),
    () => checkInjection(prompt),
    () => checkPolicy(prompt),
  ];

  for (const stage of syncStages) {
    const outcome = stage();
    if (!outcome.ok) return outcome;
  }

  const domain = await checkFoodDomain(prompt, options.domainClassifier, options.domainThreshold);
  if (!domain.ok) return domain;
  return pass(undefined, domain.scores);
}

export { checkPromptLength } from './length.js';
export { checkInjection, INJECTION_PHRASES, LONG_TOKEN_LIMIT } from './injection.js';
export { checkPolicy, DENYLIST } from './policy.js';
export {
  checkFoodDomain,
  findFoodKeywords,
  extractImageSubject,
  looksLikePerson,
  KEYWORD_MATCH_SCORE,
  NOT_FOOD_REASON,
} from './domain.js';
