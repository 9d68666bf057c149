/**
 * FILE PURPOSE: Prompt-injection heuristics for user prompts
 *
 * Two triggers: a known injection phrase anywhere in the lowercased prompt,
 * or a single whitespace-delimited token longer than LONG_TOKEN_LIMIT that is
 * not a URL (encoded/obfuscated payloads tend to look like that).
 */

import type { StageOutcome } from '../types.js';
import { block, pass } from '../types.js';

export const INJECTION_PHRASES: readonly string[] = [
  'ignore previous',
  'system prompt',
  'developer message',
  'bypass safety',
  'jailbreak',
  'dan mode',
  'do anything now',
];

export const LONG_TOKEN_LIMIT = 40;

const REASON_PREFIX = 'Potential prompt injection detected';

export function checkInjection(prompt: string): StageOutcome {
  const lower = prompt.toLowerCase();

  const phrase = INJECTION_PHRASES.find((p) => lower.includes(p));
  if (phrase) {
    return block(`${REASON_PREFIX}: ${phrase}`);
  }

  const longToken = prompt
    .split(/\s+/)
    .find((token) => token.length > LONG_TOKEN_LIMIT && !token.startsWith('http'));
  if (longToken) {
    return block(`${REASON_PREFIX}: suspicious long token`);
  }

  return pass(undefined);
}
