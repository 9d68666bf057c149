import type { StageOutcome } from '../types.js';
import { block, pass } from '../types.js';

/** Denied substrings, grouped by category. Matching is case-insensitive. */
export const DENYLIST: Readonly<Record<string, readonly string[]>> = {
  sexual: ['nude', 'naked', 'sex', 'porn', 'xxx'],
  violent: ['kill', 'murder', 'suicide', 'hurt', 'blood', 'gore'],
  hate: ['hate', 'racist', 'nazi'],
  fraud: ['scam', 'fraud', 'credit card', 'ssn'],
  minors: ['child', 'minor', 'kid'],
};

const DENYLIST_TERMS: readonly string[] = Object.values(DENYLIST).flat();

/** Blocks on any denied term and reports every term that matched, in list order. */
export function checkPolicy(prompt: string): StageOutcome {
  const lower = prompt.toLowerCase();
  const found = DENYLIST_TERMS.filter((term) => lower.includes(term));

  if (found.length > 0) {
    return block(`Policy violation: ${found.join(', ')}`);
  }
  return pass(undefined);
}
