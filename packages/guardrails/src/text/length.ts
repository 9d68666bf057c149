import type { StageOutcome } from '../types.js';
import { block, pass } from '../types.js';

/** Counts code points, so an emoji is one character. */
export function checkPromptLength(prompt: string, maxChars: number): StageOutcome {
  if (Array.from(prompt).length > maxChars) return block('Prompt too long');
  return pass(undefined);
}
