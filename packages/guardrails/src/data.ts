/**
 * FILE PURPOSE: Load the curated vocabularies shipped in packages/guardrails/data
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const wordListSchema = z.array(z.string().min(1)).min(1);

function loadWordList(fileName: string): readonly string[] {
  const url = new URL(`../data/${fileName}`, import.meta.url);
  const parsed = wordListSchema.safeParse(JSON.parse(readFileSync(url, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`Word list ${fileName} is malformed: ${parsed.error.message}`);
  }
  return Object.freeze(parsed.data.map((w) => w.toLowerCase()));
}

/** In-domain vocabulary for the keyword fast path (lowercase substrings). */
export const FOOD_KEYWORDS = loadWordList('food-keywords.json');

/** Fine-grained categories for identifying an approved food image. */
export const FOOD_CATEGORIES = loadWordList('food-categories.json');
