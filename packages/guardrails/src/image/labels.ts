/**
 * FILE PURPOSE: Candidate labels for the contrastive image check
 *
 * Negative labels cover NSFW, violence and clearly non-food subjects, so a
 * single classifier call gates both domain relevance and unsafe content.
 */

import { FOOD_CATEGORIES } from '../data.js';

export const POSITIVE_LABELS: readonly string[] = [
  'a photo of food',
  'a meal',
  'a dish',
  'ingredients',
  'cooking',
];

export const NEGATIVE_LABELS: readonly string[] = [
  // NSFW
  'a nude person',
  'nudity',
  'naked person',
  'explicit nudity',
  'porn',
  'pornography',
  'sexual content',
  'adult content',
  // violence and weapons
  'weapon',
  'gun',
  'knife',
  'violence',
  'gore',
  'blood',
  'death',
  // non-food subjects
  'a face portrait',
  'portrait',
  'person',
  'people',
  'document',
  'text',
  'paper',
  'child',
  'minor',
];

/** Substrings that mark a negative label as NSFW (affects the reason text only). */
export const NSFW_MARKERS: readonly string[] = ['nude', 'naked', 'porn', 'sexual', 'adult'];

export function isNsfwLabel(label: string): boolean {
  const lower = label.toLowerCase();
  return NSFW_MARKERS.some((marker) => lower.includes(marker));
}

/** Text prompt for a fine-grained category, e.g. "a photo of ramen, a type of food". */
export function categoryPrompt(category: string): string {
  return `a photo of ${category}, a type of food`;
}

export const FOOD_CATEGORY_LABELS: readonly string[] = FOOD_CATEGORIES.map(categoryPrompt);
