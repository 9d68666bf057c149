import { describe, it, expect } from 'vitest';
import { IMAGE_LED_GENERATION_PROMPT, IMAGE_LED_PROMPTS, routeUseCase } from '../src/router.js';

describe('routeUseCase', () => {
  it('is PROMPT_LED without an image, even for a template prompt', () => {
    expect(routeUseCase(IMAGE_LED_GENERATION_PROMPT, false)).toBe('PROMPT_LED');
  });

  it('is IMAGE_LED for every template phrase with an image', () => {
    for (const phrase of IMAGE_LED_PROMPTS) {
      expect(routeUseCase(phrase, true)).toBe('IMAGE_LED');
    }
  });

  it('ignores case and surrounding text', () => {
    expect(routeUseCase('  Please CREATE IMAGE WITH THIS IMAGE IN CENTER, thanks ', true)).toBe('IMAGE_LED');
  });

  it('is PROMPT_LED for a free-form prompt with an image', () => {
    expect(routeUseCase('dinner idea', true)).toBe('PROMPT_LED');
  });
});
