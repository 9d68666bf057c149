import type { UseCase } from './types.js';

/** Canonical prompt sent downstream for image-led requests. */
export const IMAGE_LED_GENERATION_PROMPT = 'generate image with this image attached in center of the background';

/** Template prompts that mean "use the attached image as the subject". */
export const IMAGE_LED_PROMPTS: readonly string[] = [
  IMAGE_LED_GENERATION_PROMPT,
  'generate image with this image attached in center',
  'generate image with this image in center',
  'create image with this image in center',
];

/**
 * IMAGE_LED iff an image is attached and the prompt contains one of the
 * template phrases. Everything else is PROMPT_LED, image or not.
 */
export function routeUseCase(prompt: string, hasImage: boolean): UseCase {
  if (!hasImage) return 'PROMPT_LED';
  const normalized = prompt.trim().toLowerCase();
  return IMAGE_LED_PROMPTS.some((phrase) => normalized.includes(phrase)) ? 'IMAGE_LED' : 'PROMPT_LED';
}
