/**
 * FILE PURPOSE: Guardrail policy constants, read once from the environment
 *
 * HOW: zod coerces and validates GUARDRAILS_* env vars. Unset vars fall back
 *      to the defaults below. Invalid values throw GuardrailConfigError at load.
 */

import { z } from 'zod';

export class GuardrailConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GuardrailConfigError';
  }
}

export const DEFAULT_MAX_PROMPT_CHARS = 800;
export const DEFAULT_MAX_IMAGE_BYTES = 5 * 1024 * 1024;
export const DEFAULT_MAX_PIXELS = 1536 * 1536;
export const DEFAULT_CLIP_MARGIN = 0.1;
export const DEFAULT_DOMAIN_THRESHOLD = 0.55;
export const DEFAULT_CACHE_TTL_SECONDS = 3600;

const envSchema = z.object({
  GUARDRAILS_MAX_PROMPT_CHARS: z.coerce.number().int().positive().default(DEFAULT_MAX_PROMPT_CHARS),
  GUARDRAILS_MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_IMAGE_BYTES),
  GUARDRAILS_MAX_PIXELS: z.coerce.number().int().positive().default(DEFAULT_MAX_PIXELS),
  GUARDRAILS_CLIP_MARGIN: z.coerce.number().min(0).max(1).default(DEFAULT_CLIP_MARGIN),
  GUARDRAILS_DOMAIN_THRESHOLD: z.coerce.number().min(-1).max(1).default(DEFAULT_DOMAIN_THRESHOLD),
  GUARDRAILS_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(DEFAULT_CACHE_TTL_SECONDS),
});

export interface GuardrailConfig {
  maxPromptChars: number;
  maxImageBytes: number;
  maxPixels: number;
  /** Required gap between the top positive and top negative image label. */
  clipMargin: number;
  /** Minimum cosine similarity for the embedding domain check. */
  domainThreshold: number;
  cacheTtlSeconds: number;
}

export const DEFAULT_GUARDRAIL_CONFIG: GuardrailConfig = {
  maxPromptChars: DEFAULT_MAX_PROMPT_CHARS,
  maxImageBytes: DEFAULT_MAX_IMAGE_BYTES,
  maxPixels: DEFAULT_MAX_PIXELS,
  clipMargin: DEFAULT_CLIP_MARGIN,
  domainThreshold: DEFAULT_DOMAIN_THRESHOLD,
  cacheTtlSeconds: DEFAULT_CACHE_TTL_SECONDS,
};

/** Treat empty strings as unset so `FOO=` in a .env file keeps the default. */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadGuardrailConfig(env: NodeJS.ProcessEnv = process.env): GuardrailConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new GuardrailConfigError(`Invalid guardrail configuration: ${detail}`);
  }

  const e = parsed.data;
  return {
    maxPromptChars: e.GUARDRAILS_MAX_PROMPT_CHARS,
    maxImageBytes: e.GUARDRAILS_MAX_IMAGE_BYTES,
    maxPixels: e.GUARDRAILS_MAX_PIXELS,
    clipMargin: e.GUARDRAILS_CLIP_MARGIN,
    domainThreshold: e.GUARDRAILS_DOMAIN_THRESHOLD,
    cacheTtlSeconds: e.GUARDRAILS_CACHE_TTL_SECONDS,
  };
}
