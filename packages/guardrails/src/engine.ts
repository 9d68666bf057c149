/**
 * FILE PURPOSE: Guardrail decision pipeline, the single entry point for callers
 *
 * WHY: Every prompt (and optional image) must get a deterministic PASS/BLOCK
 *      before the generation service is called.
 * HOW: fingerprint → cache lookup → route → use-case composition → cache write.
 *      IMAGE_LED:  hygiene → image check (with identification).
 *      PROMPT_LED: text stages; then, if an image is attached, hygiene → image
 *                  check, with image scores merged under image_* keys.
 *      Stages return StageOutcome values; the first failure short-circuits.
 *      Concurrent calls for the same fingerprint share one run.
 */

import type {
  GuardrailMetadata,
  GuardrailResult,
  ImageClassifier,
  SanitizedImage,
  Scores,
  StageOutcome,
  UseCase,
} from './types.js';
import { SCORE_KEYS } from './types.js';
import type { GuardrailConfig } from './config.js';
import { DEFAULT_GUARDRAIL_CONFIG } from './config.js';
import { fingerprint } from './cache/fingerprint.js';
import { DecisionCache } from './cache/decision-cache.js';
import { SingleFlight } from './cache/single-flight.js';
import { sanitizeImage } from './hygiene/sanitizer.js';
import { checkFoodImage, type FoodCheckValue } from './image/food-check.js';
import { runTextStages } from './text/index.js';
import { routeUseCase } from './router.js';
import type { EmbeddingDomainClassifier } from './classifiers/domain-classifier.js';

export const IMAGE_LEG_REASON_PREFIX = 'Image validation failed: ';

export interface GuardrailEngineDeps {
  domainClassifier: EmbeddingDomainClassifier;
  imageClassifier: ImageClassifier;
  cache: DecisionCache;
  config?: Partial<GuardrailConfig>;
}

interface ImageLegValue extends FoodCheckValue {
  sanitizedImage: SanitizedImage;
}

type Failure = Extract<StageOutcome<unknown>, { ok: false }>;

function blocked(failure: Failure, metadata: GuardrailMetadata, reasons = failure.reasons, scores = failure.scores): GuardrailResult {
  return {
    status: 'BLOCK',
    reasons,
    scores,
    metadata: failure.fault ? { ...metadata, collaboratorFault: true } : metadata,
  };
}

export class GuardrailEngine {
  private readonly config: GuardrailConfig;
  private readonly domainClassifier: EmbeddingDomainClassifier;
  private readonly imageClassifier: ImageClassifier;
  private readonly cache: DecisionCache;
  private readonly inFlight = new SingleFlight<GuardrailResult>();

  constructor(deps: GuardrailEngineDeps) {
    this.config = { ...DEFAULT_GUARDRAIL_CONFIG, ...deps.config };
    this.domainClassifier = deps.domainClassifier;
    this.imageClassifier = deps.imageClassifier;
    this.cache = deps.cache;
  }

  /**
   * Decide whether a prompt (and optional image) may reach the generation service.
   * Only programming faults reject; collaborator failures resolve to BLOCK.
   */
  async process(prompt: string, imageBytes?: Buffer | null): Promise<GuardrailResult> {
    const key = fingerprint(prompt, imageBytes);
    const shared = await this.inFlight.run(key, () => this.decide(key, prompt, imageBytes ?? null));
    // each caller of a shared run gets its own containers
    return {
      ...shared,
      reasons: [...shared.reasons],
      scores: { ...shared.scores },
      metadata: { ...shared.metadata },
    };
  }

  private async decide(key: string, prompt: string, imageBytes: Buffer | null): Promise<GuardrailResult> {
    const hasImage = imageBytes !== null;
    const useCase = routeUseCase(prompt, hasImage);

    const cached = await this.cache.lookup(key);
    if (cached) {
      process.stderr.write(`INFO: Guardrail cache hit for ${key.slice(0, 12)}\n`);
      return { ...cached, metadata: { ...cached.metadata, useCase, hasImage } };
    }

    process.stderr.write(`INFO: Guardrail ${useCase} (image: ${hasImage})\n`);

    const result = useCase === 'IMAGE_LED' && imageBytes !== null
      ? await this.imageLed(imageBytes)
      : await this.promptLed(prompt, imageBytes);

    if (result.metadata.collaboratorFault) {
      process.stderr.write(`WARN: Guardrail fail-closed BLOCK not cached: ${result.reasons.join('; ')}\n`);
    } else {
      await this.cache.store(key, result, this.config.cacheTtlSeconds);
    }
    return result;
  }

  private async imageLed(imageBytes: Buffer): Promise<GuardrailResult> {
    const useCase: UseCase = 'IMAGE_LED';
    const leg = await this.runImageLeg(imageBytes);
    if (!leg.ok) {
      return blocked(leg, { useCase, hasImage: true });
    }

    const metadata: GuardrailMetadata = {
      useCase,
      hasImage: true,
      sanitizedImage: leg.value.sanitizedImage,
    };
    if (leg.value.foodIdentification) {
      metadata.foodIdentification = leg.value.foodIdentification;
    }
    return { status: 'PASS', reasons: [], scores: leg.scores, metadata };
  }

  private async promptLed(prompt: string, imageBytes: Buffer | null): Promise<GuardrailResult> {
    const useCase: UseCase = 'PROMPT_LED';
    const hasImage = imageBytes !== null;

    const text = await runTextStages(prompt, {
      maxPromptChars: this.config.maxPromptChars,
      domainThreshold: this.config.domainThreshold,
      domainClassifier: this.domainClassifier,
    });
    if (!text.ok) {
      return blocked(text, { useCase, hasImage });
    }

    const scores: Scores = { ...text.scores };
    if (imageBytes === null) {
      return { status: 'PASS', reasons: [], scores, metadata: { useCase, hasImage } };
    }

    const leg = await this.runImageLeg(imageBytes);
    if (!leg.ok) {
      return blocked(
        leg,
        { useCase, hasImage },
        leg.reasons.map((r) => `${IMAGE_LEG_REASON_PREFIX}${r}`),
        { ...scores, ...prefixImageScores(leg.scores) },
      );
    }

    Object.assign(scores, prefixImageScores(leg.scores));
    const metadata: GuardrailMetadata = {
      useCase,
      hasImage,
      sanitizedImage: leg.value.sanitizedImage,
    };
    if (leg.value.foodIdentification) {
      metadata.foodIdentification = leg.value.foodIdentification;
    }
    return { status: 'PASS', reasons: [], scores, metadata };
  }

  /** Hygiene first; the classifier only ever sees a sanitized image. */
  private async runImageLeg(imageBytes: Buffer): Promise<StageOutcome<ImageLegValue>> {
    const hygiene = await sanitizeImage(imageBytes, {
      maxImageBytes: this.config.maxImageBytes,
      maxPixels: this.config.maxPixels,
    });
    if (!hygiene.ok) return hygiene;

    const check = await checkFoodImage(hygiene.value, this.imageClassifier, {
      margin: this.config.clipMargin,
      identifyType: true,
    });
    if (!check.ok) return check;

    return {
      ok: true,
      value: { ...check.value, sanitizedImage: hygiene.value },
      scores: check.scores,
    };
  }
}

const IMAGE_SCORE_KEYS: Readonly<Record<string, string>> = {
  [SCORE_KEYS.FOOD_SCORE]: SCORE_KEYS.IMAGE_FOOD_SCORE,
  [SCORE_KEYS.NON_FOOD_SCORE]: SCORE_KEYS.IMAGE_NON_FOOD_SCORE,
  [SCORE_KEYS.IDENTIFIED_FOOD]: SCORE_KEYS.IMAGE_IDENTIFIED_FOOD,
  [SCORE_KEYS.FOOD_TYPE_CONFIDENCE]: SCORE_KEYS.IMAGE_FOOD_TYPE_CONFIDENCE,
};

/** Re-key image-stage scores so they cannot collide with text-stage keys. */
export function prefixImageScores(scores: Scores): Scores {
  const out: Scores = {};
  for (const [key, value] of Object.entries(scores)) {
    out[IMAGE_SCORE_KEYS[key] ?? `image_${key}`] = value;
  }
  return out;
}
