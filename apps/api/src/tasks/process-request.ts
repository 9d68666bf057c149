/**
 * FILE PURPOSE: Worker task: run the guardrails for one request, then generate on PASS
 *
 * HOW: PROCESSING → engine.process → save decision → (PASS) generateContent → save result.
 *      IMAGE_LED requests send the canonical template prompt downstream.
 *      The generation call gets the sanitized image; a cache hit carries
 *      none, so the uploaded bytes are sanitized again.
 *      Any exception, including the job deadline, marks the request ERROR
 *      with the message as its only reason.
 */

import type { Job } from 'bullmq';
import type { RequestStatus } from '@platecheck/shared-types';
import {
  IMAGE_LED_GENERATION_PROMPT,
  sanitizeImage,
  type GuardrailEngine,
  type GuardrailResult,
  type HygieneLimits,
  type SanitizedImage,
} from '@platecheck/guardrails';
import type { RequestStore } from '../repositories/request-store.js';
import type { GenerateContentFn } from '../generation/gemini-client.js';
import type { GuardrailJobData } from '../queue.js';

export const DEFAULT_JOB_TIMEOUT_MS = 120_000;

export interface ProcessRequestDeps {
  store: RequestStore;
  engine: Pick<GuardrailEngine, 'process'>;
  generate: GenerateContentFn;
  hygieneLimits: HygieneLimits;
  timeoutMs?: number;
  reportError?: (err: unknown, context: Record<string, string>) => void;
}

export class JobTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Guardrail job timed out after ${timeoutMs}ms`);
    this.name = 'JobTimeoutError';
  }
}

/**
 * Race `fn` against a deadline. The signal aborts at the deadline so `fn`
 * can stop before writing anything further.
 */
async function withDeadline<T>(timeoutMs: number, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new JobTimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

async function imageForGeneration(
  result: GuardrailResult,
  imageBytes: Buffer | null,
  limits: HygieneLimits,
): Promise<SanitizedImage | null> {
  if (result.metadata.sanitizedImage) return result.metadata.sanitizedImage;
  if (imageBytes === null) return null;

  const hygiene = await sanitizeImage(imageBytes, limits);
  if (!hygiene.ok) {
    throw new Error(`Approved image failed re-sanitization: ${hygiene.reasons.join('; ')}`);
  }
  return hygiene.value;
}

export async function processGenerationRequest(
  data: GuardrailJobData,
  deps: ProcessRequestDeps,
): Promise<RequestStatus> {
  const { store } = deps;
  const timeoutMs = deps.timeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;

  try {
    return await withDeadline(timeoutMs, async (signal) => {
      await store.update(data.requestId, { status: 'PROCESSING' });

      const imageBytes = data.image === null ? null : Buffer.from(data.image, 'base64');
      const result = await deps.engine.process(data.prompt, imageBytes);
      signal.throwIfAborted();

      await store.update(data.requestId, {
        status: result.status,
        reasons: result.reasons,
        scores: result.scores,
      });
      process.stderr.write(`INFO: Request ${data.requestId} → ${result.status}\n`);
      if (result.status !== 'PASS') return result.status;

      const prompt = result.metadata.useCase === 'IMAGE_LED' ? IMAGE_LED_GENERATION_PROMPT : data.prompt;
      const image = await imageForGeneration(result, imageBytes, deps.hygieneLimits);
      const generated = await deps.generate(prompt, image);
      signal.throwIfAborted();

      await store.update(data.requestId, {
        resultText: generated.text,
        resultImage: generated.image,
      });
      return result.status;
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`ERROR: Request ${data.requestId} failed: ${message}\n`);
    deps.reportError?.(err, { requestId: data.requestId });
    await store.update(data.requestId, { status: 'ERROR', reasons: [message] });
    return 'ERROR';
  }
}

/** BullMQ processor bound to a set of dependencies. */
export function createGuardrailProcessor(deps: ProcessRequestDeps): (job: Job<GuardrailJobData>) => Promise<RequestStatus> {
  return (job) => processGenerationRequest(job.data, deps);
}
