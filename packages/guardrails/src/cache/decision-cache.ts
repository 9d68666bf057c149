/**
 * FILE PURPOSE: Memoize guardrail decisions by request fingerprint
 *
 * WHY: Identical (prompt, image) pairs get identical decisions; re-running
 *      the classifiers for them is wasted work.
 * HOW: Only {status, reasons, scores} are serialized; metadata (decoded
 *      image, identification detail) never reaches the store. Read errors and
 *      malformed entries count as misses; write errors are logged.
 */

import { z } from 'zod';
import type { CacheStore, CachedDecision, GuardrailResult } from '../types.js';
import { DEFAULT_CACHE_TTL_SECONDS } from '../config.js';

export const CACHE_KEY_PREFIX = 'guardrail:';

const scoreValueSchema = z.union([z.number(), z.string(), z.array(z.string())]);

const cachedDecisionSchema = z.object({
  status: z.enum(['PASS', 'BLOCK']),
  reasons: z.array(z.string()),
  scores: z.record(scoreValueSchema),
});

export function cacheKey(fingerprint: string): string {
  return `${CACHE_KEY_PREFIX}${fingerprint}`;
}

/** The subset of a result that is safe to persist. */
export function toCachedDecision(result: GuardrailResult): CachedDecision {
  return {
    status: result.status,
    reasons: [...result.reasons],
    scores: { ...result.scores },
  };
}

export class DecisionCache {
  constructor(
    private readonly backend: CacheStore,
    private readonly defaultTtlSeconds: number = DEFAULT_CACHE_TTL_SECONDS,
  ) {}

  async lookup(fingerprint: string): Promise<GuardrailResult | null> {
    let raw: string | null;
    try {
      raw = await this.backend.get(cacheKey(fingerprint));
    } catch (err) {
      process.stderr.write(`WARN: Decision cache read failed, treating as miss: ${err instanceof Error ? err.message : String(err)}\n`);
      return null;
    }
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      process.stderr.write(`WARN: Decision cache entry for ${fingerprint} is not JSON, ignoring\n`);
      return null;
    }

    const parsed = cachedDecisionSchema.safeParse(json);
    if (!parsed.success) {
      process.stderr.write(`WARN: Decision cache entry for ${fingerprint} has an unexpected shape, ignoring\n`);
      return null;
    }

    return { ...parsed.data, metadata: { cacheHit: true } };
  }

  async store(fingerprint: string, result: GuardrailResult, ttlSeconds?: number): Promise<void> {
    const payload = JSON.stringify(toCachedDecision(result));
    try {
      await this.backend.set(cacheKey(fingerprint), payload, ttlSeconds ?? this.defaultTtlSeconds);
    } catch (err) {
      process.stderr.write(`WARN: Decision cache write failed: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  }
}
