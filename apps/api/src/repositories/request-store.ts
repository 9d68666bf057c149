/**
 * FILE PURPOSE: Persistence for generation requests
 *
 * WHY: Routes and the worker depend on the RequestStore interface, so they can
 *      run against an in-memory store in tests and Postgres in production.
 * HOW: drizzleRequestStore maps generation_requests rows to the wire record
 *      (snake_case keys, ISO timestamps).
 */

import { eq } from 'drizzle-orm';
import type { GenerationRequestRecord, RequestStatus, ScoreValue } from '@platecheck/shared-types';
import { db, generationRequests } from '../db/index.js';
import type { GenerationRequestRow } from '../db/index.js';

export interface NewGenerationRequest {
  prompt: string;
  imageHash: string | null;
  status?: RequestStatus;
  reasons?: string[];
}

export interface GenerationRequestPatch {
  status?: RequestStatus;
  reasons?: string[];
  scores?: Record<string, ScoreValue>;
  resultText?: string | null;
  resultImage?: string | null;
}

export interface RequestStore {
  create(input: NewGenerationRequest): Promise<GenerationRequestRecord>;
  findById(id: string): Promise<GenerationRequestRecord | null>;
  /** Resolves false when no row has that id. */
  update(id: string, patch: GenerationRequestPatch): Promise<boolean>;
}

export function toRecord(row: GenerationRequestRow): GenerationRequestRecord {
  return {
    id: row.id,
    created_at: row.createdAt.toISOString(),
    prompt: row.prompt,
    image_hash: row.imageHash,
    status: row.status,
    reasons: row.reasons,
    scores: row.scores,
    result_text: row.resultText,
    result_image: row.resultImage,
  };
}

export const drizzleRequestStore: RequestStore = {
  async create(input) {
    const [created] = await db
      .insert(generationRequests)
      .values({
        prompt: input.prompt,
        imageHash: input.imageHash,
        status: input.status ?? 'QUEUED',
        reasons: input.reasons ?? [],
      })
      .returning();
    if (!created) throw new Error('Insert into generation_requests returned no row');
    return toRecord(created);
  },

  async findById(id) {
    const [row] = await db
      .select()
      .from(generationRequests)
      .where(eq(generationRequests.id, id))
      .limit(1);
    return row ? toRecord(row) : null;
  },

  async update(id, patch) {
    const updated = await db
      .update(generationRequests)
      .set(patch)
      .where(eq(generationRequests.id, id))
      .returning({ id: generationRequests.id });
    if (updated.length === 0) {
      process.stderr.write(`WARN: Update matched 0 rows for request ${id}\n`);
      return false;
    }
    return true;
  },
};
