/**
 * Shared test helpers for API tests: mock req/res and an in-memory RequestStore.
 */

import { randomUUID } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { GenerationRequestRecord } from '@platecheck/shared-types';
import type {
  GenerationRequestPatch,
  NewGenerationRequest,
  RequestStore,
} from '../src/repositories/request-store.js';

export function createMockReq(method: string, url = '', headers: Record<string, string> = {}): IncomingMessage {
  return { method, url, headers } as unknown as IncomingMessage;
}

export function createMockRes(): ServerResponse & { _body: string; _statusCode: number } {
  const res = {
    statusCode: 200,
    writableEnded: false,
    _body: '',
    _statusCode: 200,
    end(this: { statusCode: number; writableEnded: boolean; _body: string; _statusCode: number }, body?: string) {
      this._body = body ?? '';
      this._statusCode = this.statusCode;
      this.writableEnded = true;
    },
  } as unknown as ServerResponse & { _body: string; _statusCode: number };
  return res;
}

export class InMemoryRequestStore implements RequestStore {
  readonly records = new Map<string, GenerationRequestRecord>();
  /** Every patch applied, in order. */
  readonly updates: Array<{ id: string; patch: GenerationRequestPatch }> = [];

  async create(input: NewGenerationRequest): Promise<GenerationRequestRecord> {
    const record: GenerationRequestRecord = {
      id: randomUUID(),
      created_at: '2026-01-01T00:00:00.000Z',
      prompt: input.prompt,
      image_hash: input.imageHash,
      status: input.status ?? 'QUEUED',
      reasons: input.reasons ?? [],
      scores: {},
      result_text: null,
      result_image: null,
    };
    this.records.set(record.id, record);
    return { ...record };
  }

  async findById(id: string): Promise<GenerationRequestRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async update(id: string, patch: GenerationRequestPatch): Promise<boolean> {
    this.updates.push({ id, patch });
    const record = this.records.get(id);
    if (!record) return false;
    if (patch.status !== undefined) record.status = patch.status;
    if (patch.reasons !== undefined) record.reasons = patch.reasons;
    if (patch.scores !== undefined) record.scores = patch.scores;
    if (patch.resultText !== undefined) record.result_text = patch.resultText;
    if (patch.resultImage !== undefined) record.result_image = patch.resultImage;
    return true;
  }
}
