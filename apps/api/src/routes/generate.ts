/**
 * FILE PURPOSE: Generation request routes: submit and poll
 *
 * Routes:
 *   POST /api/generate      {prompt, image?: base64} → 201 record (QUEUED, or BLOCK on size pre-check)
 *   GET  /api/status/:id    record by id
 *
 * HOW: The record is written before the job is queued, so a client can poll
 *      immediately. Oversized images never reach the queue.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import { computeImageHash } from '@platecheck/guardrails';
import type { GenerateRequestBody } from '@platecheck/shared-types';
import type { RequestStore } from '../repositories/request-store.js';
import type { Enqueue } from '../queue.js';

export type BodyParser = (req: IncomingMessage) => Promise<Record<string, unknown>>;

export const IMAGE_PRECHECK_REASON = 'Image too large (pre-check)';

export interface GenerateRouteDeps {
  store: RequestStore;
  enqueue: Enqueue;
  maxImageBytes: number;
}

const generateBodySchema = z.object({
  prompt: z.string({ required_error: 'Prompt is required' }).trim().min(1, 'Prompt is required'),
  image: z.string().base64('image must be base64-encoded').optional(),
});

const requestIdSchema = z.string().uuid();

const STATUS_PATH = /^\/api\/status\/([^/]+)$/;

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.statusCode = statusCode;
  res.end(JSON.stringify(body));
}

async function createRequest(
  req: IncomingMessage,
  res: ServerResponse,
  parseBody: BodyParser,
  deps: GenerateRouteDeps,
): Promise<void> {
  const parsed = generateBodySchema.safeParse(await parseBody(req));
  if (!parsed.success) {
    sendJson(res, 400, { error: parsed.error.issues[0]?.message ?? 'Invalid request body' });
    return;
  }

  const body: GenerateRequestBody = parsed.data;
  const { prompt } = body;
  const imageBytes = body.image === undefined ? null : Buffer.from(body.image, 'base64');
  const imageHash = computeImageHash(imageBytes);

  if (imageBytes !== null && imageBytes.length > deps.maxImageBytes) {
    const blocked = await deps.store.create({
      prompt,
      imageHash,
      status: 'BLOCK',
      reasons: [IMAGE_PRECHECK_REASON],
    });
    process.stderr.write(`INFO: Request ${blocked.id} blocked on image size (${imageBytes.length} bytes)\n`);
    sendJson(res, 201, blocked);
    return;
  }

  const record = await deps.store.create({ prompt, imageHash });
  try {
    await deps.enqueue({ requestId: record.id, prompt, image: body.image ?? null });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`ERROR: Failed to enqueue request ${record.id}: ${message}\n`);
    await deps.store.update(record.id, { status: 'ERROR', reasons: [`Failed to enqueue: ${message}`] });
    sendJson(res, 503, { error: 'Queue unavailable', id: record.id });
    return;
  }

  sendJson(res, 201, record);
}

export async function handleGenerateRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  parseBody: BodyParser,
  deps: GenerateRouteDeps,
): Promise<void> {
  try {
    const { pathname } = new URL(url, 'http://localhost');

    if (pathname === '/api/generate' && req.method === 'POST') {
      await createRequest(req, res, parseBody, deps);
      return;
    }

    const statusMatch = STATUS_PATH.exec(pathname);
    if (statusMatch && req.method === 'GET') {
      const id = decodeURIComponent(statusMatch[1] ?? '');
      if (!requestIdSchema.safeParse(id).success) {
        sendJson(res, 400, { error: 'Invalid request id' });
        return;
      }
      const record = await deps.store.findById(id);
      if (!record) {
        sendJson(res, 404, { error: 'Request not found' });
        return;
      }
      sendJson(res, 200, record);
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  } catch (err) {
    process.stderr.write(`ERROR in generate routes: ${err}\n`);
    if (!res.writableEnded) {
      sendJson(res, 500, { error: 'Internal server error' });
    }
  }
}
