/**
 * FILE PURPOSE: Wire types shared by the API and its clients
 *
 * WHY: The status endpoint, the worker and any client read the same record
 *      shape. Field names match the JSON the API returns.
 */

export const REQUEST_STATUSES = ['QUEUED', 'PROCESSING', 'PASS', 'BLOCK', 'ERROR'] as const;

/** Lifecycle of a generation request. PASS/BLOCK are the guardrail decision; ERROR is an unexpected failure. */
export type RequestStatus = (typeof REQUEST_STATUSES)[number];

/** Values a guardrail stage may record under a score key. */
export type ScoreValue = number | string | string[];

/** A generation request as returned by GET /api/status/:id. Maps to generation_requests. */
export interface GenerationRequestRecord {
  id: string;
  created_at: string;
  prompt: string;
  /** sha256 hex of the uploaded image, null without one. */
  image_hash: string | null;
  status: RequestStatus;
  reasons: string[];
  scores: Record<string, ScoreValue>;
  result_text: string | null;
  /** Base64 image from the generation service. */
  result_image: string | null;
}

/** Body of POST /api/generate. */
export interface GenerateRequestBody {
  prompt: string;
  /** Base64-encoded image bytes. */
  image?: string;
}

export interface HealthResponse {
  status: 'ok' | 'degraded';
  timestamp: string;
  uptimeSeconds: number;
  services: {
    database: 'ok' | 'unreachable';
  };
}
