/**
 * FILE PURPOSE: HTTP request handler for CORS, health, auth, routing
 *
 * HOW: Native Node.js HTTP, no framework. Dependencies are passed in so
 *      server.ts wires Postgres + BullMQ and tests wire in-memory fakes.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { HealthResponse } from '@platecheck/shared-types';
import { authenticateRequest } from './middleware/auth.js';
import { handleGenerateRoutes, type GenerateRouteDeps } from './routes/generate.js';

export interface ApiDeps extends GenerateRouteDeps {
  pingDatabase: () => Promise<void>;
  startTime?: number;
}

/** Parse allowed origins from env var (comma-separated). */
function getAllowedOrigins(): Set<string> | null {
  const raw = process.env.ALLOWED_ORIGINS;
  if (!raw) return null;
  return new Set(raw.split(',').map((o) => o.trim()).filter(Boolean));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse JSON body from incoming request. Malformed bodies parse as {}. */
export function parseBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString());
        resolve(isRecord(parsed) ? parsed : {});
      } catch {
        resolve({});
      }
    });
    req.on('error', () => resolve({}));
  });
}

export function createApiHandler(deps: ApiDeps): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const startTime = deps.startTime ?? Date.now();

  return async (req, res) => {
    res.setHeader('Content-Type', 'application/json');

    // ─── CORS with origin restriction ───
    const allowedOrigins = getAllowedOrigins();
    const requestOrigin = req.headers.origin;

    if (allowedOrigins && requestOrigin) {
      if (allowedOrigins.has(requestOrigin)) {
        res.setHeader('Access-Control-Allow-Origin', requestOrigin);
      }
    } else {
      res.setHeader('Access-Control-Allow-Origin', '*');
    }

    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, x-api-key');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');

    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }

    const url = req.url ?? '';

    // ─── Health check (before auth, used by load balancers) ───
    if (url === '/api/health') {
      let database: HealthResponse['services']['database'] = 'unreachable';
      try {
        await deps.pingDatabase();
        database = 'ok';
      } catch (err) {
        process.stderr.write(`WARN: Health check database ping failed: ${err instanceof Error ? err.message : String(err)}\n`);
      }

      const body: HealthResponse = {
        status: database === 'ok' ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        uptimeSeconds: Math.floor((Date.now() - startTime) / 1000),
        services: { database },
      };
      res.statusCode = database === 'ok' ? 200 : 503;
      res.end(JSON.stringify(body));
      return;
    }

    if (!authenticateRequest(req, res, url)) return;

    if (url.startsWith('/api/generate') || url.startsWith('/api/status/')) {
      await handleGenerateRoutes(req, res, url, parseBody, deps);
      return;
    }

    res.statusCode = 404;
    res.end(JSON.stringify({ error: 'Not found' }));
  };
}
