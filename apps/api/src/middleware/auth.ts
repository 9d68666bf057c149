/**
 * FILE PURPOSE: API key authentication
 *
 * HOW: x-api-key must be one of API_KEYS (comma-separated). /api/health is
 *      public. Fail-open when API_KEYS is not configured (dev mode).
 */

import type { IncomingMessage, ServerResponse } from 'node:http';

const PUBLIC_PATHS = new Set(['/api/health']);

let cachedApiKeys: Set<string> | null = null;

function getValidApiKeys(): Set<string> {
  if (cachedApiKeys) return cachedApiKeys;
  const raw = process.env.API_KEYS ?? '';
  cachedApiKeys = new Set(
    raw.split(',').map((k) => k.trim()).filter(Boolean),
  );
  return cachedApiKeys;
}

/** For testing: clear the cached API keys so env changes take effect. */
export function clearApiKeyCache(): void {
  cachedApiKeys = null;
}

export function isPublicPath(url: string): boolean {
  const path = url.split('?')[0] ?? url;
  return PUBLIC_PATHS.has(path);
}

/**
 * Authenticate the request. Returns true on success, false on failure
 * (401 response already sent).
 */
export function authenticateRequest(req: IncomingMessage, res: ServerResponse, url: string): boolean {
  if (isPublicPath(url)) return true;

  const keys = getValidApiKeys();
  if (keys.size === 0) return true;

  const apiKey = req.headers['x-api-key'];
  if (typeof apiKey !== 'string' || apiKey.length === 0) {
    res.statusCode = 401;
    res.end(JSON.stringify({ error: 'Authentication required: provide x-api-key header' }));
    return false;
  }

  if (!keys.has(apiKey)) {
    res.statusCode = 401;
    res.end(JSON.stringify({ error: 'Authentication failed: invalid API key' }));
    return false;
  }

  return true;
}
