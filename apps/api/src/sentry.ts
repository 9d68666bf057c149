/**
 * FILE PURPOSE: Sentry setup shared by the HTTP server and the worker
 *
 * No-op when SENTRY_DSN is not set.
 */

import * as Sentry from '@sentry/node';

export function initSentry(service: 'api' | 'worker'): boolean {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) return false;
  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 0.2,
    sendDefaultPii: false,
    initialScope: { tags: { service } },
  });
  return true;
}

export function reportError(err: unknown, context: Record<string, string> = {}): void {
  Sentry.captureException(err, { tags: context });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  await Sentry.flush(timeoutMs);
}
