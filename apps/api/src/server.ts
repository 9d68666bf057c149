/**
 * FILE PURPOSE: Production API server entry point
 *
 * HOW: Wires Postgres (drizzle) and the BullMQ queue into createApiHandler.
 *      Graceful shutdown closes the server, the queue and the DB pool in order.
 */

import { createServer } from 'node:http';
import { loadGuardrailConfig } from '@platecheck/guardrails';
import { createApiHandler } from './app.js';
import { drizzleRequestStore } from './repositories/request-store.js';
import { createEnqueuer, createGuardrailQueue } from './queue.js';
import { pingDatabase, closeDatabase } from './db/index.js';
import { initSentry, flushSentry } from './sentry.js';

initSentry('api');

const PORT = parseInt(process.env.PORT ?? '3002', 10);
const guardrailConfig = loadGuardrailConfig();
const queue = createGuardrailQueue();

const server = createServer(
  createApiHandler({
    store: drizzleRequestStore,
    enqueue: createEnqueuer(queue),
    maxImageBytes: guardrailConfig.maxImageBytes,
    pingDatabase,
  }),
);

server.listen(PORT, () => {
  process.stdout.write(`API server running on port ${PORT}\n`);
});

async function shutdown(signal: string): Promise<void> {
  process.stdout.write(`${signal} received, shutting down gracefully\n`);

  const forceExitTimer = setTimeout(() => {
    process.stderr.write('WARN: Graceful shutdown timed out after 30s, forcing exit\n');
    process.exit(1);
  }, 30_000);
  forceExitTimer.unref();

  try {
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    process.stdout.write('  Server closed\n');

    await queue.close();
    process.stdout.write('  Queue closed\n');

    await closeDatabase();
    process.stdout.write('  Database disconnected\n');

    await flushSentry();
    process.stdout.write('Shutdown complete\n');
  } catch (err) {
    process.stderr.write(`ERROR during shutdown: ${err}\n`);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
