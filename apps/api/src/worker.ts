/**
 * FILE PURPOSE: Standalone BullMQ worker that runs the guardrails and the generation call
 *
 * Runs separately from the HTTP server so classifier latency never blocks
 * API requests. Start via `npm run worker`.
 */

import { Worker } from 'bullmq';
import type { RequestStatus } from '@platecheck/shared-types';
import { createCacheStore, createGuardrailEngine, loadGuardrailConfig } from '@platecheck/guardrails';
import { GUARDRAIL_QUEUE, parseRedisConnection, type GuardrailJobData } from './queue.js';
import { createGuardrailProcessor, DEFAULT_JOB_TIMEOUT_MS } from './tasks/process-request.js';
import { drizzleRequestStore } from './repositories/request-store.js';
import { createGeminiGenerator } from './generation/gemini-client.js';
import { closeDatabase } from './db/index.js';
import { initSentry, reportError, flushSentry } from './sentry.js';

const REDIS_URL = process.env.REDIS_URL;

if (!REDIS_URL) {
  process.stderr.write('FATAL: REDIS_URL is required to start the worker\n');
  process.exit(1);
}

initSentry('worker');

const concurrency = Number(process.env.WORKER_CONCURRENCY) || 2;
const timeoutMs = Number(process.env.GUARDRAIL_JOB_TIMEOUT_MS) || DEFAULT_JOB_TIMEOUT_MS;
const config = loadGuardrailConfig();
const cacheStore = createCacheStore();

const processor = createGuardrailProcessor({
  store: drizzleRequestStore,
  engine: createGuardrailEngine({ config, cacheStore }),
  generate: createGeminiGenerator(),
  hygieneLimits: { maxImageBytes: config.maxImageBytes, maxPixels: config.maxPixels },
  timeoutMs,
  reportError,
});

const worker = new Worker<GuardrailJobData, RequestStatus>(GUARDRAIL_QUEUE, processor, {
  connection: parseRedisConnection(REDIS_URL),
  concurrency,
});

worker.on('completed', (job, status) => {
  process.stderr.write(`INFO: Job ${job.id} completed for request ${job.data.requestId} (${status})\n`);
});

worker.on('failed', (job, err) => {
  process.stderr.write(`ERROR: Job ${job?.id} for request ${job?.data.requestId} failed: ${err.message}\n`);
});

worker.on('error', (err) => {
  process.stderr.write(`ERROR: Worker error: ${err.message}\n`);
});

process.stderr.write(`INFO: Guardrail worker started (concurrency=${concurrency}, timeout=${timeoutMs}ms)\n`);

async function shutdown(): Promise<void> {
  process.stderr.write('INFO: Shutting down worker…\n');
  await worker.close();
  await cacheStore.close?.();
  await closeDatabase();
  await flushSentry();
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown();
});
process.on('SIGINT', () => {
  void shutdown();
});
