/**
 * FILE PURPOSE: BullMQ queue for guardrail jobs
 *
 * One job per generation request. attempts = 1: a failed run is recorded as
 * ERROR on the request, never retried. The image travels in the job as base64.
 */

import { Queue } from 'bullmq';

export const GUARDRAIL_QUEUE = 'guardrail-requests';
export const GUARDRAIL_JOB_NAME = 'process-request';

export interface GuardrailJobData {
  requestId: string;
  prompt: string;
  /** Base64 image bytes, null when the request had none. */
  image: string | null;
}

export interface RedisConnectionOptions {
  host: string;
  port: number;
  password: string | undefined;
  tls: Record<string, never> | undefined;
}

export function parseRedisConnection(redisUrl?: string): RedisConnectionOptions {
  const url = redisUrl || process.env.REDIS_URL || 'redis://localhost:6379';
  const parsed = new URL(url);

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
  };
}

export function createGuardrailQueue(redisUrl?: string): Queue<GuardrailJobData> {
  return new Queue<GuardrailJobData>(GUARDRAIL_QUEUE, {
    connection: parseRedisConnection(redisUrl),
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });
}

export type Enqueue = (data: GuardrailJobData) => Promise<void>;

/** Job id = request id, so a double submit of the same record is a no-op in BullMQ. */
export function createEnqueuer(queue: Pick<Queue<GuardrailJobData>, 'add'>): Enqueue {
  return async (data) => {
    await queue.add(GUARDRAIL_JOB_NAME, data, { jobId: data.requestId });
  };
}
