/**
 * FILE PURPOSE: Database schema for generation_requests
 *
 * One row per POST /api/generate. The worker moves it through
 * QUEUED → PROCESSING → PASS | BLOCK | ERROR and, on PASS, stores the
 * generation output.
 *
 * HOW: Drizzle ORM schema definitions. Run `npm run db:push` to sync to DB.
 */

import { pgTable, uuid, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import { REQUEST_STATUSES, type ScoreValue } from '@platecheck/shared-types';

export const generationRequests = pgTable(
  'generation_requests',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    prompt: text('prompt').notNull(),
    imageHash: text('image_hash'),
    status: text('status', { enum: REQUEST_STATUSES }).default('QUEUED').notNull(),
    reasons: jsonb('reasons').$type<string[]>().default([]).notNull(),
    scores: jsonb('scores').$type<Record<string, ScoreValue>>().default({}).notNull(),
    resultText: text('result_text'),
    // base64
    resultImage: text('result_image'),
  },
  (table) => [
    index('idx_generation_requests_created').on(table.createdAt),
    index('idx_generation_requests_image_hash').on(table.imageHash),
  ],
);

export type GenerationRequestRow = typeof generationRequests.$inferSelect;
export type NewGenerationRequestRow = typeof generationRequests.$inferInsert;
