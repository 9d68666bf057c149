/**
 * FILE PURPOSE: Drizzle Kit configuration for database migrations
 *
 * HOW: Points Drizzle Kit at our schema and DATABASE_URL for generate/migrate/push.
 */

import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/db/schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  tablesFilter: ['generation_requests'],
  strict: true,
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
});
