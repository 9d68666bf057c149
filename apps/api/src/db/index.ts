/**
 * FILE PURPOSE: Barrel export for database layer
 */

export { db, pingDatabase, closeDatabase } from './connection.js';
export type { Database } from './connection.js';
export { generationRequests } from './schema.js';
export type { GenerationRequestRow, NewGenerationRequestRow } from './schema.js';
