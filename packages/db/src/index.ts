/**
 * @tessera/db - drizzle schema, PostgreSQL client and query functions
 */

export { getDb, closeDb, DEFAULT_DATABASE_URL, type Db } from './client';
export * from './schema';
export * from './products';
export * from './crawl-runs';
export * from './stores';
export { isDatabaseConnectionError, DATABASE_ERROR_MESSAGE } from './db-error';
