/**
 * Main export for @renewly/database
 */

export { createDatabase } from './db';
export type { Database, DatabaseHandle } from './db';
export * from './schema';
export * from './billing';
export { createDrizzleStores } from './stores';
