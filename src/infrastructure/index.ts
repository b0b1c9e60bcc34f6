// PostgreSQL pool singleton
export { createDatabase, resetDatabaseSingleton } from './database.js';
export type { Database, DatabaseOptions, Queryable } from './database.js';
