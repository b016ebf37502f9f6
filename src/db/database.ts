/**
 * Database Module
 * Opens the configured backend and makes sure the schema exists.
 */

import type { AppConfig } from '../config/env.js';
import { createSqliteClient, openDatabase, type DbClient } from './db-adapter.js';
import { sqliteSchema } from './schema-sqlite.js';

export type { DbClient, DbExecutor, Row, SqlParam } from './db-adapter.js';

/**
 * Initialize the database with schema
 */
export async function initializeDb(config: Pick<AppConfig, 'databasePath' | 'turso'>): Promise<DbClient> {
  const db = await openDatabase(config);
  try {
    await db.executeRaw(sqliteSchema);
  } catch (error) {
    console.error('Schema initialization failed:', error);
    await db.close();
    throw error;
  }
  return db;
}

/** Fresh in-memory SQLite database with the schema applied. */
export async function createMemoryDb(): Promise<DbClient> {
  const db = await createSqliteClient();
  await db.executeRaw(sqliteSchema);
  return db;
}
