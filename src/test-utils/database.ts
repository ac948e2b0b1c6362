import type Database from 'better-sqlite3';
import { IN_MEMORY, openDatabase } from '../database/connection.js';
import { runMigrations } from '../database/migrate.js';

/**
 * In-memory database with every migration applied.
 */
export function openTestDatabase(): Database.Database {
  const db = openDatabase(IN_MEMORY);
  const result = runMigrations(db);
  if (result.failed.length > 0) {
    throw new Error(`Test migrations failed: ${result.failed.map((f) => f.name).join(', ')}`);
  }
  return db;
}
