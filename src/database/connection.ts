/**
 * Database Connection Module
 *
 * Opens a better-sqlite3 connection with the pragmas every caller needs.
 * There is no module-level singleton: the app context opens one connection
 * and owns its lifetime.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError } from '../errors/index.js';

export const IN_MEMORY = ':memory:';

/**
 * Open (creating if needed) the SQLite database at `path`.
 *
 * @example
 * ```ts
 * const db = openDatabase(getDbPath());
 * runMigrations(db);
 * ```
 */
export function openDatabase(path: string): Database.Database {
  try {
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }

    const db = new Database(path);

    // Enable foreign keys (OFF by default in SQLite!)
    db.pragma('foreign_keys = ON');

    if (path !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }

    return db;
  } catch (error) {
    throw new DatabaseError(
      `Could not open database at ${path}`,
      error instanceof Error ? error : undefined
    );
  }
}
