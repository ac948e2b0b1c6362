/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied in
 * the _migrations table. Safe to run on every startup.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { validateRows } from './validation.js';

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations applied by this run */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// Embedded so the built CLI needs no SQL files beside it
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-vector-entries.sql',
    sql: `
-- Embedded text, one row per chunk or summary, grouped by collection
CREATE TABLE IF NOT EXISTS vector_entries (
  collection TEXT NOT NULL,
  id TEXT NOT NULL,
  content TEXT NOT NULL,
  embedding BLOB NOT NULL,
  dimensions INTEGER NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (collection, id)
);
    `.trim(),
  },
  {
    name: '002-graph.sql',
    sql: `
-- Labeled property graph: nodes keyed by (label, key), typed directed edges
CREATE TABLE IF NOT EXISTS graph_nodes (
  label TEXT NOT NULL,
  key TEXT NOT NULL,
  properties TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (label, key)
);

CREATE TABLE IF NOT EXISTS graph_edges (
  from_label TEXT NOT NULL,
  from_key TEXT NOT NULL,
  type TEXT NOT NULL,
  to_label TEXT NOT NULL,
  to_key TEXT NOT NULL,
  properties TEXT NOT NULL DEFAULT '{}',
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (from_label, from_key, type, to_label, to_key),
  FOREIGN KEY (from_label, from_key) REFERENCES graph_nodes(label, key) ON DELETE CASCADE,
  FOREIGN KEY (to_label, to_key) REFERENCES graph_nodes(label, key) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_graph_edges_to ON graph_edges(to_label, to_key, type);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });
const AppliedMigrationRowSchema = z.object({ name: z.string(), applied_at: z.string() });

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

/**
 * Apply every pending migration, each in its own transaction.
 * A failed migration is reported and later ones still run.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  ensureMigrationsTable(db);

  const appliedNames = new Set(
    validateRows(
      MigrationNameRowSchema,
      db.prepare('SELECT name FROM _migrations').all(),
      '_migrations'
    ).map((row) => row.name)
  );

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  for (const migration of MIGRATIONS) {
    if (appliedNames.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

/**
 * Applied migrations in application order.
 */
export function getAppliedMigrations(
  db: Database.Database
): Array<{ name: string; applied_at: string }> {
  ensureMigrationsTable(db);
  return validateRows(
    AppliedMigrationRowSchema,
    db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all(),
    '_migrations'
  );
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
