/**
 * Centralized Path Definitions
 *
 * Single source of truth for warden's on-disk locations.
 *
 * ~/.warden/            (or $WARDEN_HOME)
 * ├── warden.db         (SQLite: vector collections, graph, migrations)
 * └── config.toml       (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

/**
 * Get the warden directory path (~/.warden unless WARDEN_HOME is set)
 */
export function getWardenDir(): string {
  return getEnv('WARDEN_HOME') ?? join(homedir(), '.warden');
}

/**
 * Get the default database file path
 */
export function getDbPath(): string {
  return join(getWardenDir(), 'warden.db');
}

/**
 * Get the config file path
 */
export function getConfigPath(): string {
  return join(getWardenDir(), 'config.toml');
}
