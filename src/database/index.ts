/**
 * Database Module
 *
 * SQLite storage shared by the vector store and the graph store.
 *
 * @example
 * ```ts
 * import { openDatabase, runMigrations } from './database/index.js';
 *
 * const db = openDatabase(getDbPath());
 * runMigrations(db);
 * ```
 */

export { openDatabase, IN_MEMORY } from './connection.js';

export {
  runMigrations,
  getAppliedMigrations,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

export type { Metadata, MetadataValue } from './schema.js';
export { generateId, embeddingToBlob, blobToEmbedding } from './schema.js';

export {
  MetadataSchema,
  PropertiesSchema,
  VectorEntryRowSchema,
  GraphNodeRowSchema,
  GraphEdgeRowSchema,
  type VectorEntryRow,
  type GraphNodeRow,
  type GraphEdgeRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
