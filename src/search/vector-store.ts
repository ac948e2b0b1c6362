/**
 * Vector Store Adapter
 *
 * `VectorStore` is the contract the retriever and the ingest pipeline
 * depend on. `SqliteVectorStore` keeps each named collection in the
 * `vector_entries` table and ranks by cosine distance in process.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { blobToEmbedding, embeddingToBlob, type Metadata } from '../database/schema.js';
import { VectorEntryRowSchema, validateRow, validateRows } from '../database/validation.js';
import { compileMetadataFilter, type MetadataFilter } from './filters.js';

/** Collection holding document chunks */
export const DOCUMENTS_COLLECTION = 'documents';

/** Collection holding one repository map per repo key */
export const REPO_SUMMARIES_COLLECTION = 'repo_summaries';

export interface VectorEntry {
  id: string;
  content: string;
  embedding: readonly number[] | Float32Array;
  metadata: Metadata;
}

export interface StoredVectorEntry {
  id: string;
  content: string;
  embedding: Float32Array;
  metadata: Metadata;
}

export interface VectorMatch {
  id: string;
  content: string;
  metadata: Metadata;
  /** Cosine distance: 0 is identical, 2 is opposite */
  distance: number;
}

export interface VectorStore {
  readonly collection: string;
  /** Insert or replace entries by id */
  add(entries: VectorEntry[]): Promise<void>;
  /** Up to `k` entries nearest to `vector`, closest first */
  query(vector: readonly number[], k: number, filter?: MetadataFilter): Promise<VectorMatch[]>;
  get(id: string): Promise<StoredVectorEntry | null>;
  count(filter?: MetadataFilter): Promise<number>;
  /** Delete matching entries and return how many were removed */
  deleteWhere(filter: MetadataFilter): Promise<number>;
}

/**
 * Cosine distance between two equal-length vectors. A zero vector is at
 * distance 1 from everything.
 */
export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 1;
  }
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

export class SqliteVectorStore implements VectorStore {
  constructor(
    private readonly db: Database.Database,
    readonly collection: string
  ) {}

  async add(entries: VectorEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    const upsert = this.db.prepare(`
      INSERT INTO vector_entries (collection, id, content, embedding, dimensions, metadata, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, datetime('now'))
      ON CONFLICT (collection, id) DO UPDATE SET
        content = excluded.content,
        embedding = excluded.embedding,
        dimensions = excluded.dimensions,
        metadata = excluded.metadata,
        updated_at = excluded.updated_at
    `);

    this.db.transaction(() => {
      for (const entry of entries) {
        if (entry.embedding.length === 0) {
          throw new ValidationError(`Empty embedding for vector entry '${entry.id}'`);
        }
        upsert.run(
          this.collection,
          entry.id,
          entry.content,
          embeddingToBlob(entry.embedding),
          entry.embedding.length,
          JSON.stringify(entry.metadata)
        );
      }
    })();
  }

  async query(
    vector: readonly number[],
    k: number,
    filter?: MetadataFilter
  ): Promise<VectorMatch[]> {
    if (k <= 0) {
      return [];
    }

    const where = compileMetadataFilter(filter);
    const rows = validateRows(
      VectorEntryRowSchema,
      this.db
        .prepare(
          `SELECT * FROM vector_entries WHERE collection = ?${where.sql ? ` AND ${where.sql}` : ''}`
        )
        .all(this.collection, ...where.params),
      `vector_entries.${this.collection}`
    );

    const scored: VectorMatch[] = rows.map((row) => {
      if (row.dimensions !== vector.length) {
        throw new ValidationError(
          `Query vector has ${vector.length} dimensions; collection '${this.collection}' stores ${row.dimensions}`
        );
      }
      return {
        id: row.id,
        content: row.content,
        metadata: row.metadata,
        distance: cosineDistance(vector, blobToEmbedding(row.embedding)),
      };
    });

    // Ties keep id order so results are deterministic
    scored.sort((a, b) => a.distance - b.distance || a.id.localeCompare(b.id));
    return scored.slice(0, k);
  }

  async get(id: string): Promise<StoredVectorEntry | null> {
    const row = this.db
      .prepare('SELECT * FROM vector_entries WHERE collection = ? AND id = ?')
      .get(this.collection, id);
    if (row === undefined) {
      return null;
    }

    const entry = validateRow(VectorEntryRowSchema, row, `vector_entries.${this.collection}=${id}`);
    return {
      id: entry.id,
      content: entry.content,
      embedding: blobToEmbedding(entry.embedding),
      metadata: entry.metadata,
    };
  }

  async count(filter?: MetadataFilter): Promise<number> {
    const where = compileMetadataFilter(filter);
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS count FROM vector_entries WHERE collection = ?${where.sql ? ` AND ${where.sql}` : ''}`
      )
      .get(this.collection, ...where.params);
    return validateRow(CountRowSchema, row, `vector_entries.${this.collection}`).count;
  }

  async deleteWhere(filter: MetadataFilter): Promise<number> {
    const where = compileMetadataFilter(filter);
    if (!where.sql) {
      throw new ValidationError('Refusing to delete a whole collection with an empty filter');
    }
    const result = this.db
      .prepare(`DELETE FROM vector_entries WHERE collection = ? AND ${where.sql}`)
      .run(this.collection, ...where.params);
    return result.changes;
  }
}
