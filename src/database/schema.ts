/**
 * Database Schema Types
 *
 * Shared column types and the BLOB codec for embeddings. Row shapes are
 * the Zod schemas in validation.ts.
 */

import { randomUUID } from 'node:crypto';

/** Scalar metadata attached to a vector entry, filterable by equality */
export type MetadataValue = string | number | boolean;
export type Metadata = Record<string, MetadataValue>;

/**
 * Generate a new UUID v4.
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Convert an embedding to a Buffer for BLOB storage.
 */
export function embeddingToBlob(embedding: Float32Array | readonly number[]): Buffer {
  const floats = embedding instanceof Float32Array ? embedding : Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Convert a BLOB back to a Float32Array.
 *
 * Copies the bytes first: SQLite buffers are not guaranteed to be
 * 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const bytes = Uint8Array.from(blob);
  return new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4));
}
