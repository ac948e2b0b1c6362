/**
 * Chunker Types
 */

import type { Metadata } from '../../database/schema.js';

/**
 * Character limits for one splitting pass.
 */
export interface ChunkSettings {
  /** Maximum chunk length in characters */
  size: number;
  /** Characters of trailing context carried into the next chunk */
  overlap: number;
}

/**
 * A chunk ready for embedding. `id` is `"{sourceDocId}_{index}"`, so
 * re-indexing a document overwrites its chunks in place.
 */
export interface ChunkDraft {
  id: string;
  sourceDocId: string;
  /** Position within the document (0-indexed) */
  index: number;
  text: string;
  metadata: Metadata;
}
