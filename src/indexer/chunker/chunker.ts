/**
 * Document Chunker
 *
 * Splits a document into `ChunkDraft`s carrying the caller's metadata plus
 * their position.
 */

import type { Metadata } from '../../database/schema.js';
import { RecursiveTextSplitter } from './splitter.js';
import type { ChunkDraft, ChunkSettings } from './types.js';

export function chunkId(docId: string, index: number): string {
  return `${docId}_${index}`;
}

/**
 * @example
 * ```ts
 * const chunks = chunkDocument('prd-7', text, chunkSettingsForProfile(profile), {
 *   project_id: 'checkout',
 *   doc_type: 'prd',
 * });
 * // chunks[0].id === 'prd-7_0', chunks[0].metadata.chunk_index === 0
 * ```
 */
export function chunkDocument(
  docId: string,
  text: string,
  settings: ChunkSettings,
  baseMetadata: Metadata = {}
): ChunkDraft[] {
  const pieces = new RecursiveTextSplitter(settings).splitText(text);

  return pieces.map((piece, index) => ({
    id: chunkId(docId, index),
    sourceDocId: docId,
    index,
    text: piece,
    metadata: { ...baseMetadata, doc_id: docId, chunk_index: index },
  }));
}
