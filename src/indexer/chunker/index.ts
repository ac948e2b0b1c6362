/**
 * Chunker Module
 *
 * Usage:
 * ```typescript
 * import { chunkDocument, chunkSettingsForProfile } from './chunker/index.js';
 *
 * const chunks = chunkDocument(docId, content, chunkSettingsForProfile(profile));
 * // chunks ready for embedding
 * ```
 */

export { chunkDocument, chunkId } from './chunker.js';
export { RecursiveTextSplitter, DEFAULT_SEPARATORS } from './splitter.js';
export {
  chunkSettingsForProfile,
  CHUNK_CHARS_PER_TOKEN,
  MIN_CHUNK_OVERLAP,
} from './config.js';
export type { ChunkDraft, ChunkSettings } from './types.js';
