/**
 * Embedder Module
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingClientForProfile, embedTexts } from './embedder/index.js';
 *
 * const client = createEmbeddingClientForProfile(config.embedding, profile);
 * const vectors = await embedTexts(chunks.map((c) => c.text), client, {
 *   timeoutMs: config.embedding.timeout_ms,
 * });
 * ```
 */

export {
  embedTexts,
  embedText,
  EmbeddingError,
  EmbeddingTimeoutError,
  type EmbedOptions,
} from './embedder.js';

export {
  resolveEmbeddingModel,
  createEmbeddingClientForProfile,
  type EmbeddingClientOptions,
} from './provider.js';
