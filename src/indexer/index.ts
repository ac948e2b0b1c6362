/**
 * Indexer Module
 *
 * Turns documents into stored chunks and graph entities.
 *
 * @example
 * ```ts
 * import { IndexPipeline } from './indexer/index.js';
 *
 * const pipeline = new IndexPipeline({ profile, embedder, documents, repoSummaries, graph, entities });
 * const result = await pipeline.indexDocument({
 *   docId: 'prd-7',
 *   projectId: 'checkout',
 *   title: 'Checkout PRD',
 *   docType: 'prd',
 *   content,
 * });
 * console.log(`${result.chunks} chunks, ${result.entities} entities`);
 * ```
 */

export {
  chunkDocument,
  chunkId,
  chunkSettingsForProfile,
  RecursiveTextSplitter,
  DEFAULT_SEPARATORS,
  CHUNK_CHARS_PER_TOKEN,
  MIN_CHUNK_OVERLAP,
  type ChunkDraft,
  type ChunkSettings,
} from './chunker/index.js';

export {
  embedTexts,
  embedText,
  EmbeddingError,
  EmbeddingTimeoutError,
  resolveEmbeddingModel,
  createEmbeddingClientForProfile,
  type EmbedOptions,
  type EmbeddingClientOptions,
} from './embedder/index.js';

export {
  EntityExtractor,
  regexEntityFallback,
  ENTITY_TYPES,
  SIMPLIFIED_EXCERPT_CHARS,
  FULL_EXCERPT_CHARS,
  MAX_FALLBACK_ENTITIES,
  type EntityType,
  type ExtractedEntity,
  type EntityExtraction,
  type EntityExtractorOptions,
} from './entities.js';

export {
  IndexPipeline,
  buildRepoMap,
  formatRepoMap,
  REPO_MAP_MAX_FILES,
  REPO_MAP_MAX_SIGNATURE_CHARS,
  type IndexingStage,
  type DocumentInput,
  type IndexDocumentResult,
  type RepoSummaryInput,
  type IndexPipelineDeps,
  type IndexDocumentOptions,
} from './pipeline.js';
