/**
 * Search Module
 *
 * Vector store adapter, metadata filters, and the hybrid retriever.
 */

export {
  SqliteVectorStore,
  cosineDistance,
  DOCUMENTS_COLLECTION,
  REPO_SUMMARIES_COLLECTION,
  type VectorStore,
  type VectorEntry,
  type StoredVectorEntry,
  type VectorMatch,
} from './vector-store.js';

export {
  buildMetadataFilter,
  compileMetadataFilter,
  type MetadataFilter,
  type EqualityFilter,
  type CompiledFilter,
} from './filters.js';

export {
  HybridRetriever,
  DEFAULT_RESULT_COUNT,
  DESIGN_DOC_TYPE,
  DESIGN_DOC_QUERY,
  DESIGN_DOC_FALLBACK_QUERY,
  DESIGN_DOC_SEPARATOR,
  type RetrievalResult,
  type RetrievalFilters,
  type GraphContextResult,
  type HybridRetrieverDeps,
} from './retriever.js';
