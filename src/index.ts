/**
 * context-warden - Library Entry Point
 *
 * The CLI (`warden`) covers everyday use:
 * ```bash
 * warden index design.md -p ledger -t technical_design
 * warden scope -p ledger --head feature/refunds
 * warden risk prd.md -p ledger
 * ```
 *
 * The same core is available for embedding in other tools, such as a
 * webhook service that posts scope comments on pull requests.
 *
 * @example Scope-check a change
 * ```typescript
 * import { createAppContext, formatScopeComment } from 'context-warden';
 *
 * const app = createAppContext();
 * try {
 *   const result = await app.createScopeChecker().check({
 *     projectId: 'ledger',
 *     repoKey: 'acme/ledger',
 *     changeLabel: 'PR #42',
 *     title: 'Queue refunds',
 *     description: '',
 *     diff,
 *   });
 *   if (result.ok) console.log(formatScopeComment(result.report));
 * } finally {
 *   app.close();
 * }
 * ```
 *
 * @packageDocumentation
 */

export { createAppContext, type AppContext, type AppContextOptions } from './context.js';

export * from './agents/index.js';
export * from './errors/index.js';
export * from './graph/index.js';
export * from './integrations/index.js';
export * from './llm/index.js';
export * from './tokens/index.js';

export {
  loadConfig,
  DEFAULT_CONFIG,
  selectModelProfile,
  detectProfileName,
  BUILTIN_PROFILES,
  type Config,
  type ModelProfile,
} from './config/index.js';

export {
  IndexPipeline,
  EntityExtractor,
  chunkDocument,
  buildRepoMap,
  type DocumentInput,
  type IndexDocumentResult,
  type IndexingStage,
  type RepoSummaryInput,
} from './indexer/index.js';

export {
  HybridRetriever,
  SqliteVectorStore,
  type RetrievalResult,
  type RetrievalFilters,
  type VectorStore,
} from './search/index.js';

export {
  createCompletionClient,
  createEmbeddingClient,
  type CompletionClient,
  type EmbeddingClient,
  type CompletionRequest,
  type CompletionResponse,
} from './providers/index.js';

export { openDatabase, runMigrations } from './database/index.js';

export type { Logger } from './utils/logger.js';
