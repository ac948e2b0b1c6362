/**
 * Application Context
 *
 * Builds every long-lived collaborator once (database, stores, graph,
 * model clients, pipeline, retriever) and hands them out explicitly.
 * Whoever creates the context owns it and must call close().
 *
 * @example
 * ```typescript
 * const ctx = createAppContext({ logger });
 * try {
 *   await ctx.pipeline.indexDocument({ docId, projectId, title, docType, content });
 * } finally {
 *   ctx.close();
 * }
 * ```
 */

import type Database from 'better-sqlite3';
import { GapAnalyzer } from './agents/gap-analyzer.js';
import { LaunchPrefill } from './agents/launch-prefill.js';
import { RiskAnalyzer } from './agents/risk-analyzer.js';
import { ScopeChecker } from './agents/scope-checker.js';
import { loadEnv, type EnvVars } from './config/env.js';
import { loadConfig } from './config/loader.js';
import { getDbPath } from './config/paths.js';
import { selectModelProfile, type ModelProfile } from './config/profiles.js';
import type { Config } from './config/schema.js';
import { openDatabase } from './database/connection.js';
import { runMigrations } from './database/migrate.js';
import { DatabaseError } from './errors/index.js';
import { KnowledgeGraph } from './graph/knowledge-graph.js';
import { SqliteGraphStore } from './graph/store.js';
import { createEmbeddingClientForProfile } from './indexer/embedder/provider.js';
import { EntityExtractor } from './indexer/entities.js';
import { IndexPipeline } from './indexer/pipeline.js';
import { LocalGitClient } from './integrations/local-git.js';
import { StructuredOutputCaller } from './llm/structured.js';
import { createCompletionClient, type OpenAIClientFactory } from './providers/index.js';
import type { CompletionClient, EmbeddingClient } from './providers/types.js';
import { HybridRetriever } from './search/retriever.js';
import {
  DOCUMENTS_COLLECTION,
  REPO_SUMMARIES_COLLECTION,
  SqliteVectorStore,
} from './search/vector-store.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface AppContextOptions {
  /** Defaults to ~/.warden/config.toml merged over the defaults */
  config?: Config;
  env?: EnvVars;
  /** Overrides config.storage.path; ':memory:' for a throwaway database */
  dbPath?: string;
  /** Overrides config.profile */
  profile?: string;
  /** Overrides config.default_model */
  model?: string;
  logger?: Logger;
  /** Pre-built clients, mainly for tests */
  completionClient?: CompletionClient;
  embeddingClient?: EmbeddingClient;
  clientFactory?: OpenAIClientFactory;
}

export interface AppContext {
  readonly config: Config;
  readonly profile: ModelProfile;
  readonly logger: Logger;
  readonly db: Database.Database;
  readonly documents: SqliteVectorStore;
  readonly repoSummaries: SqliteVectorStore;
  readonly graph: KnowledgeGraph;
  readonly completion: CompletionClient;
  readonly embedder: EmbeddingClient;
  readonly caller: StructuredOutputCaller;
  readonly entities: EntityExtractor;
  readonly pipeline: IndexPipeline;
  readonly retriever: HybridRetriever;
  createScopeChecker(): ScopeChecker;
  createRiskAnalyzer(): RiskAnalyzer;
  createGapAnalyzer(): GapAnalyzer;
  createLaunchPrefill(): LaunchPrefill;
  createGitClient(repoDir: string): LocalGitClient;
  close(): void;
}

/**
 * @throws ConfigError for an unknown profile or a malformed environment
 * @throws DatabaseError when the database cannot be opened or migrated
 */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? loadConfig();
  const env = options.env ?? loadEnv();
  const logger = options.logger ?? silentLogger;
  const model = options.model ?? config.default_model;

  const profile = selectModelProfile({
    model,
    profile: options.profile ?? config.profile,
    overrides: config.profiles,
  });
  logger.debug?.(`Model profile: ${profile.name} (model ${model})`);

  const db = openDatabase(options.dbPath ?? config.storage.path ?? getDbPath());
  const migrations = runMigrations(db);
  if (migrations.failed.length > 0) {
    db.close();
    const details = migrations.failed.map((f) => `${f.name}: ${f.error}`).join('; ');
    throw new DatabaseError(`Database migration failed: ${details}`);
  }

  const documents = new SqliteVectorStore(db, DOCUMENTS_COLLECTION);
  const repoSummaries = new SqliteVectorStore(db, REPO_SUMMARIES_COLLECTION);
  const graph = new KnowledgeGraph(new SqliteGraphStore(db));

  const completion =
    options.completionClient ??
    createCompletionClient(config.default_provider, {
      model,
      env,
      clientFactory: options.clientFactory,
    });
  const embedder =
    options.embeddingClient ??
    createEmbeddingClientForProfile(config.embedding, profile, {
      env,
      clientFactory: options.clientFactory,
    });

  const caller = new StructuredOutputCaller(completion, profile, { logger });
  const entities = new EntityExtractor(caller, profile, { logger });
  const embeddingTimeoutMs = config.embedding.timeout_ms;

  const pipeline = new IndexPipeline({
    profile,
    embedder,
    documents,
    repoSummaries,
    graph,
    entities,
    embeddingTimeoutMs,
    logger,
  });
  const retriever = new HybridRetriever({
    profile,
    embedder,
    documents,
    repoSummaries,
    graph,
    embeddingTimeoutMs,
  });

  const agentDeps = { client: completion, profile, retriever, graph, logger };

  return {
    config,
    profile,
    logger,
    db,
    documents,
    repoSummaries,
    graph,
    completion,
    embedder,
    caller,
    entities,
    pipeline,
    retriever,
    createScopeChecker: () => new ScopeChecker(agentDeps),
    createRiskAnalyzer: () => new RiskAnalyzer(agentDeps),
    createGapAnalyzer: () => new GapAnalyzer(agentDeps),
    createLaunchPrefill: () => new LaunchPrefill(agentDeps),
    createGitClient: (repoDir) =>
      new LocalGitClient(repoDir, { timeoutMs: config.git.timeout_ms, logger }),
    close: () => {
      if (db.open) {
        db.close();
      }
    },
  };
}
