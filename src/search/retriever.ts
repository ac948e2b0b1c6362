/**
 * Hybrid Retriever
 *
 * Combines semantic search over document chunks with the project's
 * knowledge graph, and looks up stored repository maps.
 */

import type { ModelProfile } from '../config/profiles.js';
import type { Metadata } from '../database/schema.js';
import type { KnowledgeGraph, ProjectGraph } from '../graph/knowledge-graph.js';
import { embedText } from '../indexer/embedder/index.js';
import type { EmbeddingClient } from '../providers/types.js';
import { buildMetadataFilter } from './filters.js';
import type { VectorStore } from './vector-store.js';

export interface RetrievalResult {
  content: string;
  metadata: Metadata;
  /** 1 − cosine distance */
  similarity: number;
}

export interface RetrievalFilters {
  projectId?: string;
  docType?: string;
}

export interface GraphContextResult {
  vectorResults: RetrievalResult[];
  graphContext: ProjectGraph;
}

export interface HybridRetrieverDeps {
  profile: ModelProfile;
  embedder: EmbeddingClient;
  documents: VectorStore;
  repoSummaries: VectorStore;
  graph: KnowledgeGraph;
  embeddingTimeoutMs?: number;
}

export const DEFAULT_RESULT_COUNT = 5;

export const DESIGN_DOC_TYPE = 'technical_design';
export const DESIGN_DOC_QUERY = 'technical design architecture specification';
export const DESIGN_DOC_FALLBACK_QUERY = 'design specification requirements';
export const DESIGN_DOC_SEPARATOR = '\n\n---\n\n';

export class HybridRetriever {
  constructor(private readonly deps: HybridRetrieverDeps) {}

  /**
   * Semantic search for chunks similar to `query`, optionally restricted
   * to a project and/or document type.
   *
   * @throws EmbeddingError when the query cannot be embedded
   */
  async retrieveSimilar(
    query: string,
    filters: RetrievalFilters = {},
    k: number = DEFAULT_RESULT_COUNT
  ): Promise<RetrievalResult[]> {
    const vector = await embedText(query, this.deps.embedder, {
      timeoutMs: this.deps.embeddingTimeoutMs,
    });
    const where = buildMetadataFilter({
      project_id: filters.projectId || undefined,
      doc_type: filters.docType || undefined,
    });

    const matches = await this.deps.documents.query(vector, k, where);
    return matches.map((match) => ({
      content: match.content,
      metadata: match.metadata,
      similarity: 1 - match.distance,
    }));
  }

  /**
   * Vector results for `query` within a project, plus the project's
   * subgraph for structural context.
   */
  async retrieveWithGraphContext(
    query: string,
    projectId: string,
    k: number = DEFAULT_RESULT_COUNT
  ): Promise<GraphContextResult> {
    const [vectorResults, graphContext] = await Promise.all([
      this.retrieveSimilar(query, { projectId }, k),
      this.deps.graph.getProjectGraph(projectId),
    ]);
    return { vectorResults, graphContext };
  }

  /**
   * The project's design document text: technical_design chunks first,
   * any of the project's chunks otherwise. Null only when both searches
   * come back empty.
   */
  async retrieveDesignDoc(projectId: string): Promise<string | null> {
    const k = this.deps.profile.retrievalTopK;

    let results = await this.retrieveSimilar(
      DESIGN_DOC_QUERY,
      { projectId, docType: DESIGN_DOC_TYPE },
      k
    );
    if (results.length === 0) {
      results = await this.retrieveSimilar(DESIGN_DOC_FALLBACK_QUERY, { projectId }, k);
    }

    if (results.length === 0) {
      return null;
    }
    return results.map((result) => result.content).join(DESIGN_DOC_SEPARATOR);
  }

  /**
   * The stored repository map for `repoKey`, or null if it was never indexed.
   */
  async retrieveRepoContext(repoKey: string): Promise<string | null> {
    const entry = await this.deps.repoSummaries.get(repoKey);
    return entry?.content ?? null;
  }
}
