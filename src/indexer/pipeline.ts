/**
 * Ingest Pipeline
 *
 * Chunk → Embed → Store → Enrich
 *
 * Storing chunks is the primary step: any failure up to and including the
 * vector upsert propagates. Graph enrichment (document node, entity
 * extraction) is best-effort: failures are logged and reported in the
 * result, never thrown.
 *
 * The pipeline doesn't know how to display progress; it fires `onStage`
 * and the caller renders it.
 */

import type { ModelProfile } from '../config/profiles.js';
import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import type { EmbeddingClient } from '../providers/types.js';
import type { VectorStore } from '../search/vector-store.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { chunkDocument, chunkSettingsForProfile } from './chunker/index.js';
import { embedTexts } from './embedder/index.js';
import type { EntityExtractor } from './entities.js';

export type IndexingStage = 'chunking' | 'embedding' | 'storing' | 'enriching';

export interface DocumentInput {
  docId: string;
  projectId: string;
  title: string;
  /** e.g. prd, technical_design, runbook */
  docType: string;
  content: string;
}

export interface IndexDocumentResult {
  docId: string;
  chunks: number;
  entities: number;
  /** True when the graph step failed; the chunks are stored regardless */
  enrichmentFailed: boolean;
}

export interface RepoSummaryInput {
  /** Repository URL or local path; the lookup key for retrieval */
  repoKey: string;
  fileTree: string;
  signatures: string;
}

export interface IndexPipelineDeps {
  profile: ModelProfile;
  embedder: EmbeddingClient;
  documents: VectorStore;
  repoSummaries: VectorStore;
  graph: KnowledgeGraph;
  entities: EntityExtractor;
  embeddingTimeoutMs?: number;
  logger?: Logger;
}

export interface IndexDocumentOptions {
  onStage?: (stage: IndexingStage) => void;
}

/** Most file paths kept in a repository map */
export const REPO_MAP_MAX_FILES = 200;

/** Character cap on the signatures section of a repository map */
export const REPO_MAP_MAX_SIGNATURE_CHARS = 3000;

const SOURCE_EXTENSIONS = ['.py', '.ts', '.js', '.go', '.java', '.rs'];

/**
 * Build the file-tree and signature sections of a repository map from a
 * list of tracked paths. Dot-paths are left out.
 */
export function buildRepoMap(paths: string[]): { fileTree: string; signatures: string } {
  const visible = paths.filter((path) => !path.startsWith('.'));
  return {
    fileTree: visible.slice(0, REPO_MAP_MAX_FILES).join('\n'),
    signatures: visible
      .filter((path) => SOURCE_EXTENSIONS.some((ext) => path.endsWith(ext)))
      .map((path) => `- ${path}`)
      .join('\n')
      .slice(0, REPO_MAP_MAX_SIGNATURE_CHARS),
  };
}

export function formatRepoMap(input: RepoSummaryInput): string {
  return `Repository: ${input.repoKey}\n\nFile Tree:\n${input.fileTree}\n\nSignatures:\n${input.signatures}`;
}

export class IndexPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: IndexPipelineDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Index a document into the vector store and the knowledge graph.
   * Re-indexing the same `docId` replaces its chunks.
   *
   * @throws EmbeddingError / EmbeddingTimeoutError when embedding fails
   */
  async indexDocument(
    input: DocumentInput,
    options: IndexDocumentOptions = {}
  ): Promise<IndexDocumentResult> {
    const { documents } = this.deps;

    options.onStage?.('chunking');
    const chunks = chunkDocument(input.docId, input.content, chunkSettingsForProfile(this.deps.profile), {
      project_id: input.projectId,
      doc_type: input.docType,
      title: input.title,
    });
    this.logger.debug?.(`Split document ${input.docId} into ${chunks.length} chunks`);

    options.onStage?.('embedding');
    const vectors = await embedTexts(
      chunks.map((chunk) => chunk.text),
      this.deps.embedder,
      { timeoutMs: this.deps.embeddingTimeoutMs }
    );

    options.onStage?.('storing');
    const previousCount = await documents.count({ doc_id: input.docId });
    await documents.add(
      chunks.map((chunk, i) => ({
        id: chunk.id,
        content: chunk.text,
        embedding: vectors[i] ?? [],
        metadata: chunk.metadata,
      }))
    );
    for (let index = chunks.length; index < previousCount; index++) {
      await documents.deleteWhere({
        $and: [{ doc_id: input.docId }, { chunk_index: index }],
      });
    }
    this.logger.info?.(`Stored ${chunks.length} chunks for ${input.docId}`);

    options.onStage?.('enriching');
    const enrichment = await this.enrich(input);

    return {
      docId: input.docId,
      chunks: chunks.length,
      entities: enrichment.entities,
      enrichmentFailed: enrichment.failed,
    };
  }

  /**
   * Store a repository map under `repoKey`, replacing any earlier one.
   */
  async indexRepoSummary(input: RepoSummaryInput): Promise<void> {
    const content = formatRepoMap(input);
    const [vector] = await embedTexts([content], this.deps.embedder, {
      timeoutMs: this.deps.embeddingTimeoutMs,
    });
    await this.deps.repoSummaries.add([
      {
        id: input.repoKey,
        content,
        embedding: vector ?? [],
        metadata: { repo_url: input.repoKey, type: 'repo_map' },
      },
    ]);
    this.logger.info?.(`Stored repo map for ${input.repoKey}`);
  }

  private async enrich(input: DocumentInput): Promise<{ entities: number; failed: boolean }> {
    try {
      await this.deps.graph.addDocument(input.docId, input.projectId, input.title, input.docType);
      const extraction = await this.deps.entities.extractAndLink(
        input.content,
        input.docId,
        this.deps.graph
      );
      return { entities: extraction.entities.length, failed: false };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Graph enrichment failed for ${input.docId}: ${message}`);
      return { entities: 0, failed: true };
    }
  }
}
