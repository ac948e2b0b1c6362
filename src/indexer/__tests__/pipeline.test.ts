/**
 * Ingest Pipeline Tests
 *
 * Runs the whole pipeline against in-memory SQLite with scripted model
 * clients.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { DEFAULT_PROFILE, type ModelProfile } from '../../config/profiles.js';
import { TransientIOError } from '../../errors/index.js';
import { KnowledgeGraph } from '../../graph/knowledge-graph.js';
import { SqliteGraphStore, type GraphStore } from '../../graph/store.js';
import { StructuredOutputCaller } from '../../llm/structured.js';
import type { EmbeddingClient } from '../../providers/types.js';
import { SqliteVectorStore } from '../../search/vector-store.js';
import {
  HashingEmbeddingClient,
  ScriptedCompletionClient,
  openTestDatabase,
} from '../../test-utils/index.js';
import { EmbeddingError } from '../embedder/index.js';
import { EntityExtractor } from '../entities.js';
import { IndexPipeline, buildRepoMap, formatRepoMap, type IndexingStage } from '../pipeline.js';

const profile: ModelProfile = { ...DEFAULT_PROFILE, chunkTokenLimit: 10 };

const DOC =
  'The Payments Team owns the Ledger Service. Checkout calls the Ledger Service for refunds. Fraud Review happens nightly.';

const ENTITY_REPLY = '{"entities": [{"name": "Ledger Service", "type": "service"}]}';

let db: Database.Database;
let documents: SqliteVectorStore;
let repoSummaries: SqliteVectorStore;
let graph: KnowledgeGraph;

function pipelineWith(
  replies: Array<string | Error>,
  overrides: { embedder?: EmbeddingClient; graph?: KnowledgeGraph } = {}
) {
  const llm = new ScriptedCompletionClient(replies);
  const embedder = overrides.embedder ?? new HashingEmbeddingClient();
  const warnings: string[] = [];
  const pipeline = new IndexPipeline({
    profile,
    embedder,
    documents,
    repoSummaries,
    graph: overrides.graph ?? graph,
    entities: new EntityExtractor(new StructuredOutputCaller(llm, profile), profile),
    logger: { warn: (message) => warnings.push(message) },
  });
  return { pipeline, warnings };
}

beforeEach(async () => {
  db = openTestDatabase();
  documents = new SqliteVectorStore(db, 'documents');
  repoSummaries = new SqliteVectorStore(db, 'repo_summaries');
  graph = new KnowledgeGraph(new SqliteGraphStore(db));
  await graph.addProject('checkout', 'Checkout');
});

afterEach(() => {
  db.close();
});

describe('IndexPipeline.indexDocument', () => {
  const input = {
    docId: 'runbook-1',
    projectId: 'checkout',
    title: 'Ledger runbook',
    docType: 'runbook',
    content: DOC,
  };

  it('stores chunks, the document node and its entities', async () => {
    const embedder = new HashingEmbeddingClient();
    const { pipeline } = pipelineWith([ENTITY_REPLY], { embedder });
    const stages: IndexingStage[] = [];

    const result = await pipeline.indexDocument(input, { onStage: (stage) => stages.push(stage) });

    expect(result).toEqual({ docId: 'runbook-1', chunks: 5, entities: 1, enrichmentFailed: false });
    expect(stages).toEqual(['chunking', 'embedding', 'storing', 'enriching']);
    expect(embedder.calls).toHaveLength(1);

    expect(await documents.count({ doc_id: 'runbook-1' })).toBe(5);
    const first = await documents.get('runbook-1_0');
    expect(first?.content).toBe('The Payments Team owns the Ledger');
    expect(first?.metadata).toEqual({
      project_id: 'checkout',
      doc_type: 'runbook',
      title: 'Ledger runbook',
      doc_id: 'runbook-1',
      chunk_index: 0,
    });

    const projectGraph = await graph.getProjectGraph('checkout');
    expect(projectGraph.documents).toEqual([
      { id: 'runbook-1', title: 'Ledger runbook', docType: 'runbook' },
    ]);
    expect(projectGraph.entities).toEqual([{ name: 'Ledger Service', type: 'service' }]);
  });

  it('replaces stale chunks when a document shrinks', async () => {
    const { pipeline } = pipelineWith([ENTITY_REPLY, '{"entities": []}']);
    await pipeline.indexDocument(input);

    const result = await pipeline.indexDocument({ ...input, content: 'Short note.' });

    expect(result.chunks).toBe(1);
    expect(await documents.count({ doc_id: 'runbook-1' })).toBe(1);
    expect((await documents.get('runbook-1_0'))?.content).toBe('Short note.');
    expect(await documents.get('runbook-1_1')).toBeNull();
  });

  it('falls back to regex entities when the model is down', async () => {
    const { pipeline } = pipelineWith([new TransientIOError('connection refused')]);

    const result = await pipeline.indexDocument(input);

    expect(result.entities).toBe(3);
    expect((await graph.getProjectGraph('checkout')).entities.map((e) => e.name)).toEqual([
      'Payments Team',
      'Ledger Service',
      'Fraud Review',
    ]);
  });

  it('propagates embedding failures and stores nothing', async () => {
    const embedder: EmbeddingClient = {
      model: 'broken',
      embed: async () => {
        throw new Error('model not found');
      },
    };
    const { pipeline } = pipelineWith([ENTITY_REPLY], { embedder });

    await expect(pipeline.indexDocument(input)).rejects.toBeInstanceOf(EmbeddingError);
    expect(await documents.count()).toBe(0);
  });

  it('reports a graph failure without losing the chunks', async () => {
    const failing = async (): Promise<never> => {
      throw new Error('graph unavailable');
    };
    const brokenStore: GraphStore = {
      upsertNode: failing,
      upsertEdge: failing,
      getNode: failing,
      outgoing: failing,
      incoming: failing,
    };
    const { pipeline, warnings } = pipelineWith([ENTITY_REPLY], {
      graph: new KnowledgeGraph(brokenStore),
    });

    const result = await pipeline.indexDocument(input);

    expect(result).toEqual({ docId: 'runbook-1', chunks: 5, entities: 0, enrichmentFailed: true });
    expect(await documents.count()).toBe(5);
    expect(warnings).toEqual(['Graph enrichment failed for runbook-1: graph unavailable']);
  });

  it('handles an empty document', async () => {
    const { pipeline } = pipelineWith(['{"entities": []}']);
    const result = await pipeline.indexDocument({ ...input, content: '   ' });
    expect(result).toEqual({ docId: 'runbook-1', chunks: 0, entities: 0, enrichmentFailed: false });
  });
});

describe('IndexPipeline.indexRepoSummary', () => {
  it('stores the repository map under its key', async () => {
    const { pipeline } = pipelineWith([]);
    const summary = { repoKey: 'acme/checkout', fileTree: 'src/app.ts', signatures: '- src/app.ts' };

    await pipeline.indexRepoSummary(summary);
    await pipeline.indexRepoSummary(summary);

    expect(await repoSummaries.count()).toBe(1);
    const stored = await repoSummaries.get('acme/checkout');
    expect(stored?.content).toBe(
      'Repository: acme/checkout\n\nFile Tree:\nsrc/app.ts\n\nSignatures:\n- src/app.ts'
    );
    expect(stored?.metadata).toEqual({ repo_url: 'acme/checkout', type: 'repo_map' });
    expect(formatRepoMap(summary)).toBe(stored?.content);
  });
});

describe('buildRepoMap', () => {
  it('skips dot-paths and lists source files as signatures', () => {
    expect(buildRepoMap(['.github/workflows/ci.yml', 'README.md', 'src/app.ts', 'src/util.py'])).toEqual({
      fileTree: 'README.md\nsrc/app.ts\nsrc/util.py',
      signatures: '- src/app.ts\n- src/util.py',
    });
  });
});
