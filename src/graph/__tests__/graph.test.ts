/**
 * Graph Store and Knowledge Graph Tests
 *
 * Runs against an in-memory SQLite database.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { ResourceNotFoundError } from '../../errors/index.js';
import { openTestDatabase } from '../../test-utils/index.js';
import { KnowledgeGraph } from '../knowledge-graph.js';
import { SqliteGraphStore } from '../store.js';

let db: Database.Database;
let store: SqliteGraphStore;

beforeEach(() => {
  db = openTestDatabase();
  store = new SqliteGraphStore(db);
});

afterEach(() => {
  db.close();
});

describe('SqliteGraphStore', () => {
  it('merges properties on repeated upsert', async () => {
    await store.upsertNode('Entity', 'Redis', { type: 'technology', owner: 'platform' });
    await store.upsertNode('Entity', 'Redis', { type: 'service' });

    const node = await store.getNode('Entity', 'Redis');
    expect(node?.properties).toEqual({ type: 'service', owner: 'platform' });
  });

  it('returns null for a missing node', async () => {
    expect(await store.getNode('Entity', 'nope')).toBeNull();
  });

  it('overwrites edge properties on repeat', async () => {
    await store.upsertNode('Project', 'api');
    await store.upsertNode('Entity', 'Redis');
    const from = { label: 'Project', key: 'api' };
    const to = { label: 'Entity', key: 'Redis' };

    await store.upsertEdge(from, to, 'DEPENDS_ON', { type: 'runtime', note: 'x' });
    await store.upsertEdge(from, to, 'DEPENDS_ON', { type: 'build' });

    const edges = await store.outgoing(from, 'DEPENDS_ON');
    expect(edges).toHaveLength(1);
    expect(edges[0]?.properties).toEqual({ type: 'build' });
  });

  it('refuses an edge to a missing node', async () => {
    await store.upsertNode('Project', 'api');
    await expect(
      store.upsertEdge({ label: 'Project', key: 'api' }, { label: 'Entity', key: 'ghost' }, 'USES')
    ).rejects.toBeInstanceOf(ResourceNotFoundError);
  });

  it('filters incoming edges by type', async () => {
    await store.upsertNode('Document', 'd1');
    await store.upsertNode('Entity', 'Kafka');
    const doc = { label: 'Document', key: 'd1' };
    const entity = { label: 'Entity', key: 'Kafka' };
    await store.upsertEdge(doc, entity, 'MENTIONS');
    await store.upsertEdge(doc, entity, 'REPLACES');

    expect((await store.incoming(entity)).map((e) => e.type)).toEqual(['MENTIONS', 'REPLACES']);
    expect((await store.incoming(entity, 'MENTIONS')).map((e) => e.from.key)).toEqual(['d1']);
  });
});

describe('KnowledgeGraph', () => {
  let graph: KnowledgeGraph;

  beforeEach(() => {
    graph = new KnowledgeGraph(store);
  });

  it('builds a project subgraph', async () => {
    await graph.addProject('checkout', 'Checkout Revamp');
    await graph.addDocument('prd-1', 'checkout', 'Checkout PRD', 'prd');
    await graph.addEntity('Stripe', 'service', 'prd-1');
    await graph.addEntity('Payments Team', 'team', 'prd-1');
    await graph.addDependency('checkout', 'Ledger API', 'api', 'Posts settled charges');

    const result = await graph.getProjectGraph('checkout');

    expect(result.project).toEqual({ id: 'checkout', name: 'Checkout Revamp' });
    expect(result.documents).toEqual([{ id: 'prd-1', title: 'Checkout PRD', docType: 'prd' }]);
    expect(result.entities).toEqual([
      { name: 'Stripe', type: 'service' },
      { name: 'Payments Team', type: 'team' },
    ]);
    expect(result.dependencies).toEqual([
      { entity: { name: 'Ledger API', type: '' }, type: 'api', description: 'Posts settled charges' },
    ]);
  });

  it('returns an empty graph for an unknown project', async () => {
    expect(await graph.getProjectGraph('missing')).toEqual({
      project: null,
      documents: [],
      entities: [],
      dependencies: [],
    });
  });

  it('stores a document without a link when its project is unknown', async () => {
    await graph.addDocument('orphan', 'nowhere', 'Orphan', 'prd');

    expect(await store.getNode('Document', 'orphan')).not.toBeNull();
    expect(await store.incoming({ label: 'Document', key: 'orphan' })).toEqual([]);
  });

  it('merges entities by name', async () => {
    await graph.addProject('p', 'P');
    await graph.addDocument('d1', 'p', 'One', 'prd');
    await graph.addDocument('d2', 'p', 'Two', 'prd');
    await graph.addEntity('Redis', 'technology', 'd1');
    await graph.addEntity('Redis', 'technology', 'd2');

    const result = await graph.getProjectGraph('p');
    expect(result.entities).toEqual([{ name: 'Redis', type: 'technology' }]);
  });

  it('skips a dependency from an unknown project', async () => {
    expect(await graph.addDependency('ghost', 'Redis', 'runtime', '')).toBe(false);
    expect(await store.getNode('Entity', 'Redis')).toBeNull();
  });

  it('keeps the last dependency type and description', async () => {
    await graph.addProject('p', 'P');
    await graph.addDependency('p', 'Redis', 'runtime', 'cache');
    await graph.addDependency('p', 'Redis', 'data', 'session store');

    const { dependencies } = await graph.getProjectGraph('p');
    expect(dependencies).toEqual([
      { entity: { name: 'Redis', type: '' }, type: 'data', description: 'session store' },
    ]);
  });

  it('lists the projects and documents mentioning an entity', async () => {
    await graph.addProject('a', 'Alpha');
    await graph.addProject('b', 'Beta');
    await graph.addDocument('a-doc', 'a', 'Alpha design', 'technical_design');
    await graph.addDocument('b-doc', 'b', 'Beta PRD', 'prd');
    await graph.addEntity('Kafka', 'technology', 'a-doc');
    await graph.addEntity('Kafka', 'technology', 'b-doc');

    expect(await graph.getEntityContext('Kafka')).toEqual([
      { projectId: 'a', projectName: 'Alpha', docId: 'a-doc', docTitle: 'Alpha design' },
      { projectId: 'b', projectName: 'Beta', docId: 'b-doc', docTitle: 'Beta PRD' },
    ]);
  });
});
