/**
 * Graph Module
 *
 * Graph store adapter and the knowledge graph built on it.
 */

export {
  SqliteGraphStore,
  type GraphStore,
  type GraphNode,
  type GraphEdge,
  type NodeRef,
  type Properties,
} from './store.js';

export {
  KnowledgeGraph,
  PROJECT,
  DOCUMENT,
  ENTITY,
  HAS_DOC,
  MENTIONS,
  DEPENDS_ON,
  type ProjectInfo,
  type DocumentInfo,
  type EntityInfo,
  type DependencyInfo,
  type ProjectGraph,
  type EntityMention,
} from './knowledge-graph.js';
