/**
 * Knowledge Graph
 *
 * Projects, their documents, the entities those documents mention, and
 * the dependencies projects declare, on top of any GraphStore.
 *
 *   (Project)-[:HAS_DOC]->(Document)-[:MENTIONS]->(Entity)
 *   (Project)-[:DEPENDS_ON {type, description}]->(Entity)
 *
 * Entities merge by name. Links to a project or document that does not
 * exist yet are skipped rather than failing.
 */

import type { GraphEdge, GraphNode, GraphStore, NodeRef, Properties } from './store.js';

export const PROJECT = 'Project';
export const DOCUMENT = 'Document';
export const ENTITY = 'Entity';

export const HAS_DOC = 'HAS_DOC';
export const MENTIONS = 'MENTIONS';
export const DEPENDS_ON = 'DEPENDS_ON';

export interface ProjectInfo {
  id: string;
  name: string;
}

export interface DocumentInfo {
  id: string;
  title: string;
  docType: string;
}

export interface EntityInfo {
  name: string;
  type: string;
}

export interface DependencyInfo {
  entity: EntityInfo;
  type: string;
  description: string;
}

export interface ProjectGraph {
  project: ProjectInfo | null;
  documents: DocumentInfo[];
  entities: EntityInfo[];
  dependencies: DependencyInfo[];
}

export interface EntityMention {
  projectId: string;
  projectName: string;
  docId: string;
  docTitle: string;
}

function text(properties: Properties, key: string): string {
  const value = properties[key];
  return typeof value === 'string' ? value : '';
}

function toProject(node: GraphNode): ProjectInfo {
  return { id: node.key, name: text(node.properties, 'name') };
}

function toDocument(node: GraphNode): DocumentInfo {
  return {
    id: node.key,
    title: text(node.properties, 'title'),
    docType: text(node.properties, 'doc_type'),
  };
}

function toEntity(node: GraphNode): EntityInfo {
  return { name: node.key, type: text(node.properties, 'type') };
}

export class KnowledgeGraph {
  constructor(private readonly store: GraphStore) {}

  async addProject(projectId: string, name: string): Promise<void> {
    await this.store.upsertNode(PROJECT, projectId, { name });
  }

  /**
   * Upsert a document and link it from its project when the project exists.
   */
  async addDocument(docId: string, projectId: string, title: string, docType: string): Promise<void> {
    await this.store.upsertNode(DOCUMENT, docId, { title, doc_type: docType });
    const project: NodeRef = { label: PROJECT, key: projectId };
    if (await this.exists(project)) {
      await this.store.upsertEdge(project, { label: DOCUMENT, key: docId }, HAS_DOC);
    }
  }

  /**
   * Upsert an entity by name (the type is overwritten) and link it from the
   * document when the document exists.
   */
  async addEntity(name: string, type: string, docId: string): Promise<void> {
    await this.store.upsertNode(ENTITY, name, { type });
    const doc: NodeRef = { label: DOCUMENT, key: docId };
    if (await this.exists(doc)) {
      await this.store.upsertEdge(doc, { label: ENTITY, key: name }, MENTIONS);
    }
  }

  /**
   * Record that a project depends on an entity. Skipped when the project
   * does not exist; the edge's type and description are last-write-wins.
   *
   * @returns whether the edge was written
   */
  async addDependency(
    projectId: string,
    entityName: string,
    depType: string,
    description: string
  ): Promise<boolean> {
    const project: NodeRef = { label: PROJECT, key: projectId };
    if (!(await this.exists(project))) {
      return false;
    }
    const entity: NodeRef = { label: ENTITY, key: entityName };
    if (!(await this.exists(entity))) {
      await this.store.upsertNode(ENTITY, entityName);
    }
    await this.store.upsertEdge(project, entity, DEPENDS_ON, { type: depType, description });
    return true;
  }

  async getProjectGraph(projectId: string): Promise<ProjectGraph> {
    const projectNode = await this.store.getNode(PROJECT, projectId);
    if (projectNode === null) {
      return { project: null, documents: [], entities: [], dependencies: [] };
    }
    const project: NodeRef = { label: PROJECT, key: projectId };

    const documents: DocumentInfo[] = [];
    const entities = new Map<string, EntityInfo>();
    for (const edge of await this.store.outgoing(project, HAS_DOC)) {
      const docNode = await this.store.getNode(edge.to.label, edge.to.key);
      if (docNode === null) continue;
      documents.push(toDocument(docNode));

      for (const mention of await this.store.outgoing(edge.to, MENTIONS)) {
        if (entities.has(mention.to.key)) continue;
        const entityNode = await this.store.getNode(mention.to.label, mention.to.key);
        if (entityNode !== null) {
          entities.set(entityNode.key, toEntity(entityNode));
        }
      }
    }

    const dependencies: DependencyInfo[] = [];
    for (const edge of await this.store.outgoing(project, DEPENDS_ON)) {
      const entityNode = await this.store.getNode(edge.to.label, edge.to.key);
      if (entityNode !== null) {
        dependencies.push(toDependency(edge, entityNode));
      }
    }

    return {
      project: toProject(projectNode),
      documents,
      entities: [...entities.values()],
      dependencies,
    };
  }

  /**
   * Every (project, document) pair where the document mentions `entityName`
   * and belongs to a project.
   */
  async getEntityContext(entityName: string): Promise<EntityMention[]> {
    const mentions: EntityMention[] = [];
    for (const mention of await this.store.incoming({ label: ENTITY, key: entityName }, MENTIONS)) {
      const docNode = await this.store.getNode(mention.from.label, mention.from.key);
      if (docNode === null) continue;

      for (const owner of await this.store.incoming(mention.from, HAS_DOC)) {
        const projectNode = await this.store.getNode(owner.from.label, owner.from.key);
        if (projectNode === null) continue;
        mentions.push({
          projectId: projectNode.key,
          projectName: text(projectNode.properties, 'name'),
          docId: docNode.key,
          docTitle: text(docNode.properties, 'title'),
        });
      }
    }
    return mentions;
  }

  private async exists(ref: NodeRef): Promise<boolean> {
    return (await this.store.getNode(ref.label, ref.key)) !== null;
  }
}

function toDependency(edge: GraphEdge, entityNode: GraphNode): DependencyInfo {
  return {
    entity: toEntity(entityNode),
    type: text(edge.properties, 'type'),
    description: text(edge.properties, 'description'),
  };
}
