/**
 * Graph Store Adapter
 *
 * A labeled property graph: nodes are identified by (label, key), edges by
 * (from, type, to). `SqliteGraphStore` implements it over the graph_nodes
 * and graph_edges tables.
 */

import type Database from 'better-sqlite3';
import { ResourceNotFoundError } from '../errors/index.js';
import {
  GraphEdgeRowSchema,
  GraphNodeRowSchema,
  validateRow,
  validateRows,
  type GraphEdgeRow,
  type GraphNodeRow,
} from '../database/validation.js';

export type Properties = Record<string, unknown>;

export interface NodeRef {
  label: string;
  key: string;
}

export interface GraphNode extends NodeRef {
  properties: Properties;
}

export interface GraphEdge {
  from: NodeRef;
  type: string;
  to: NodeRef;
  properties: Properties;
}

export interface GraphStore {
  /** Create the node or merge `properties` into the existing ones */
  upsertNode(label: string, key: string, properties?: Properties): Promise<GraphNode>;
  /**
   * Create the edge or overwrite its properties.
   * @throws ResourceNotFoundError if either endpoint is missing
   */
  upsertEdge(from: NodeRef, to: NodeRef, type: string, properties?: Properties): Promise<GraphEdge>;
  getNode(label: string, key: string): Promise<GraphNode | null>;
  outgoing(from: NodeRef, type?: string): Promise<GraphEdge[]>;
  incoming(to: NodeRef, type?: string): Promise<GraphEdge[]>;
}

function toNode(row: GraphNodeRow): GraphNode {
  return { label: row.label, key: row.key, properties: row.properties };
}

function toEdge(row: GraphEdgeRow): GraphEdge {
  return {
    from: { label: row.from_label, key: row.from_key },
    type: row.type,
    to: { label: row.to_label, key: row.to_key },
    properties: row.properties,
  };
}

export class SqliteGraphStore implements GraphStore {
  constructor(private readonly db: Database.Database) {}

  async upsertNode(label: string, key: string, properties: Properties = {}): Promise<GraphNode> {
    const existing = await this.getNode(label, key);
    const merged = { ...(existing?.properties ?? {}), ...properties };

    this.db
      .prepare(
        `INSERT INTO graph_nodes (label, key, properties) VALUES (?, ?, ?)
         ON CONFLICT (label, key) DO UPDATE SET
           properties = excluded.properties,
           updated_at = datetime('now')`
      )
      .run(label, key, JSON.stringify(merged));

    return { label, key, properties: merged };
  }

  async upsertEdge(
    from: NodeRef,
    to: NodeRef,
    type: string,
    properties: Properties = {}
  ): Promise<GraphEdge> {
    for (const ref of [from, to]) {
      if ((await this.getNode(ref.label, ref.key)) === null) {
        throw new ResourceNotFoundError(ref.label, ref.key);
      }
    }

    this.db
      .prepare(
        `INSERT INTO graph_edges (from_label, from_key, type, to_label, to_key, properties)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (from_label, from_key, type, to_label, to_key) DO UPDATE SET
           properties = excluded.properties,
           updated_at = datetime('now')`
      )
      .run(from.label, from.key, type, to.label, to.key, JSON.stringify(properties));

    return { from, type, to, properties };
  }

  async getNode(label: string, key: string): Promise<GraphNode | null> {
    const row = this.db
      .prepare('SELECT * FROM graph_nodes WHERE label = ? AND key = ?')
      .get(label, key);
    return row === undefined
      ? null
      : toNode(validateRow(GraphNodeRowSchema, row, `graph_nodes.${label}=${key}`));
  }

  async outgoing(from: NodeRef, type?: string): Promise<GraphEdge[]> {
    const rows =
      type === undefined
        ? this.db
            .prepare('SELECT * FROM graph_edges WHERE from_label = ? AND from_key = ? ORDER BY rowid')
            .all(from.label, from.key)
        : this.db
            .prepare(
              'SELECT * FROM graph_edges WHERE from_label = ? AND from_key = ? AND type = ? ORDER BY rowid'
            )
            .all(from.label, from.key, type);
    return validateRows(GraphEdgeRowSchema, rows, 'graph_edges').map(toEdge);
  }

  async incoming(to: NodeRef, type?: string): Promise<GraphEdge[]> {
    const rows =
      type === undefined
        ? this.db
            .prepare('SELECT * FROM graph_edges WHERE to_label = ? AND to_key = ? ORDER BY rowid')
            .all(to.label, to.key)
        : this.db
            .prepare(
              'SELECT * FROM graph_edges WHERE to_label = ? AND to_key = ? AND type = ? ORDER BY rowid'
            )
            .all(to.label, to.key, type);
    return validateRows(GraphEdgeRowSchema, rows, 'graph_edges').map(toEdge);
  }
}
