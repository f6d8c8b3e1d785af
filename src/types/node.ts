/**
 * Node Types
 *
 * Permanent knowledge units in the graph.
 */

/**
 * Arbitrary property map attached to nodes and edges
 */
export type Properties = Record<string, unknown>;

/**
 * A node in the knowledge graph
 */
export interface Node {
  /** Unique, stable identifier */
  id: string;
  /** Logical partition (default "knowledge") */
  namespace: string;
  /** Free-form classification, e.g. "pattern", "tool" */
  type: string;
  name: string;
  description: string | null;
  tags: string[];
  properties: Properties;
  createdAt: string;
  updatedAt: string;
  /** Soft-delete timestamp; null while the node is live */
  deletedAt: string | null;
}

/**
 * Input for creating a node
 */
export interface NodeInput {
  name: string;
  type: string;
  namespace?: string;
  description?: string;
  tags?: string[];
  properties?: Properties;
}

/**
 * Filter for graph queries
 */
export interface NodeQuery {
  /** Full-text query; absent means filter-only */
  text?: string;
  type?: string;
  /** All tags must be present */
  tags?: string[];
  namespace?: string;
  limit?: number;
  offset?: number;
}

/**
 * A node with its query score in (0, 1]
 */
export interface RankedNode {
  node: Node;
  score: number;
}

/**
 * Progressive-disclosure summary of a node
 */
export interface NodeSummary {
  id: string;
  name: string;
  type: string;
}

export const DEFAULT_NAMESPACE = 'knowledge';
