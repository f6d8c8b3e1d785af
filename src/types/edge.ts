/**
 * Edge Types
 *
 * Directed, typed, weighted relationships between two nodes.
 * At most one edge exists per (sourceId, targetId, type) triple.
 */

import type { Node, Properties } from './node.js';

export interface Edge {
  sourceId: string;
  targetId: string;
  type: string;
  /** Relationship strength in [0, 1] */
  weight: number;
  properties: Properties;
  createdAt: string;
  updatedAt: string;
  deletedAt: string | null;
}

/**
 * Identifies an edge
 */
export interface EdgeKey {
  sourceId: string;
  targetId: string;
  type: string;
}

export type EdgeDirection = 'out' | 'in' | 'both';

export type TraversalMode = 'bfs' | 'dfs';

export interface TraversalOptions {
  /** Hops from the start node, 1-5 */
  depth?: number;
  edgeType?: string;
  mode?: TraversalMode;
  direction?: EdgeDirection;
}

/**
 * One node reached during traversal
 */
export interface TraversalStep {
  node: Node;
  depth: number;
  /** Edge that led here; absent for the start node */
  via?: Edge;
}

export const DEFAULT_EDGE_WEIGHT = 1.0;
export const MAX_TRAVERSAL_DEPTH = 5;
