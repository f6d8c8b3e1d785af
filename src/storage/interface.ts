/**
 * Knowledge Store Interface
 *
 * Contract for the persistent store behind the graph, experience and router
 * engines. Every method either completes or throws a KnowledgeError;
 * multi-row writes go through applyBatch so they commit atomically.
 */

import type {
  Edge,
  EdgeDirection,
  EdgeKey,
  Experience,
  ExperienceLink,
  ExperienceType,
  Node,
  RouteEntry,
  StoreStats,
} from '../types/index.js';

/**
 * Filters for a node search. `text` is free text, turned into an FTS query.
 */
export interface NodeSearch {
  text?: string;
  type?: string;
  tags?: string[];
  namespace?: string;
  limit: number;
  offset: number;
}

export interface NodeHit {
  node: Node;
  /** bm25 rank (negative, lower is better); null for filter-only searches */
  rank: number | null;
}

export interface NodeSearchResult {
  hits: NodeHit[];
  /** Best rank across the whole match set, not only this page */
  bestRank: number | null;
}

export interface ExperienceSearch {
  text?: string;
  type?: ExperienceType;
}

export interface EdgeListOptions {
  direction: EdgeDirection;
  type?: string;
  limit?: number;
}

/**
 * A single write inside an atomic batch
 */
export type WriteOp =
  | { kind: 'insertNode'; node: Node }
  | { kind: 'insertExperience'; experience: Experience }
  | { kind: 'linkExperience'; link: ExperienceLink }
  | { kind: 'markPromoted'; experienceId: string; nodeId: string };

export interface IKnowledgeStore {
  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;
  readonly readOnly: boolean;

  /** Apply every op in one transaction; all commit or none do */
  applyBatch(ops: WriteOp[]): Promise<void>;

  // Nodes
  insertNode(node: Node): Promise<void>;
  getNode(id: string, options?: { includeDeleted?: boolean }): Promise<Node | null>;
  getNodes(ids: string[]): Promise<Node[]>;
  listLiveNodes(): Promise<Node[]>;
  searchNodes(search: NodeSearch): Promise<NodeSearchResult>;
  /** Returns false when no live node matched */
  softDeleteNode(id: string, at: string): Promise<boolean>;
  /** Returns false when no deleted node matched */
  restoreNode(id: string, at: string): Promise<boolean>;

  // Edges
  /** Insert or overwrite; throws NotFound when an endpoint is not live */
  upsertEdge(edge: Edge): Promise<Edge>;
  getEdge(key: EdgeKey, options?: { includeDeleted?: boolean }): Promise<Edge | null>;
  listEdges(nodeId: string, options: EdgeListOptions): Promise<Edge[]>;
  softDeleteEdge(key: EdgeKey, at: string): Promise<boolean>;
  restoreEdge(key: EdgeKey, at: string): Promise<boolean>;

  // Experiences
  insertExperience(experience: Experience): Promise<void>;
  getExperience(id: string): Promise<Experience | null>;
  findExperiences(search: ExperienceSearch): Promise<Experience[]>;
  /**
   * Count one access per id in a single statement each, flagging the
   * experience for promotion once the count reaches `threshold`.
   */
  recordAccess(ids: string[], at: string, threshold: number): Promise<Experience[]>;
  deleteExperiences(ids: string[]): Promise<number>;
  getLinks(filter: { nodeId?: string; experienceId?: string }): Promise<ExperienceLink[]>;

  // Routes
  getRoutes(keywords: string[]): Promise<RouteEntry[]>;
  /**
   * Add `nodeId` to each keyword's entry and rescore it with `confidenceFor`
   * (node-id count in, confidence out). Read and write share one transaction.
   */
  addRouteNode(
    keywords: string[],
    nodeId: string,
    confidenceFor: (df: number) => number
  ): Promise<RouteEntry[]>;
  /** Drop `nodeId` from every entry in one transaction; emptied entries are removed */
  removeRouteNode(nodeId: string, confidenceFor: (df: number) => number): Promise<RouteEntry[]>;
  /** Drop every route and write `entries` in one transaction */
  replaceRoutes(entries: RouteEntry[]): Promise<void>;

  stats(): Promise<StoreStats>;
}
