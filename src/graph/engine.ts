/**
 * Graph Engine
 *
 * Typed, weighted knowledge graph over the store. Nodes and edges are
 * soft-deleted and can be restored. Listeners (the context router) hear
 * about node changes after they commit.
 */

import { KnowledgeError, invalidArgument, notFound } from '../errors/index.js';
import type { IKnowledgeStore } from '../storage/interface.js';
import {
  DEFAULT_EDGE_WEIGHT,
  DEFAULT_NAMESPACE,
  MAX_TRAVERSAL_DEPTH,
  type Edge,
  type EdgeDirection,
  type EdgeKey,
  type GraphStatus,
  type Node,
  type NodeInput,
  type NodeQuery,
  type Properties,
  type RankedNode,
  type TraversalOptions,
  type TraversalStep,
} from '../types/index.js';
import { generateNodeId } from '../utils/id-generator.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { isoNow, systemClock, type Clock } from '../utils/time.js';
import {
  DEFAULT_PAGINATION,
  normalizeTags,
  requireText,
  requireUnitInterval,
  resolveLimit,
  resolveOffset,
  type PaginationLimits,
} from '../utils/validation.js';
import { GraphTraverser } from './traversal.js';

/**
 * Observer of node lifecycle events
 */
export interface GraphListener {
  onNodeAdded?(node: Node): Promise<void> | void;
  onNodeRemoved?(nodeId: string): Promise<void> | void;
  onNodeRestored?(node: Node): Promise<void> | void;
}

export interface GraphEngineOptions {
  clock?: Clock;
  logger?: Logger;
  pagination?: PaginationLimits;
}

export interface EdgesOfOptions {
  direction?: EdgeDirection;
  type?: string;
  limit?: number;
}

/**
 * Graph engine
 */
export class GraphEngine {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly pagination: PaginationLimits;
  private readonly traverser: GraphTraverser;
  private readonly listeners: GraphListener[] = [];

  constructor(
    private store: IKnowledgeStore,
    options: GraphEngineOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.pagination = options.pagination ?? DEFAULT_PAGINATION;
    this.traverser = new GraphTraverser(store);
  }

  addListener(listener: GraphListener): void {
    this.listeners.push(listener);
  }

  // ==========================================================================
  // Nodes
  // ==========================================================================

  /**
   * Validate input and build a node without persisting it
   */
  buildNode(input: NodeInput): Node {
    const timestamp = isoNow(this.clock);
    const description = input.description?.trim();
    return {
      id: generateNodeId(),
      namespace: input.namespace?.trim() || DEFAULT_NAMESPACE,
      type: requireText(input.type, 'type'),
      name: requireText(input.name, 'name'),
      description: description ? description : null,
      tags: normalizeTags(input.tags),
      properties: { ...(input.properties ?? {}) },
      createdAt: timestamp,
      updatedAt: timestamp,
      deletedAt: null,
    };
  }

  async addNode(input: NodeInput): Promise<Node> {
    const node = this.buildNode(input);
    await this.store.insertNode(node);
    this.logger.debug('node added', { id: node.id, type: node.type });
    await this.publishNodeAdded(node);
    return node;
  }

  /**
   * Tell listeners about a node committed outside addNode (batch writes)
   */
  async publishNodeAdded(node: Node): Promise<void> {
    await this.notify('onNodeAdded', (l) => l.onNodeAdded?.(node));
  }

  async getNode(id: string): Promise<Node> {
    const node = await this.store.getNode(id);
    if (!node) throw notFound('Node', id);
    return node;
  }

  async removeNode(id: string): Promise<void> {
    const removed = await this.store.softDeleteNode(id, isoNow(this.clock));
    if (!removed) throw notFound('Node', id);
    await this.notify('onNodeRemoved', (l) => l.onNodeRemoved?.(id));
  }

  async restoreNode(id: string): Promise<Node> {
    const restored = await this.store.restoreNode(id, isoNow(this.clock));
    if (!restored) throw new KnowledgeError('NotFound', `No deleted node: ${id}`);
    const node = await this.getNode(id);
    await this.notify('onNodeRestored', (l) => l.onNodeRestored?.(node));
    return node;
  }

  /**
   * Full-text and/or filtered search. Scores are bm25 normalised so the
   * best match of the whole result set scores 1; filter-only hits score 1.
   */
  async query(query: NodeQuery = {}): Promise<RankedNode[]> {
    const limit = resolveLimit(query.limit, this.pagination);
    const offset = resolveOffset(query.offset);
    const { hits, bestRank } = await this.store.searchNodes({
      text: query.text,
      type: query.type,
      tags: query.tags ? normalizeTags(query.tags) : undefined,
      namespace: query.namespace,
      limit,
      offset,
    });

    return hits.map(({ node, rank }) => ({ node, score: normaliseRank(rank, bestRank) }));
  }

  // ==========================================================================
  // Edges
  // ==========================================================================

  async connect(
    sourceId: string,
    targetId: string,
    edgeType: string,
    weight: number = DEFAULT_EDGE_WEIGHT,
    properties: Properties = {}
  ): Promise<Edge> {
    const type = requireText(edgeType, 'edgeType');
    requireUnitInterval(weight, 'weight');
    const timestamp = isoNow(this.clock);

    const edge = await this.store.upsertEdge({
      sourceId,
      targetId,
      type,
      weight,
      properties: { ...properties },
      createdAt: timestamp,
      updatedAt: timestamp,
      deletedAt: null,
    });
    this.logger.debug('edge upserted', { sourceId, targetId, type, weight });
    return edge;
  }

  async removeEdge(sourceId: string, targetId: string, type: string): Promise<void> {
    const key: EdgeKey = { sourceId, targetId, type };
    const removed = await this.store.softDeleteEdge(key, isoNow(this.clock));
    if (!removed) throw notFound('Edge', `${sourceId} -[${type}]-> ${targetId}`);
  }

  async restoreEdge(sourceId: string, targetId: string, type: string): Promise<Edge> {
    const key: EdgeKey = { sourceId, targetId, type };
    const restored = await this.store.restoreEdge(key, isoNow(this.clock));
    if (!restored) {
      throw new KnowledgeError('NotFound', `No deleted edge: ${sourceId} -[${type}]-> ${targetId}`);
    }
    const edge = await this.store.getEdge(key, { includeDeleted: true });
    if (!edge) throw notFound('Edge', `${sourceId} -[${type}]-> ${targetId}`);
    return edge;
  }

  /**
   * Live edges touching a node, heaviest first
   */
  async edgesOf(nodeId: string, options: EdgesOfOptions = {}): Promise<Edge[]> {
    return this.store.listEdges(nodeId, {
      direction: options.direction ?? 'both',
      type: options.type,
      limit: options.limit,
    });
  }

  // ==========================================================================
  // Traversal & status
  // ==========================================================================

  async traverse(startId: string, options: TraversalOptions = {}): Promise<TraversalStep[]> {
    const depth = options.depth ?? 1;
    if (!Number.isInteger(depth) || depth < 1 || depth > MAX_TRAVERSAL_DEPTH) {
      throw invalidArgument(`depth must be an integer between 1 and ${MAX_TRAVERSAL_DEPTH}`);
    }
    const start = await this.getNode(startId);
    return this.traverser.traverse(start, {
      depth,
      mode: options.mode ?? 'bfs',
      direction: options.direction ?? 'both',
      edgeType: options.edgeType,
    });
  }

  async status(): Promise<GraphStatus> {
    const stats = await this.store.stats();
    return {
      nodeCount: stats.nodeCount,
      edgeCount: stats.edgeCount,
      perNamespaceCounts: stats.perNamespaceCounts,
    };
  }

  // Listener failures are logged, never propagated
  private async notify(
    event: keyof GraphListener,
    call: (listener: GraphListener) => Promise<void> | void
  ): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await call(listener);
      } catch (err) {
        this.logger.warn('graph listener failed', { event, error: err });
      }
    }
  }
}

/**
 * bm25 is negative with lower meaning better; rank / best lies in (0, 1]
 */
export function normaliseRank(rank: number | null, bestRank: number | null): number {
  if (rank === null || bestRank === null || bestRank === 0) return 1;
  const score = rank / bestRank;
  return score > 1 ? 1 : score;
}
