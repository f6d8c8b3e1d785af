/**
 * Context Router
 *
 * Keyword index from free text to graph subsets, with progressive
 * disclosure: summaries by default, full nodes with their edges on request.
 * The index is a cache over live nodes and can be rebuilt at any time.
 */

import type { GraphEngine, GraphListener } from '../graph/engine.js';
import type { IKnowledgeStore } from '../storage/interface.js';
import type {
  ContextResult,
  DetailLevel,
  Node,
  NodeDetail,
  NodeSummary,
  RouteEntry,
} from '../types/index.js';
import { DEFAULT_MAX_KEYWORDS, extractKeywords } from '../utils/keywords.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
  DEFAULT_PAGINATION,
  requireText,
  resolveLimit,
  type PaginationLimits,
} from '../utils/validation.js';
import { specificity } from './specificity.js';

export interface ContextRouterOptions {
  logger?: Logger;
  minConfidence?: number;
  maxKeywords?: number;
  /** Max edges attached to each node in full detail */
  edgeLimit?: number;
  pagination?: PaginationLimits;
}

export interface ResolveOptions {
  detail?: DetailLevel;
  limit?: number;
}

interface Candidate {
  node: Node;
  score: number;
}

/**
 * Context router
 */
export class ContextRouter implements GraphListener {
  private readonly logger: Logger;
  private readonly minConfidence: number;
  private readonly maxKeywords: number;
  private readonly edgeLimit: number;
  private readonly pagination: PaginationLimits;

  constructor(
    private store: IKnowledgeStore,
    private graph: GraphEngine,
    options: ContextRouterOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.minConfidence = options.minConfidence ?? 0.1;
    this.maxKeywords = options.maxKeywords ?? DEFAULT_MAX_KEYWORDS;
    this.edgeLimit = options.edgeLimit ?? 10;
    this.pagination = options.pagination ?? DEFAULT_PAGINATION;
  }

  extractKeywords(text: string): string[] {
    return extractKeywords(text, this.maxKeywords);
  }

  /**
   * Keywords drawn from a node's name, description and tags
   */
  keywordsFor(node: Node): string[] {
    return this.extractKeywords([node.name, node.description ?? '', ...node.tags].join(' '));
  }

  // ==========================================================================
  // Index maintenance
  // ==========================================================================

  async index(node: Node): Promise<string[]> {
    const keywords = this.keywordsFor(node);
    if (keywords.length === 0) return keywords;

    await this.store.addRouteNode(keywords, node.id, specificity);
    this.logger.debug('node indexed', { id: node.id, keywords: keywords.length });
    return keywords;
  }

  async forget(nodeId: string): Promise<void> {
    const updated = await this.store.removeRouteNode(nodeId, specificity);
    if (updated.length > 0) {
      this.logger.debug('node forgotten', { id: nodeId, keywords: updated.length });
    }
  }

  /**
   * Drop every route and re-index all live nodes; returns the keyword count
   */
  async rebuild(): Promise<number> {
    const routes = new Map<string, string[]>();
    for (const node of await this.store.listLiveNodes()) {
      for (const keyword of this.keywordsFor(node)) {
        const ids = routes.get(keyword) ?? [];
        ids.push(node.id);
        routes.set(keyword, ids);
      }
    }

    const entries: RouteEntry[] = [...routes].map(([keyword, nodeIds]) => ({
      keyword,
      nodeIds,
      confidence: specificity(nodeIds.length),
    }));
    await this.store.replaceRoutes(entries);
    this.logger.info('keyword index rebuilt', { keywords: entries.length });
    return entries.length;
  }

  async onNodeAdded(node: Node): Promise<void> {
    await this.index(node);
  }

  async onNodeRemoved(nodeId: string): Promise<void> {
    await this.forget(nodeId);
  }

  async onNodeRestored(node: Node): Promise<void> {
    await this.index(node);
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  async resolve(keywords: string, options: ResolveOptions = {}): Promise<ContextResult> {
    const query = requireText(keywords, 'keywords');
    const detail = options.detail ?? 'summary';
    const limit = resolveLimit(options.limit, this.pagination);

    let source: ContextResult['source'] = 'index';
    let candidates = await this.fromIndex(query, limit);

    if (candidates.length === 0) {
      const hits = await this.graph.query({ text: query, limit });
      candidates = hits.map(({ node, score }) => ({ node, score }));
      source = candidates.length > 0 ? 'fulltext' : 'none';
    }

    const nodes =
      detail === 'full' ? await this.toDetails(candidates) : candidates.map(({ node }) => toSummary(node));

    return { query, detail, source, count: nodes.length, nodes };
  }

  private async fromIndex(query: string, limit: number): Promise<Candidate[]> {
    const entries = await this.store.getRoutes(this.extractKeywords(query));
    const scores = new Map<string, number>();
    for (const entry of entries) {
      if (entry.confidence < this.minConfidence) continue;
      for (const id of entry.nodeIds) {
        scores.set(id, (scores.get(id) ?? 0) + entry.confidence);
      }
    }
    if (scores.size === 0) return [];

    const live = await this.store.getNodes([...scores.keys()]);
    return live
      .map((node) => ({ node, score: scores.get(node.id) ?? 0 }))
      .sort(
        (a, b) =>
          b.score - a.score ||
          b.node.updatedAt.localeCompare(a.node.updatedAt) ||
          a.node.id.localeCompare(b.node.id)
      )
      .slice(0, limit);
  }

  private async toDetails(candidates: Candidate[]): Promise<NodeDetail[]> {
    const details: NodeDetail[] = [];
    for (const { node, score } of candidates) {
      const edges =
        this.edgeLimit > 0 ? await this.graph.edgesOf(node.id, { limit: this.edgeLimit }) : [];
      details.push({ ...node, score, edges });
    }
    return details;
  }
}

export function toSummary(node: Node): NodeSummary {
  return { id: node.id, name: node.name, type: node.type };
}
