/**
 * Intelligence Layer
 *
 * Unified operations over the graph, experience pool and context router:
 * learn routes a fact by confidence, recall and crossref merge both stores
 * into one ranking, and every search sweeps flagged experiences into the
 * graph.
 */

import type { PeerConfig } from '../config/types.js';
import type { ExperienceEngine } from '../experience/engine.js';
import type { GraphEngine } from '../graph/engine.js';
import type { ContextRouter } from '../router/context-router.js';
import type { IKnowledgeStore } from '../storage/interface.js';
import type {
  ContextExperienceDetail,
  ContextExperienceSummary,
  DetailLevel,
  EdgeDirection,
  ExperienceInput,
  ExperienceQuery,
  LearnResult,
  Node,
  RecallItem,
  RecallResult,
  ScoredExperience,
  TraversalMode,
  TraversalStep,
  WorkspaceContext,
} from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/time.js';
import {
  DEFAULT_PAGINATION,
  requireText,
  resolveLimit,
  type PaginationLimits,
} from '../utils/validation.js';
import { withPeers } from './peers.js';
import { capitalize, Promoter } from './promotion.js';
import { mergeWorkspaceItems, RecallRanker } from './ranking.js';

export const LEARNED_NODE_PREFIX = 'learned-';

/** Experiences below this relevance are left out of crossref */
export const CROSSREF_MIN_RELEVANCE = 0.1;

/** Experiences below this relevance are left out of context */
export const CONTEXT_MIN_RELEVANCE = 0.1;

export const CONTEXT_SUMMARY_CHARS = 200;

function toExperienceSummary({ experience, relevance }: ScoredExperience): ContextExperienceSummary {
  return {
    id: experience.id,
    type: experience.type,
    content: experience.content.slice(0, CONTEXT_SUMMARY_CHARS),
    relevance,
  };
}

function toExperienceDetail({ experience, relevance }: ScoredExperience): ContextExperienceDetail {
  return {
    id: experience.id,
    type: experience.type,
    content: experience.content,
    relevance,
    confidence: experience.confidence,
    tags: experience.tags,
    context: experience.context,
  };
}

export interface IntelligenceDeps {
  store: IKnowledgeStore;
  graph: GraphEngine;
  experiences: ExperienceEngine;
  router: ContextRouter;
}

export interface IntelligenceOptions {
  workspace?: string;
  peers?: PeerConfig[];
  busyTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
  pagination?: PaginationLimits;
}

export interface RecallInput {
  topic?: string;
  limit?: number;
  minRelevance?: number;
}

export interface CrossrefInput {
  problem: string;
  limit?: number;
  minRelevance?: number;
}

export interface ContextInput {
  keywords: string;
  detail?: DetailLevel;
  limit?: number;
}

export interface RelatedInput {
  nodeId: string;
  depth?: number;
  edgeType?: string;
  mode?: TraversalMode;
  direction?: EdgeDirection;
}

export interface ExperienceSearchResult {
  hits: ScoredExperience[];
  promotedNodeIds: string[];
}

/**
 * Intelligence layer
 */
export class IntelligenceLayer {
  readonly workspace: string;
  private readonly store: IKnowledgeStore;
  private readonly graph: GraphEngine;
  private readonly experiences: ExperienceEngine;
  private readonly router: ContextRouter;
  private readonly peers: PeerConfig[];
  private readonly busyTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly pagination: PaginationLimits;
  private readonly promoter: Promoter;
  private readonly ranker = new RecallRanker();

  constructor(deps: IntelligenceDeps, options: IntelligenceOptions = {}) {
    this.store = deps.store;
    this.graph = deps.graph;
    this.experiences = deps.experiences;
    this.router = deps.router;
    this.workspace = options.workspace ?? 'default';
    this.peers = options.peers ?? [];
    this.busyTimeoutMs = options.busyTimeoutMs ?? 5000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.pagination = options.pagination ?? DEFAULT_PAGINATION;
    this.promoter = new Promoter(this.store, this.graph, this.experiences, this.logger);
  }

  // ==========================================================================
  // learn
  // ==========================================================================

  /**
   * High confidence: node + experience + derived-from link in one
   * transaction. Medium and low: a decaying experience only.
   */
  async learn(input: ExperienceInput): Promise<LearnResult> {
    const confidence = input.confidence ?? 'high';

    if (confidence !== 'high') {
      const experience = await this.experiences.save({ ...input, confidence });
      this.logger.info('learned', { type: experience.type, confidence, routing: 'decaying' });
      return {
        routing: 'decaying',
        nodeId: null,
        experienceId: experience.id,
        type: experience.type,
        confidence: experience.confidence,
        decayRate: experience.decayRate,
      };
    }

    const built = this.experiences.buildExperience({ ...input, confidence });
    const node = this.graph.buildNode({
      name: `${capitalize(built.type)}: ${built.content.slice(0, 60)}`,
      type: `${LEARNED_NODE_PREFIX}${built.type}`,
      description: built.content,
      tags: built.tags,
    });
    const experience = { ...built, promotedToNodeId: node.id };

    await this.store.applyBatch([
      { kind: 'insertNode', node },
      { kind: 'insertExperience', experience },
      {
        kind: 'linkExperience',
        link: {
          nodeId: node.id,
          experienceId: experience.id,
          type: 'derived-from',
          createdAt: node.createdAt,
        },
      },
    ]);
    await this.graph.publishNodeAdded(node);
    this.logger.info('learned', { type: experience.type, confidence, routing: 'permanent' });

    return {
      routing: 'permanent',
      nodeId: node.id,
      experienceId: experience.id,
      type: experience.type,
      confidence: experience.confidence,
      decayRate: experience.decayRate,
    };
  }

  // ==========================================================================
  // recall / crossref
  // ==========================================================================

  async recall(input: RecallInput = {}): Promise<RecallResult> {
    const limit = resolveLimit(input.limit, this.pagination);
    const topic = input.topic?.trim() || undefined;
    const { items, promotedNodeIds } = await this.searchWorkspace(
      topic,
      limit,
      input.minRelevance ?? 0
    );
    const ranked = this.ranker.rank(items, limit);
    return { topic: topic ?? null, count: ranked.length, items: ranked, promotedNodeIds };
  }

  /**
   * Recall over the problem text, fanned out read-only to peer workspaces
   */
  async crossref(input: CrossrefInput): Promise<RecallResult> {
    const problem = requireText(input.problem, 'problem');
    const limit = resolveLimit(input.limit, this.pagination);
    const minRelevance = input.minRelevance ?? CROSSREF_MIN_RELEVANCE;

    const local = await this.searchWorkspace(problem, limit, minRelevance);
    const items: RecallItem[] = [...local.items];

    if (this.peers.length > 0) {
      const peerItems = await withPeers(
        this.peers,
        {
          busyTimeoutMs: this.busyTimeoutMs,
          clock: this.clock,
          logger: this.logger,
          pagination: this.pagination,
        },
        async (peers) => {
          const perPeer = await Promise.all(
            peers.map(async (peer) => {
              try {
                const [nodes, hits] = await Promise.all([
                  peer.graph.query({ text: problem, limit }),
                  peer.experiences.peek({ text: problem, minRelevance, limit }),
                ]);
                return mergeWorkspaceItems(peer.name, nodes, hits);
              } catch (err) {
                this.logger.warn('peer workspace unavailable', { peer: peer.name, error: err });
                return [];
              }
            })
          );
          return perPeer.flat();
        }
      );
      items.push(...peerItems);
    }

    const ranked = this.ranker.rank(items, limit);
    return {
      topic: problem,
      count: ranked.length,
      items: ranked,
      promotedNodeIds: local.promotedNodeIds,
    };
  }

  private async searchWorkspace(
    text: string | undefined,
    limit: number,
    minRelevance: number
  ): Promise<{ items: RecallItem[]; promotedNodeIds: string[] }> {
    const [nodes, hits] = await Promise.all([
      this.graph.query({ text, limit }),
      this.experiences.search({ text, minRelevance, limit }),
    ]);
    const promoted = await this.promoteHits(hits);
    return {
      items: mergeWorkspaceItems(this.workspace, nodes, promoted.hits),
      promotedNodeIds: promoted.promotedNodeIds,
    };
  }

  /**
   * Run the promotion sweep and carry new node ids onto the hits
   */
  private async promoteHits(hits: ScoredExperience[]): Promise<ExperienceSearchResult> {
    const promoted = await this.promoter.sweep(hits.map((hit) => hit.experience));
    return {
      hits: hits.map((hit) => {
        const nodeId = promoted.get(hit.experience.id);
        if (nodeId === undefined) return hit;
        return {
          ...hit,
          experience: { ...hit.experience, promotedToNodeId: nodeId, needsPromotion: false },
        };
      }),
      promotedNodeIds: [...promoted.values()],
    };
  }

  // ==========================================================================
  // context / related / experience search
  // ==========================================================================

  /**
   * Routed nodes, then experiences over the same query. Experiences already
   * promoted into one of the nodes are left out.
   */
  async context(input: ContextInput): Promise<WorkspaceContext> {
    const detail = input.detail ?? 'summary';
    const resolved = await this.router.resolve(input.keywords, { detail, limit: input.limit });
    const { hits } = await this.promoteHits(
      await this.experiences.search({
        text: resolved.query,
        minRelevance: CONTEXT_MIN_RELEVANCE,
        limit: input.limit,
      })
    );

    const nodeIds = new Set(resolved.nodes.map((node) => node.id));
    const kept = hits.filter(
      ({ experience }) =>
        experience.promotedToNodeId === null || !nodeIds.has(experience.promotedToNodeId)
    );
    const experiences =
      detail === 'full' ? kept.map(toExperienceDetail) : kept.map(toExperienceSummary);

    return { ...resolved, count: resolved.nodes.length + experiences.length, experiences };
  }

  async related(input: RelatedInput): Promise<TraversalStep[]> {
    return this.graph.traverse(input.nodeId, {
      depth: input.depth ?? 1,
      edgeType: input.edgeType,
      mode: input.mode,
      direction: input.direction,
    });
  }

  /**
   * Experience search followed by the promotion sweep
   */
  async searchExperiences(query: ExperienceQuery = {}): Promise<ExperienceSearchResult> {
    return this.promoteHits(await this.experiences.search(query));
  }

  async promote(experienceId: string): Promise<Node | null> {
    const experience = await this.experiences.get(experienceId);
    return this.promoter.promote(experience);
  }
}
