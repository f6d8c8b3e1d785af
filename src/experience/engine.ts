/**
 * Experience Engine
 *
 * Decaying memories. Relevance is computed on read from the stored score,
 * decay rate and age; every search hit counts as an access, and enough
 * accesses flag the experience for promotion into the graph. The engine
 * never creates nodes itself.
 */

import { invalidArgument, notFound } from '../errors/index.js';
import { DecayCalculator } from '../decay/calculator.js';
import { DEFAULT_PROMOTION_THRESHOLD, DEFAULT_PRUNE_THRESHOLD } from '../decay/half-lives.js';
import type { IKnowledgeStore } from '../storage/interface.js';
import {
  isConfidence,
  isExperienceType,
  type Confidence,
  type Experience,
  type ExperienceInput,
  type ExperienceQuery,
  type ExperienceType,
  type ScoredExperience,
} from '../types/index.js';
import { generateExperienceId } from '../utils/id-generator.js';
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

export interface ExperienceEngineOptions {
  clock?: Clock;
  logger?: Logger;
  decay?: DecayCalculator;
  pagination?: PaginationLimits;
  promotionThreshold?: number;
  pruneThreshold?: number;
}

/**
 * Experience engine
 */
export class ExperienceEngine {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly decay: DecayCalculator;
  private readonly pagination: PaginationLimits;
  readonly promotionThreshold: number;
  private readonly pruneThreshold: number;

  constructor(
    private store: IKnowledgeStore,
    options: ExperienceEngineOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.decay = options.decay ?? new DecayCalculator();
    this.pagination = options.pagination ?? DEFAULT_PAGINATION;
    this.promotionThreshold = options.promotionThreshold ?? DEFAULT_PROMOTION_THRESHOLD;
    this.pruneThreshold = options.pruneThreshold ?? DEFAULT_PRUNE_THRESHOLD;
  }

  decayRateFor(type: ExperienceType, confidence: Confidence): number {
    return this.decay.decayRateFor(type, confidence);
  }

  /**
   * Current relevance; `now` defaults to the engine clock
   */
  relevance(experience: Experience, now: Date = this.clock()): number {
    return this.decay.relevance(experience, now);
  }

  /**
   * Validate input and build an experience without persisting it
   */
  buildExperience(input: ExperienceInput): Experience {
    const content = requireText(input.content, 'content');
    if (!isExperienceType(input.type)) {
      throw invalidArgument(`Invalid experience type: ${String(input.type)}`);
    }
    const confidence = input.confidence ?? 'high';
    if (!isConfidence(confidence)) {
      throw invalidArgument(`Invalid confidence: ${String(confidence)}`);
    }
    const context = input.context?.trim();

    return {
      id: generateExperienceId(),
      type: input.type,
      content,
      context: context ? context : null,
      confidence,
      tags: normalizeTags(input.tags),
      score: 1.0,
      decayRate: this.decayRateFor(input.type, confidence),
      accessCount: 0,
      needsPromotion: false,
      promotedToNodeId: null,
      createdAt: isoNow(this.clock),
      lastAccessed: null,
    };
  }

  async save(input: ExperienceInput): Promise<Experience> {
    const experience = this.buildExperience(input);
    await this.store.insertExperience(experience);
    this.logger.debug('experience saved', { id: experience.id, type: experience.type });
    return experience;
  }

  async get(id: string): Promise<Experience> {
    const experience = await this.store.getExperience(id);
    if (!experience) throw notFound('Experience', id);
    return experience;
  }

  /**
   * Ranked search; every returned hit counts as one access
   */
  async search(query: ExperienceQuery = {}): Promise<ScoredExperience[]> {
    const page = await this.rank(query);
    if (page.length === 0) return page;

    const updated = await this.store.recordAccess(
      page.map((hit) => hit.experience.id),
      isoNow(this.clock),
      this.promotionThreshold
    );
    const byId = new Map(updated.map((e) => [e.id, e]));
    return page.map((hit) => ({
      experience: byId.get(hit.experience.id) ?? hit.experience,
      relevance: hit.relevance,
    }));
  }

  /**
   * Same as search without counting accesses
   */
  async peek(query: ExperienceQuery = {}): Promise<ScoredExperience[]> {
    return this.rank(query);
  }

  promoteCheck(experience: Experience): boolean {
    return (
      experience.accessCount >= this.promotionThreshold && experience.promotedToNodeId === null
    );
  }

  /**
   * Delete every experience whose relevance is strictly below the threshold
   */
  async prune(threshold: number = this.pruneThreshold): Promise<number> {
    requireUnitInterval(threshold, 'threshold');
    const now = this.clock();
    const all = await this.store.findExperiences({});
    const stale = all.filter((e) => this.decay.relevance(e, now) < threshold).map((e) => e.id);
    const removed = await this.store.deleteExperiences(stale);
    this.logger.info('pruned experiences', { threshold, removed });
    return removed;
  }

  private async rank(query: ExperienceQuery): Promise<ScoredExperience[]> {
    const limit = resolveLimit(query.limit, this.pagination);
    const offset = resolveOffset(query.offset);
    const minRelevance = requireUnitInterval(query.minRelevance ?? 0, 'minRelevance');
    if (query.type !== undefined && !isExperienceType(query.type)) {
      throw invalidArgument(`Invalid experience type: ${String(query.type)}`);
    }

    const now = this.clock();
    const candidates = await this.store.findExperiences({ text: query.text, type: query.type });

    return candidates
      .map((experience) => ({ experience, relevance: this.decay.relevance(experience, now) }))
      .filter((hit) => hit.relevance >= minRelevance)
      .sort(
        (a, b) =>
          b.relevance - a.relevance ||
          b.experience.createdAt.localeCompare(a.experience.createdAt) ||
          a.experience.id.localeCompare(b.experience.id)
      )
      .slice(offset, offset + limit);
  }
}
