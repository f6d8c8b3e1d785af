/**
 * Experience Types
 *
 * Decaying memories. Relevance falls exponentially with age, at a rate
 * derived from the experience type and the caller's confidence.
 */

export const EXPERIENCE_TYPES = ['solution', 'pattern', 'decision', 'workaround', 'gotcha'] as const;
export type ExperienceType = (typeof EXPERIENCE_TYPES)[number];

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const;
export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

export interface Experience {
  id: string;
  type: ExperienceType;
  content: string;
  context: string | null;
  confidence: Confidence;
  tags: string[];
  /** Relevance at creation time */
  score: number;
  /** Per-day exponential decay constant */
  decayRate: number;
  accessCount: number;
  /** Set once the access threshold is reached and no promotion happened yet */
  needsPromotion: boolean;
  promotedToNodeId: string | null;
  createdAt: string;
  lastAccessed: string | null;
}

export interface ExperienceInput {
  content: string;
  type: ExperienceType;
  context?: string;
  confidence?: Confidence;
  tags?: string[];
}

export interface ExperienceQuery {
  text?: string;
  type?: ExperienceType;
  minRelevance?: number;
  limit?: number;
  offset?: number;
}

/**
 * An experience with its relevance at query time
 */
export interface ScoredExperience {
  experience: Experience;
  relevance: number;
}

/**
 * Link between a node and the experience it was derived from
 */
export interface ExperienceLink {
  nodeId: string;
  experienceId: string;
  type: 'derived-from';
  createdAt: string;
}

export function isExperienceType(value: string): value is ExperienceType {
  return EXPERIENCE_TYPES.some((item) => item === value);
}

export function isConfidence(value: string): value is Confidence {
  return CONFIDENCE_LEVELS.some((item) => item === value);
}
