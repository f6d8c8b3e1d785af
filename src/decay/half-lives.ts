/**
 * Half-Lives Configuration
 *
 * Base half-life per experience type, shortened by the confidence
 * multiplier: a low-confidence fact fades four times as fast.
 */

import type { Confidence, ExperienceType } from '../types/index.js';

/**
 * Half-lives in days for high-confidence experiences
 */
export const HALF_LIVES: Record<ExperienceType, number> = {
  solution: 200,
  pattern: 300,   // Patterns stay true longest
  decision: 100,
  workaround: 50, // Workarounds go stale fast
  gotcha: 200,
};

/**
 * Decay speed-up per confidence tier
 */
export const CONFIDENCE_MULTIPLIERS: Record<Confidence, number> = {
  high: 1,
  medium: 2,
  low: 4,
};

/**
 * Default threshold below which an experience is prunable
 */
export const DEFAULT_PRUNE_THRESHOLD = 0.01;

/**
 * Access count at which an experience qualifies for promotion
 */
export const DEFAULT_PROMOTION_THRESHOLD = 5;
