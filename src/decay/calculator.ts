/**
 * Decay Calculator
 *
 * Exponential decay computed lazily on read. Nothing stored ever changes
 * as time passes; relevance is a pure function of the experience and now.
 */

import type { Confidence, Experience, ExperienceType } from '../types/index.js';
import { ageInDays } from '../utils/time.js';
import { CONFIDENCE_MULTIPLIERS, HALF_LIVES } from './half-lives.js';

export interface DecaySettings {
  halfLives?: Record<ExperienceType, number>;
  confidenceMultipliers?: Record<Confidence, number>;
}

/**
 * Decay calculator
 */
export class DecayCalculator {
  private readonly halfLives: Record<ExperienceType, number>;
  private readonly multipliers: Record<Confidence, number>;

  constructor(settings: DecaySettings = {}) {
    this.halfLives = settings.halfLives ?? HALF_LIVES;
    this.multipliers = settings.confidenceMultipliers ?? CONFIDENCE_MULTIPLIERS;
  }

  /**
   * Effective half-life in days
   */
  halfLifeFor(type: ExperienceType, confidence: Confidence): number {
    return this.halfLives[type] / this.multipliers[confidence];
  }

  /**
   * ln(2) / effective half-life
   */
  decayRateFor(type: ExperienceType, confidence: Confidence): number {
    return Math.LN2 / this.halfLifeFor(type, confidence);
  }

  /**
   * score × e^(−rate × age). Equals score at age 0, never negative.
   */
  relevance(experience: Pick<Experience, 'score' | 'decayRate' | 'createdAt'>, now: Date): number {
    const age = ageInDays(experience.createdAt, now);
    return Math.max(0, experience.score * Math.exp(-experience.decayRate * age));
  }
}
