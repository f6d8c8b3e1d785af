/**
 * Decay Calculator Tests
 */

import { describe, it, expect } from 'vitest';
import { DecayCalculator } from '../../decay/calculator.js';
import { CONFIDENCE_MULTIPLIERS, HALF_LIVES } from '../../decay/half-lives.js';
import { addDays } from '../fixtures.js';

const CREATED = '2026-01-01T00:00:00.000Z';

describe('DecayCalculator', () => {
  const calculator = new DecayCalculator();

  describe('half-lives', () => {
    it('should use the base half-life for high confidence', () => {
      expect(calculator.halfLifeFor('solution', 'high')).toBe(200);
      expect(calculator.halfLifeFor('pattern', 'high')).toBe(300);
      expect(calculator.halfLifeFor('decision', 'high')).toBe(100);
      expect(calculator.halfLifeFor('workaround', 'high')).toBe(50);
      expect(calculator.halfLifeFor('gotcha', 'high')).toBe(200);
    });

    it('should decay medium twice and low four times as fast', () => {
      const high = calculator.decayRateFor('solution', 'high');
      expect(calculator.decayRateFor('solution', 'medium')).toBeCloseTo(high * 2, 12);
      expect(calculator.decayRateFor('solution', 'low')).toBeCloseTo(high * 4, 12);
    });

    it('should derive the rate as ln 2 over the half-life', () => {
      expect(calculator.decayRateFor('workaround', 'low')).toBeCloseTo(Math.LN2 / 12.5, 12);
    });

    it('should honour configured half-lives', () => {
      const custom = new DecayCalculator({
        halfLives: { ...HALF_LIVES, decision: 10 },
        confidenceMultipliers: CONFIDENCE_MULTIPLIERS,
      });
      expect(custom.halfLifeFor('decision', 'medium')).toBe(5);
    });
  });

  describe('relevance', () => {
    const experience = (score = 1) => ({
      score,
      decayRate: calculator.decayRateFor('solution', 'high'),
      createdAt: CREATED,
    });

    it('should equal the score at creation', () => {
      expect(calculator.relevance(experience(0.8), new Date(CREATED))).toBe(0.8);
    });

    it('should halve after one half-life', () => {
      expect(calculator.relevance(experience(), addDays(CREATED, 200))).toBeCloseTo(0.5, 10);
      expect(calculator.relevance(experience(), addDays(CREATED, 400))).toBeCloseTo(0.25, 10);
    });

    it('should never increase with age', () => {
      let previous = Infinity;
      for (const days of [0, 1, 10, 100, 1000, 10000]) {
        const value = calculator.relevance(experience(), addDays(CREATED, days));
        expect(value).toBeLessThanOrEqual(previous);
        expect(value).toBeGreaterThanOrEqual(0);
        previous = value;
      }
    });

    it('should treat timestamps in the future as age zero', () => {
      expect(calculator.relevance(experience(), addDays(CREATED, -5))).toBe(1);
    });
  });
});
