/**
 * Keyword Extraction Tests
 */

import { describe, it, expect } from 'vitest';
import { extractKeywords, STOP_WORDS, toFtsQuery } from '../../utils/keywords.js';

describe('extractKeywords', () => {
  it('should drop stop words and short tokens', () => {
    expect(extractKeywords('The quick brown fox and the lazy dog')).toEqual([
      'quick',
      'brown',
      'fox',
      'lazy',
      'dog',
    ]);
  });

  it('should lower-case and de-duplicate in order', () => {
    expect(extractKeywords('Redis REDIS redis cache Cache')).toEqual(['redis', 'cache']);
  });

  it('should keep hyphens and underscores inside tokens', () => {
    expect(extractKeywords('node-gyp build_flags, go!')).toEqual(['node-gyp', 'build_flags']);
  });

  it('should cap at the keyword limit', () => {
    expect(extractKeywords('alpha beta gamma delta', 2)).toEqual(['alpha', 'beta']);
  });

  it('should return nothing for stop words only', () => {
    expect(extractKeywords('what is it to be')).toEqual([]);
  });

  it('should load the stop word list from disk', () => {
    expect(STOP_WORDS.has('the')).toBe(true);
    expect(STOP_WORDS.has('redis')).toBe(false);
  });
});

describe('toFtsQuery', () => {
  it('should quote keywords and join them with OR', () => {
    expect(toFtsQuery('Redis cache eviction')).toBe('"redis" OR "cache" OR "eviction"');
  });

  it('should drop FTS operators', () => {
    expect(toFtsQuery('near redis')).toBe('"redis"');
  });

  it('should return null when no keyword is left', () => {
    expect(toFtsQuery('to be or not')).toBeNull();
  });
});
