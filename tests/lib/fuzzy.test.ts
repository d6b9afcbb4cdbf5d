import { describe, it, expect } from 'vitest';
import { levenshteinDistance, getConfidence } from '../../src/lib/fuzzy.js';

describe('Fuzzy Matching', () => {
  describe('levenshteinDistance', () => {
    it('should return 0 for identical strings', () => {
      expect(levenshteinDistance('Karma Police', 'Karma Police')).toBe(0);
      expect(levenshteinDistance('', '')).toBe(0);
    });

    it('should return the other length for an empty string', () => {
      expect(levenshteinDistance('', 'abc')).toBe(3);
      expect(levenshteinDistance('abcd', '')).toBe(4);
    });

    it('should count insertions, deletions and substitutions', () => {
      expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
      expect(levenshteinDistance('flaw', 'lawn')).toBe(2);
      expect(levenshteinDistance('Song', 'Songs')).toBe(1);
    });

    it('should be case sensitive', () => {
      expect(levenshteinDistance('Yesterday', 'yesterday')).toBe(1);
    });

    it('should compare by code point', () => {
      expect(levenshteinDistance('café', 'cafe')).toBe(1);
      expect(levenshteinDistance('😀a', 'a')).toBe(1);
    });
  });

  describe('getConfidence', () => {
    it.each([
      [0, 'exact'],
      [1, 'high'],
      [2, 'high'],
      [3, 'medium'],
      [5, 'medium'],
      [6, 'low'],
    ])('should label distance %i as %s', (distance, expected) => {
      expect(getConfidence(distance)).toBe(expected);
    });
  });
});
