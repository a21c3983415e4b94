/**
 * Similarity Ratio Tests
 */

import { describe, it, expect } from 'vitest';
import { similarityRatio } from '../../../normalization/similarity.js';

describe('similarityRatio', () => {
  it('should score identical strings 100', () => {
    expect(similarityRatio('springfield', 'springfield')).toBe(100);
  });

  it('should score 0 when either side is empty', () => {
    expect(similarityRatio('', 'springfield')).toBe(0);
    expect(similarityRatio('springfield', '')).toBe(0);
    expect(similarityRatio('', '')).toBe(0);
  });

  it('should score 0 for strings with no characters in common', () => {
    expect(similarityRatio('abc', 'xyz')).toBe(0);
  });

  it('should use the insertion/deletion ratio', () => {
    // LCS("kitten", "sitting") = 4 ("ittn"): 200 * 4 / 13 = 61.5
    expect(similarityRatio('kitten', 'sitting')).toBe(62);
    // LCS = 8: 200 * 8 / 19 = 84.2
    expect(similarityRatio('saint louis', 'st louis')).toBe(84);
    // LCS("springfield", "chicago") = 2 ("ig"): 200 * 2 / 18 = 22.2
    expect(similarityRatio('springfield', 'chicago')).toBe(22);
  });

  it('should be symmetric', () => {
    expect(similarityRatio('sitting', 'kitten')).toBe(similarityRatio('kitten', 'sitting'));
    expect(similarityRatio('st louis', 'saint louis')).toBe(similarityRatio('saint louis', 'st louis'));
  });

  it('should be case sensitive (callers normalize first)', () => {
    expect(similarityRatio('ABC', 'abc')).toBe(0);
  });
});
