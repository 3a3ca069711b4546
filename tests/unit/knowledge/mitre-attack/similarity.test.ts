import { describe, it, expect } from 'vitest';
import { levenshtein, normalizeForMatch, similarity } from '@/knowledge/mitre-attack/similarity.js';

describe('normalizeForMatch', () => {
  it('lower-cases and collapses whitespace', () => {
    expect(normalizeForMatch('  Cozy \t  Bear ')).toBe('cozy bear');
  });
});

describe('levenshtein', () => {
  it('computes edit distance', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('apt1', 'aptt1')).toBe(1);
  });

  it('handles empty strings', () => {
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('abc', '')).toBe(3);
    expect(levenshtein('', '')).toBe(0);
  });
});

describe('similarity', () => {
  it('scores identical strings as 1 regardless of case and spacing', () => {
    expect(similarity('APT1', 'apt1')).toBe(1);
    expect(similarity('Cozy  Bear', 'cozy bear')).toBe(1);
  });

  it('scores 0 when either side is empty', () => {
    expect(similarity('', 'APT1')).toBe(0);
    expect(similarity('APT1', '   ')).toBe(0);
  });

  it('uses normalized edit distance', () => {
    expect(similarity('Aptt1', 'APT1')).toBeCloseTo(0.8);
    expect(similarity('Lazarus Grup', 'Lazarus Group')).toBeCloseTo(12 / 13);
  });

  it('credits substring containment', () => {
    // "lazarus" inside "lazarus group": 7 of 13 characters
    expect(similarity('lazarus', 'Lazarus Group')).toBeCloseTo(7 / 13);
    expect(similarity('Fancy Bear Team', 'Fancy Bear')).toBeCloseTo(10 / 15);
  });

  it('is symmetric', () => {
    expect(similarity('sofacy', 'APT28')).toBe(similarity('APT28', 'sofacy'));
  });
});
