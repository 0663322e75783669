import { describe, it, expect } from 'vitest';
import {
  isStopWord,
  ngrams,
  normalizeTokens,
  splitSegments,
  tokenize,
} from '../../../../src/services/query/tokenizer.js';

describe('normalizeTokens', () => {
  it('strips edge punctuation and lower-cases', () => {
    expect(normalizeTokens('What causes (aneurysm) rupture?')).toEqual(['what', 'causes', 'aneurysm', 'rupture']);
  });

  it('keeps inner punctuation', () => {
    expect(normalizeTokens('"MMP-9," IL-6.')).toEqual(['mmp-9', 'il-6']);
  });

  it('drops punctuation-only tokens', () => {
    expect(normalizeTokens('  -- ... ')).toEqual([]);
  });
});

describe('tokenize', () => {
  it('removes stop words', () => {
    expect(tokenize('What causes the rupture of an aneurysm')).toEqual(['causes', 'rupture', 'aneurysm']);
  });

  it('loads the stop word list', () => {
    expect(isStopWord('the')).toBe(true);
    expect(isStopWord('aneurysm')).toBe(false);
  });
});

describe('splitSegments', () => {
  it('splits on and/or and carries the operator', () => {
    expect(splitSegments('inflammation and the MMP-9 or hemodynamics')).toEqual([
      { operator: null, tokens: ['inflammation'] },
      { operator: 'AND', tokens: ['mmp-9'] },
      { operator: 'OR', tokens: ['hemodynamics'] },
    ]);
  });

  it('drops empty segments and clears the operator of the first survivor', () => {
    expect(splitSegments('the and inflammation')).toEqual([{ operator: null, tokens: ['inflammation'] }]);
  });

  it('returns nothing for stop-word-only text', () => {
    expect(splitSegments('what is the')).toEqual([]);
  });
});

describe('ngrams', () => {
  it('returns windows of exactly n tokens', () => {
    expect(ngrams(['a', 'b', 'c'], 2)).toEqual([
      { start: 0, end: 2, text: 'a b' },
      { start: 1, end: 3, text: 'b c' },
    ]);
  });

  it('returns nothing when n exceeds the token count', () => {
    expect(ngrams(['a'], 2)).toEqual([]);
  });
});
