/**
 * Query Text Tokenizer
 *
 * Whitespace split, edge punctuation strip, lower-case, stop word removal.
 * "and" / "or" are kept out of the token stream and become segment
 * boundaries carrying the boolean operator written in the text.
 *
 * @module services/query/tokenizer
 */

import { z } from 'zod';
import { readJsonFile } from '../../utils/data-files.js';

export const STOP_WORDS: ReadonlySet<string> = new Set(
  readJsonFile('stop-words.json', z.array(z.string().min(1)))
);

const EDGE_PUNCTUATION = /^[.,;:!?()[\]{}"'`-]+|[.,;:!?()[\]{}"'`-]+$/g;

export type SegmentOperator = 'AND' | 'OR';

export interface QuerySegment {
  /** Operator joining this segment to the previous one; null for the first */
  operator: SegmentOperator | null;
  tokens: string[];
}

export interface TokenSpan {
  start: number;
  /** Exclusive */
  end: number;
  text: string;
}

/**
 * Split, strip and lower-case. Tokens that are only punctuation are dropped.
 */
export function normalizeTokens(text: string): string[] {
  return text
    .split(/\s+/)
    .map((raw) => raw.replace(EDGE_PUNCTUATION, '').toLowerCase())
    .filter((token) => token.length > 0);
}

export function isStopWord(token: string): boolean {
  return STOP_WORDS.has(token);
}

/**
 * Content tokens only: normalized, conjunctions and stop words removed.
 */
export function tokenize(text: string): string[] {
  return normalizeTokens(text).filter((token) => !isStopWord(token));
}

/**
 * Break text into conjunction-separated segments of content tokens.
 * Segments left empty after stop word removal are dropped; the first
 * surviving segment has no operator.
 */
export function splitSegments(text: string): QuerySegment[] {
  const segments: QuerySegment[] = [];
  let current: QuerySegment = { operator: null, tokens: [] };

  const flush = (): void => {
    if (current.tokens.length === 0) return;
    segments.push({
      operator: segments.length === 0 ? null : current.operator,
      tokens: current.tokens,
    });
  };

  for (const token of normalizeTokens(text)) {
    if (token === 'and' || token === 'or') {
      flush();
      current = { operator: token === 'and' ? 'AND' : 'OR', tokens: [] };
      continue;
    }
    if (!isStopWord(token)) {
      current.tokens.push(token);
    }
  }
  flush();

  return segments;
}

/**
 * All contiguous windows of exactly n tokens, left to right.
 */
export function ngrams(tokens: readonly string[], n: number): TokenSpan[] {
  const spans: TokenSpan[] = [];
  if (n < 1) return spans;
  for (let start = 0; start + n <= tokens.length; start++) {
    spans.push({ start, end: start + n, text: tokens.slice(start, start + n).join(' ') });
  }
  return spans;
}
