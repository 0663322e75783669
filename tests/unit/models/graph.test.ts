import { describe, it, expect } from 'vitest';
import {
  EvidenceSchema,
  GraphConstraintsSchema,
  SEED_ENTITIES,
  createEvidence,
  dedupeEvidence,
  edgeKey,
} from '../../../src/models/graph.js';

describe('createEvidence', () => {
  it('trims the source id and freezes the record', () => {
    const evidence = createEvidence(' 12345 ', 'MMP-9 is elevated.', '2024-01-01T00:00:00.000Z');
    expect(evidence).toEqual({
      source_id: '12345',
      sentence: 'MMP-9 is elevated.',
      retrieved_at: '2024-01-01T00:00:00.000Z',
    });
    expect(Object.isFrozen(evidence)).toBe(true);
  });
});

describe('EvidenceSchema', () => {
  it('rejects a whitespace-only source id', () => {
    expect(EvidenceSchema.safeParse({ source_id: ' ' }).success).toBe(false);
  });

  it('trims the source id and defaults the sentence', () => {
    expect(EvidenceSchema.parse({ source_id: ' 101 ' })).toEqual({ source_id: '101', sentence: '' });
  });
});

describe('dedupeEvidence', () => {
  it('keeps the first occurrence of each source', () => {
    const first = createEvidence('1', 'first');
    const result = dedupeEvidence([first, createEvidence('2', 'b'), createEvidence('1', 'again')]);
    expect(result.map((e) => e.sentence)).toEqual(['first', 'b']);
    expect(result[0]).toBe(first);
  });
});

describe('edgeKey', () => {
  it('joins source, type and target', () => {
    expect(edgeKey('a', 'CAUSES', 'b')).toBe('a->CAUSES->b');
  });
});

describe('GraphConstraintsSchema', () => {
  it('applies defaults', () => {
    expect(GraphConstraintsSchema.parse({})).toEqual({ maxDepth: 2, maxNodes: 30, minPubmedCitations: 2 });
  });

  it('rejects a node limit below the seed count', () => {
    expect(GraphConstraintsSchema.safeParse({ maxNodes: 2 }).success).toBe(false);
  });
});

describe('SEED_ENTITIES', () => {
  it('has the three session seeds', () => {
    expect(SEED_ENTITIES.map((s) => s.label)).toEqual([
      'Intracranial Aneurysm Rupture',
      'Inflammation',
      'Hemodynamics',
    ]);
  });
});
