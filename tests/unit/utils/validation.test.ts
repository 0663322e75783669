/**
 * Unit Tests for input validation and path sanitization
 *
 * @module tests/unit/utils/validation
 */

import { describe, it, expect } from 'vitest';
import {
  GraphAddEdgeInput,
  PubMedSearchInput,
  ValidationError,
  sanitizePath,
  validateInput,
} from '../../../src/utils/validation.js';

describe('validateInput', () => {
  it('applies schema defaults', () => {
    const input = validateInput(PubMedSearchInput, { query: 'aneurysm' });
    expect(input).toEqual({ query: 'aneurysm', max_results: 20, smart_query: false, full_text_only: false });
  });

  it('lists every issue with its path', () => {
    expect(() =>
      validateInput(GraphAddEdgeInput, {
        source_node_id: 'a',
        target_node_id: 'b',
        relationship_type: 'INFLUENCES',
        evidence: [],
        confidence: 2,
      })
    ).toThrow('evidence: Array must contain at least 1 element(s); confidence: Number must be less than or equal to 1');
  });

  it('throws ValidationError', () => {
    expect(() => validateInput(PubMedSearchInput, {})).toThrow(ValidationError);
  });
});

describe('sanitizePath', () => {
  it('resolves paths inside an allowed directory', () => {
    expect(sanitizePath('/data/graphs/../graphs/g.json', ['/data'])).toBe('/data/graphs/g.json');
  });

  it('accepts the base directory itself', () => {
    expect(sanitizePath('/data', ['/data'])).toBe('/data');
  });

  it('rejects escapes and sibling prefixes', () => {
    expect(() => sanitizePath('/data/../etc/passwd', ['/data'])).toThrow(ValidationError);
    expect(() => sanitizePath('/database/g.json', ['/data'])).toThrow('outside allowed directories');
  });

  it('rejects null bytes', () => {
    expect(() => sanitizePath('/data/g\0.json', ['/data'])).toThrow('Path contains null bytes');
  });
});
