import { describe, it, expect } from 'vitest';
import {
  categoryForSemanticTypes,
  hasAllowedSemanticType,
  tuiFromUri,
} from '../../../../src/services/umls/semantic-types.js';

describe('tuiFromUri', () => {
  it('extracts the TUI', () => {
    expect(tuiFromUri('https://uts-ws.nlm.nih.gov/rest/semantic-network/2024AA/TUI/T047')).toBe('T047');
  });

  it('returns null for other URIs', () => {
    expect(tuiFromUri('https://example.org/T047')).toBeNull();
  });
});

describe('hasAllowedSemanticType', () => {
  it('accepts any allowed TUI', () => {
    expect(hasAllowedSemanticType(['T019', 'T116'])).toBe(true);
    expect(hasAllowedSemanticType(['T019'])).toBe(false);
  });
});

describe('categoryForSemanticTypes', () => {
  it('uses the first mapped TUI', () => {
    expect(categoryForSemanticTypes(['T999', 'T116', 'T047'])).toBe('Molecular');
  });

  it('falls back to Concept', () => {
    expect(categoryForSemanticTypes([])).toBe('Concept');
  });
});
