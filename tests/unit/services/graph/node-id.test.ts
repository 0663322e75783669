import { describe, it, expect } from 'vitest';
import { hasNodeId, toNodeId } from '../../../../src/services/graph/node-id.js';
import { MCPError } from '../../../../src/server/errors.js';

describe('toNodeId', () => {
  it('slugs a label', () => {
    expect(toNodeId('Intracranial Aneurysm Rupture')).toBe('intracranial_aneurysm_rupture');
  });

  it('collapses punctuation runs and trims underscores', () => {
    expect(toNodeId('  MMP-9 (gelatinase B)  ')).toBe('mmp_9_gelatinase_b');
  });

  it('strips accents', () => {
    expect(toNodeId("Ménière's Disease")).toBe('meniere_s_disease');
  });

  it('spells out Greek letters', () => {
    expect(toNodeId('TNF-α Signaling')).toBe('tnf_alpha_signaling');
    expect(toNodeId('NF-κB')).toBe('nf_kappab');
    expect(toNodeId('Β-Catenin')).toBe('beta_catenin');
  });

  it('keeps Greek-lettered variants apart', () => {
    expect(toNodeId('TNF-α')).not.toBe(toNodeId('TNF-β'));
    expect([toNodeId('TNF-α'), toNodeId('TNF-β')]).toEqual(['tnf_alpha', 'tnf_beta']);
  });

  it('rejects labels with nothing usable after transliteration', () => {
    expect(() => toNodeId('∞')).toThrow(MCPError);
  });

  it('rejects labels with nothing alphanumeric', () => {
    expect(() => toNodeId('---')).toThrow(MCPError);
  });

  it('agrees with hasNodeId', () => {
    expect(hasNodeId('β')).toBe(true);
    expect(hasNodeId('∞')).toBe(false);
  });
});
