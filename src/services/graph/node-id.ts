/**
 * Stable node ids derived from labels.
 *
 * @module services/graph/node-id
 */

import { validationError } from '../../server/errors.js';

const GREEK_LETTERS: Readonly<Record<string, string>> = {
  α: 'alpha',
  β: 'beta',
  γ: 'gamma',
  δ: 'delta',
  ε: 'epsilon',
  ζ: 'zeta',
  η: 'eta',
  θ: 'theta',
  ι: 'iota',
  κ: 'kappa',
  λ: 'lambda',
  μ: 'mu',
  ν: 'nu',
  ξ: 'xi',
  ο: 'omicron',
  π: 'pi',
  ρ: 'rho',
  σ: 'sigma',
  ς: 'sigma',
  τ: 'tau',
  υ: 'upsilon',
  φ: 'phi',
  χ: 'chi',
  ψ: 'psi',
  ω: 'omega',
};

function slugify(label: string): string {
  return label
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[\u03b1-\u03c9]/g, (letter) => GREEK_LETTERS[letter] ?? '')
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Normalize a label to its node id slug. Greek letters are spelled out so
 * that variants such as TNF-α and TNF-β keep distinct ids.
 *
 * "Intracranial Aneurysm Rupture" -> "intracranial_aneurysm_rupture"
 * "TNF-α Signaling" -> "tnf_alpha_signaling"
 *
 * @throws MCPError VALIDATION_ERROR when nothing alphanumeric remains
 */
export function toNodeId(label: string): string {
  const slug = slugify(label);
  if (slug.length === 0) {
    throw validationError(`Label "${label}" does not normalize to a usable node id`, { label });
  }
  return slug;
}

/** True when toNodeId would accept the label */
export function hasNodeId(label: string): boolean {
  return slugify(label).length > 0;
}
