/**
 * Term-to-name relevance scoring for terminology search results.
 *
 * @module services/umls/similarity
 */

function bigrams(value: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < value.length - 1; i++) {
    const pair = value.slice(i, i + 2);
    counts.set(pair, (counts.get(pair) ?? 0) + 1);
  }
  return counts;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Sørensen–Dice coefficient over character bigrams (multiset intersection).
 */
export function diceCoefficient(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;

  const left = bigrams(a);
  const right = bigrams(b);
  let overlap = 0;
  for (const [pair, count] of left) {
    overlap += Math.min(count, right.get(pair) ?? 0);
  }
  return (2 * overlap) / (a.length - 1 + (b.length - 1));
}

/**
 * 1.0 for an exact (case-insensitive) match; otherwise Dice plus 0.15 when
 * the term is inside the name and 0.1 when the name is inside the term,
 * capped at 1.
 */
export function similarityScore(term: string, name: string): number {
  const t = term.toLowerCase().trim();
  const n = name.toLowerCase().trim();
  if (t === n) return 1;

  let score = diceCoefficient(t, n);
  if (t.length > 0 && n.includes(t)) score = Math.min(1, score + 0.15);
  if (n.length > 0 && t.includes(n)) score = Math.min(1, score + 0.1);
  return round4(score);
}

/** Rank is 1-based */
export function positionScore(rank: number): number {
  return round4(1 / (1 + 0.1 * (rank - 1)));
}

export function combinedScore(similarity: number, position: number): number {
  return round4(0.7 * similarity + 0.3 * position);
}
