/**
 * Concept-Aware Query Builder
 *
 * Turns free text into a PubMed boolean expression. With concepts enabled,
 * token spans are resolved against the terminology service and each resolved
 * span becomes an OR group of its MeSH heading, canonical name and a few
 * synonyms. Tokens no span covers fall back to their literal text, so a text
 * with no resolvable span renders exactly as the literal path would.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/query/concept-query-builder
 */

import { RELATIONSHIP_CUE_TERMS, RELATIONSHIP_TYPES, type RelationshipType } from '../../models/graph.js';
import { MCPError, emptyQueryError } from '../../server/errors.js';
import type { ResolvedConcept, TerminologyResolver } from '../collaborators.js';
import { ngrams, splitSegments, type QuerySegment } from './tokenizer.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ConceptUsage {
  surface_form: string;
  canonical_term: string;
  concept_id: string;
}

export interface BuiltQuery {
  query: string;
  concepts_used: ConceptUsage[];
}

export interface BuildOptions {
  useConcepts: boolean;
}

export interface ConceptQueryBuilderOptions {
  /** Longest span looked up, in tokens */
  maxNgram?: number;
  /** Best match must score at least this */
  minRelevance?: number;
  /** Synonyms added to each concept group */
  maxSynonyms?: number;
}

interface SpanMatch {
  start: number;
  end: number;
  surface: string;
  concept: ResolvedConcept;
}

const DEFAULT_MAX_NGRAM = 3;
const DEFAULT_MIN_RELEVANCE = 0.8;
const DEFAULT_MAX_SYNONYMS = 3;

// ═══════════════════════════════════════════════════════════════════════════════
// RENDERING HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function cleanTerm(term: string): string {
  return term.replace(/"/g, '').replace(/\s+/g, ' ').trim();
}

/**
 * Highest score first, then shorter canonical name, then concept id. Every
 * place that picks one concept out of several sorts with this.
 */
export function compareConcepts(a: ResolvedConcept, b: ResolvedConcept): number {
  if (a.relevance_score !== b.relevance_score) {
    return b.relevance_score - a.relevance_score;
  }
  if (a.canonical_name.length !== b.canonical_name.length) {
    return a.canonical_name.length - b.canonical_name.length;
  }
  if (a.concept_id === b.concept_id) return 0;
  return a.concept_id < b.concept_id ? -1 : 1;
}

function joinParts(parts: string[]): string {
  return parts.length === 1 ? parts[0] : `(${parts.join(' AND ')})`;
}

function joinSegments(clauses: Array<{ operator: QuerySegment['operator']; clause: string }>): string {
  let query = '';
  for (const { operator, clause } of clauses) {
    query = query.length === 0 ? clause : `${query} ${operator ?? 'AND'} ${clause}`;
  }
  return query;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BUILDER
// ═══════════════════════════════════════════════════════════════════════════════

export class ConceptQueryBuilder {
  private readonly maxNgram: number;
  private readonly minRelevance: number;
  private readonly maxSynonyms: number;

  constructor(
    private readonly resolver: TerminologyResolver | null,
    options: ConceptQueryBuilderOptions = {}
  ) {
    this.maxNgram = Math.max(1, options.maxNgram ?? DEFAULT_MAX_NGRAM);
    this.minRelevance = options.minRelevance ?? DEFAULT_MIN_RELEVANCE;
    this.maxSynonyms = Math.max(0, options.maxSynonyms ?? DEFAULT_MAX_SYNONYMS);
  }

  /** True when concept lookups are possible */
  get hasResolver(): boolean {
    return this.resolver !== null;
  }

  /**
   * @throws MCPError EMPTY_QUERY when no content token remains
   * @throws MCPError CONFIGURATION_ERROR when concepts are requested without a resolver
   */
  async build(text: string, options: BuildOptions): Promise<BuiltQuery> {
    const segments = splitSegments(text);
    if (segments.length === 0) {
      throw emptyQueryError(text);
    }

    if (!options.useConcepts) {
      return {
        query: joinSegments(segments.map((s) => ({ operator: s.operator, clause: joinParts(s.tokens) }))),
        concepts_used: [],
      };
    }

    const resolver = this.resolver;
    if (resolver === null) {
      throw new MCPError(
        'CONFIGURATION_ERROR',
        'Concept-aware queries need a terminology service. Set UMLS_API_KEY or pass use_concepts=false.'
      );
    }

    // One lookup per distinct surface form within a build
    const lookups = new Map<string, Promise<ResolvedConcept[]>>();
    const resolve = (surface: string): Promise<ResolvedConcept[]> => {
      let pending = lookups.get(surface);
      if (pending === undefined) {
        pending = resolver.resolve(surface);
        lookups.set(surface, pending);
      }
      return pending;
    };

    const clauses: Array<{ operator: QuerySegment['operator']; clause: string }> = [];
    const conceptsUsed: ConceptUsage[] = [];
    const seenConcepts = new Set<string>();

    for (const segment of segments) {
      const matches = await this.matchSegment(segment.tokens, resolve);
      const parts: string[] = [];

      let index = 0;
      let matchIndex = 0;
      while (index < segment.tokens.length) {
        const match = matches[matchIndex];
        if (match !== undefined && match.start === index) {
          parts.push(this.renderConcept(match.concept));
          if (!seenConcepts.has(match.concept.concept_id)) {
            seenConcepts.add(match.concept.concept_id);
            conceptsUsed.push({
              surface_form: match.surface,
              canonical_term: match.concept.canonical_name,
              concept_id: match.concept.concept_id,
            });
          }
          index = match.end;
          matchIndex++;
        } else {
          parts.push(segment.tokens[index]);
          index++;
        }
      }

      clauses.push({ operator: segment.operator, clause: joinParts(parts) });
    }

    return { query: joinSegments(clauses), concepts_used: conceptsUsed };
  }

  /**
   * Longest spans first; all spans of one length resolve concurrently, then
   * are consumed left to right. Returned matches are sorted by start.
   */
  private async matchSegment(
    tokens: readonly string[],
    resolve: (surface: string) => Promise<ResolvedConcept[]>
  ): Promise<SpanMatch[]> {
    const consumed = new Array<boolean>(tokens.length).fill(false);
    const matches: SpanMatch[] = [];
    const isFree = (start: number, end: number): boolean => {
      for (let i = start; i < end; i++) {
        if (consumed[i]) return false;
      }
      return true;
    };

    for (let n = Math.min(this.maxNgram, tokens.length); n >= 1; n--) {
      const spans = ngrams(tokens, n).filter((span) => isFree(span.start, span.end));
      if (spans.length === 0) continue;

      const results = await Promise.all(spans.map((span) => resolve(span.text)));

      spans.forEach((span, i) => {
        if (!isFree(span.start, span.end)) return;
        const best = this.pickBest(results[i]);
        if (best === null) return;
        for (let t = span.start; t < span.end; t++) consumed[t] = true;
        matches.push({ start: span.start, end: span.end, surface: span.text, concept: best });
      });
    }

    return matches.sort((a, b) => a.start - b.start);
  }

  private pickBest(candidates: readonly ResolvedConcept[]): ResolvedConcept | null {
    const eligible = candidates.filter(
      (c) => c.concept_id.length > 0 && cleanTerm(c.canonical_name).length > 0 && c.relevance_score >= this.minRelevance
    );
    if (eligible.length === 0) return null;
    return [...eligible].sort(compareConcepts)[0];
  }

  private renderConcept(concept: ResolvedConcept): string {
    const terms: string[] = [];
    const mesh = concept.mesh_heading ? cleanTerm(concept.mesh_heading) : '';
    if (mesh.length > 0) {
      terms.push(`"${mesh}"[MeSH Terms]`);
    }

    const canonical = cleanTerm(concept.canonical_name).toLowerCase();
    terms.push(`"${canonical}"[Title/Abstract]`);

    const seen = new Set<string>([canonical]);
    let added = 0;
    for (const synonym of concept.synonyms) {
      if (added >= this.maxSynonyms) break;
      const cleaned = cleanTerm(synonym).toLowerCase();
      if (cleaned.length === 0 || seen.has(cleaned)) continue;
      seen.add(cleaned);
      terms.push(`"${cleaned}"[Title/Abstract]`);
      added++;
    }

    return terms.length === 1 ? terms[0] : `(${terms.join(' OR ')})`;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RELATIONSHIP CUE TERMS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * AND an OR group of relationship cue words onto a query.
 *
 * withRelationshipTerms('aneurysm', ['MECHANISTIC_LINK'])
 *   -> '(aneurysm) AND (mechanism[Title/Abstract] OR pathway[Title/Abstract])'
 */
export function withRelationshipTerms(query: string, relationshipTypes: readonly RelationshipType[]): string {
  const terms: string[] = [];
  for (const type of RELATIONSHIP_TYPES) {
    if (!relationshipTypes.includes(type)) continue;
    for (const term of RELATIONSHIP_CUE_TERMS[type]) {
      if (!terms.includes(term)) terms.push(term);
    }
  }
  if (terms.length === 0) return query;
  const group = terms.map((t) => `${t}[Title/Abstract]`).join(' OR ');
  return `(${query}) AND (${group})`;
}
