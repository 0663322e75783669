/**
 * UMLS Terminology Services client
 *
 * Implements the TerminologyResolver contract over the UTS REST API:
 * word search with relevance scoring, atoms for synonyms and the MeSH
 * heading, and concept detail for semantic types.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/umls/client
 */

import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { MCPError, conceptNotFoundError } from '../../server/errors.js';
import { buildUrl, httpGetText, parseJsonBody, type HttpTextResponse } from '../../utils/http.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import type { ConceptDetail, ResolvedConcept, TerminologyResolver } from '../collaborators.js';
import { loadUmlsConfig, type UmlsConfig } from './config.js';
import { categoryForSemanticTypes, hasAllowedSemanticType, tuiFromUri } from './semantic-types.js';
import { combinedScore, positionScore, similarityScore } from './similarity.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const SearchResponseSchema = z.object({
  result: z.object({
    results: z.array(
      z.object({
        ui: z.string(),
        name: z.string(),
        rootSource: z.string().optional(),
      })
    ),
  }),
});

const ConceptResponseSchema = z.object({
  result: z.object({
    ui: z.string(),
    name: z.string(),
    atomCount: z.number().optional(),
    semanticTypes: z
      .array(z.object({ name: z.string(), uri: z.string() }))
      .default([]),
  }),
});

const AtomsResponseSchema = z.object({
  result: z.array(
    z.object({
      name: z.string(),
      rootSource: z.string().optional(),
      termType: z.string().optional(),
      language: z.string().optional(),
    })
  ),
});

type Atom = z.infer<typeof AtomsResponseSchema>['result'][number];

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface UmlsSearchResult {
  concept_id: string;
  name: string;
  root_source: string | null;
  rank: number;
  similarity_score: number;
  position_score: number;
  relevance_score: number;
}

export interface UmlsClientOptions {
  config?: Partial<UmlsConfig>;
  /** undici dispatcher; tests pass a MockAgent */
  dispatcher?: Dispatcher;
}

/** MeSH term types preferred when picking a heading */
const PREFERRED_MESH_TERM_TYPES = new Set(['MH', 'NM', 'HT']);

/** Placeholder row UTS returns for an empty search */
const NO_RESULTS_UI = 'NONE';

/** Concurrent detail lookups per resolve */
const DETAIL_CONCURRENCY = 3;

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export class UmlsClient implements TerminologyResolver {
  private readonly config: UmlsConfig;
  private readonly dispatcher?: Dispatcher;
  private readonly _resolveCache = new Map<string, ResolvedConcept[]>();

  constructor(options: UmlsClientOptions = {}) {
    this.config = loadUmlsConfig(options.config);
    this.dispatcher = options.dispatcher;
  }

  /**
   * Word search scored against the term, best first.
   */
  async search(term: string, pageSize: number = this.config.pageSize): Promise<UmlsSearchResult[]> {
    const trimmed = term.trim();
    if (trimmed.length === 0) return [];

    const body = await this.getJson(`/search/${this.config.version}`, SearchResponseSchema, {
      string: trimmed,
      searchType: 'words',
      pageSize,
    });
    if (body === null) return [];

    const scored = body.result.results
      .filter((row) => row.ui !== NO_RESULTS_UI && row.ui.length > 0)
      .map((row, index): UmlsSearchResult => {
        const rank = index + 1;
        const similarity = similarityScore(trimmed, row.name);
        const position = positionScore(rank);
        return {
          concept_id: row.ui,
          name: row.name,
          root_source: row.rootSource ?? null,
          rank,
          similarity_score: similarity,
          position_score: position,
          relevance_score: combinedScore(similarity, position),
        };
      });

    // Stable: equal scores keep API rank order
    return scored.sort((a, b) => b.relevance_score - a.relevance_score);
  }

  /**
   * Candidates at or above searchThreshold, enriched with synonyms and the
   * MeSH heading. Results are cached per normalized term.
   */
  async resolve(term: string): Promise<ResolvedConcept[]> {
    const key = term.trim().toLowerCase();
    const cached = this._resolveCache.get(key);
    if (cached !== undefined) {
      return cached.map((c) => ({ ...c, synonyms: [...c.synonyms] }));
    }

    const hits = (await this.search(term))
      .filter((hit) => hit.relevance_score >= this.config.searchThreshold)
      .slice(0, this.config.maxCandidates);

    const enriched = await mapWithConcurrency(hits, DETAIL_CONCURRENCY, async (hit) => {
      let semanticTypes: string[] | undefined;
      if (this.config.filterSemanticTypes) {
        const detail = await this.lookup(hit.concept_id);
        semanticTypes = detail.semantic_types.map((s) => s.tui);
        if (!hasAllowedSemanticType(semanticTypes)) return null;
      }

      const atoms = await this.getAtoms(hit.concept_id);
      const concept: ResolvedConcept = {
        concept_id: hit.concept_id,
        canonical_name: hit.name,
        synonyms: synonymsFromAtoms(atoms, hit.name),
        relevance_score: hit.relevance_score,
        mesh_heading: meshHeadingFromAtoms(atoms),
      };
      if (semanticTypes !== undefined) concept.semantic_types = semanticTypes;
      return concept;
    });

    const resolved = enriched.filter((c): c is ResolvedConcept => c !== null);
    this.remember(key, resolved);
    console.error(`[UMLS] Resolved "${term}" -> ${resolved.length} concept(s)`);
    return resolved.map((c) => ({ ...c, synonyms: [...c.synonyms] }));
  }

  /**
   * @throws MCPError NOT_FOUND for an unknown CUI
   */
  async lookup(conceptId: string): Promise<ConceptDetail> {
    const cui = conceptId.trim();
    const body = await this.getJson(`/content/${this.config.version}/CUI/${encodeURIComponent(cui)}`, ConceptResponseSchema);
    if (body === null) {
      throw conceptNotFoundError(cui);
    }

    const semanticTypes = body.result.semanticTypes.flatMap((st) => {
      const tui = tuiFromUri(st.uri);
      return tui === null ? [] : [{ tui, name: st.name }];
    });

    return {
      concept_id: body.result.ui,
      name: body.result.name,
      semantic_types: semanticTypes,
      category: categoryForSemanticTypes(semanticTypes.map((s) => s.tui)),
      atom_count: body.result.atomCount,
    };
  }

  /**
   * English atoms of a concept. An unknown CUI or a concept with no atoms
   * yields an empty list.
   */
  async getAtoms(conceptId: string, pageSize: number = 100): Promise<Atom[]> {
    const body = await this.getJson(
      `/content/${this.config.version}/CUI/${encodeURIComponent(conceptId)}/atoms`,
      AtomsResponseSchema,
      { language: 'ENG', pageSize }
    );
    return body === null ? [] : body.result;
  }

  /** Drop cached resolutions (for testing) */
  clearCache(): void {
    this._resolveCache.clear();
  }

  get cacheSize(): number {
    return this._resolveCache.size;
  }

  private remember(key: string, value: ResolvedConcept[]): void {
    if (this.config.cacheSize === 0) return;
    if (this._resolveCache.size >= this.config.cacheSize) {
      // Map iteration order is insertion order; evict the oldest
      const oldest = this._resolveCache.keys().next();
      if (!oldest.done) this._resolveCache.delete(oldest.value);
    }
    this._resolveCache.set(key, value);
  }

  /**
   * GET and validate a JSON body. Returns null on 404.
   *
   * @throws MCPError UMLS_API_ERROR on transport failure, other non-2xx or an unexpected body
   */
  private async getJson<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    params: Record<string, string | number | undefined> = {}
  ): Promise<z.infer<T> | null> {
    const url = buildUrl(`${this.config.baseUrl}${path}`, { ...params, apiKey: this.config.apiKey });

    let response: HttpTextResponse;
    try {
      response = await httpGetText(url, {
        dispatcher: this.dispatcher,
        timeoutMs: this.config.requestTimeoutMs,
      });
    } catch (error) {
      throw new MCPError('UMLS_API_ERROR', `UMLS request failed: ${error instanceof Error ? error.message : String(error)}`, {
        path,
      });
    }

    const { statusCode, text } = response;
    if (statusCode === 404) return null;
    if (statusCode < 200 || statusCode >= 300) {
      console.error(`[UMLS] ${path} returned HTTP ${statusCode}`);
      throw new MCPError('UMLS_API_ERROR', `UMLS returned HTTP ${statusCode}`, {
        path,
        statusCode,
        body: text.slice(0, 500),
      });
    }

    const parsed = schema.safeParse(parseJsonBody(text));
    if (!parsed.success) {
      throw new MCPError('UMLS_API_ERROR', 'UMLS response did not have the expected shape', {
        path,
        issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ATOM HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Preferred MSH atom (term type MH, NM or HT), else the first MSH atom.
 */
export function meshHeadingFromAtoms(atoms: readonly Atom[]): string | null {
  const mesh = atoms.filter((a) => a.rootSource === 'MSH');
  if (mesh.length === 0) return null;
  const preferred = mesh.find((a) => a.termType !== undefined && PREFERRED_MESH_TERM_TYPES.has(a.termType));
  return (preferred ?? mesh[0]).name;
}

/**
 * Distinct atom names (case-insensitive), excluding the canonical name, in atom order.
 */
export function synonymsFromAtoms(atoms: readonly Atom[], canonicalName: string): string[] {
  const seen = new Set<string>([canonicalName.trim().toLowerCase()]);
  const synonyms: string[] = [];
  for (const atom of atoms) {
    if (atom.language !== undefined && atom.language !== 'ENG') continue;
    const name = atom.name.trim();
    const key = name.toLowerCase();
    if (name.length === 0 || seen.has(key)) continue;
    seen.add(key);
    synonyms.push(name);
  }
  return synonyms;
}
