/**
 * Collaborator contracts for the terminology service and the literature
 * index. The UMLS and PubMed clients implement these; tests supply fakes.
 *
 * @module services/collaborators
 */

import type { NodeCategory } from '../models/graph.js';

export interface ResolvedConcept {
  concept_id: string;
  canonical_name: string;
  synonyms: string[];
  /** In [0, 1]; higher is a closer match to the looked-up term */
  relevance_score: number;
  mesh_heading?: string | null;
  semantic_types?: string[];
}

export interface SemanticType {
  tui: string;
  name: string;
}

export interface ConceptDetail {
  concept_id: string;
  name: string;
  semantic_types: SemanticType[];
  /** Node category inferred from the semantic types */
  category: NodeCategory;
  atom_count?: number;
}

export interface TerminologyResolver {
  resolve(term: string): Promise<ResolvedConcept[]>;
  /** @throws MCPError NOT_FOUND for an unknown concept id */
  lookup(conceptId: string): Promise<ConceptDetail>;
}

/** Publication date bounds: YYYY, YYYY/MM or YYYY/MM/DD */
export interface DateRange {
  start?: string;
  end?: string;
}

export interface LiteratureRecord {
  record_id: string;
  title: string;
  snippet: string;
  citation_count: number;
  journal?: string | null;
  pub_date?: string | null;
}

export interface LiteratureSearch {
  search(query: string, maxResults: number, dateRange?: DateRange): Promise<LiteratureRecord[]>;
}
