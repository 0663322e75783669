/**
 * Knowledge Graph Data Model
 *
 * Node, Edge and Evidence records for the bounded biomedical knowledge graph,
 * plus the controlled vocabularies (node categories, relationship types) and
 * the hardcoded seed entities every session starts from.
 *
 * Edges reference nodes by id only. The GraphStore owns both collections.
 *
 * @module models/graph
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CONTROLLED VOCABULARIES
// ═══════════════════════════════════════════════════════════════════════════════

export const NODE_CATEGORIES = [
  'Disease',
  'BiologicalProcess',
  'Biomechanical',
  'Biomarker',
  'Molecular',
  'Anatomical',
  'Concept',
] as const;

export type NodeCategory = (typeof NODE_CATEGORIES)[number];

export const NodeCategorySchema = z.enum(NODE_CATEGORIES);

export const RELATIONSHIP_TYPES = [
  'INFLUENCES',
  'CAUSES',
  'ASSOCIATED_WITH',
  'MECHANISTIC_LINK',
  'BIOMARKER_FOR',
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export const RelationshipTypeSchema = z.enum(RELATIONSHIP_TYPES);

/**
 * Cue words searched alongside a node label when expansion is interested in a
 * relationship type. Also used (as stems) to classify evidence sentences.
 */
export const RELATIONSHIP_CUE_TERMS: Record<RelationshipType, string[]> = {
  INFLUENCES: ['influence', 'affect'],
  CAUSES: ['cause', 'induce'],
  ASSOCIATED_WITH: ['associated'],
  MECHANISTIC_LINK: ['mechanism', 'pathway'],
  BIOMARKER_FOR: ['biomarker'],
};

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH CONSTRAINTS
// ═══════════════════════════════════════════════════════════════════════════════

export const GraphConstraintsSchema = z.object({
  maxDepth: z.number().int().min(0).max(10).default(2),
  maxNodes: z.number().int().min(3).max(1000).default(30),
  minPubmedCitations: z.number().int().min(1).max(50).default(2),
});

/** Global limits fixed at GraphStore / orchestrator construction */
export type GraphConstraints = Readonly<z.infer<typeof GraphConstraintsSchema>>;

export const DEFAULT_GRAPH_CONSTRAINTS: GraphConstraints = Object.freeze({
  maxDepth: 2,
  maxNodes: 30,
  minPubmedCitations: 2,
});

// ═══════════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A literature citation supporting a relationship claim.
 * Identity is source_id (PMID); immutable once created.
 */
export interface Evidence {
  readonly source_id: string;
  readonly sentence: string;
  readonly retrieved_at: string;
}

export interface KnowledgeNode {
  id: string;
  label: string;
  category: NodeCategory;
  synonyms: string[];
  umls_cui: string | null;
  validated: boolean;
  /** Shortest undirected hop count from any seed; clamped to maxDepth when unreachable */
  depth: number;
  /** False when no seed lies within maxDepth hops */
  reachable: boolean;
  is_seed: boolean;
  created_at: string;
}

export interface KnowledgeEdge {
  id: string;
  source_node_id: string;
  target_node_id: string;
  relationship_type: RelationshipType;
  evidence: Evidence[];
  confidence: number;
  created_at: string;
  updated_at: string;
}

/** Edge as submitted to GraphStore.addEdge (id and timestamps are assigned by the store) */
export interface EdgeInput {
  source_node_id: string;
  target_node_id: string;
  relationship_type: RelationshipType;
  evidence: Evidence[];
  confidence: number;
}

export const EvidenceSchema = z.object({
  source_id: z.string().trim().min(1).describe('Literature identifier, e.g. a PMID'),
  sentence: z.string().default('').describe('Supporting excerpt (may be empty)'),
  retrieved_at: z.string().optional().describe('ISO timestamp; defaults to now'),
});

/**
 * Create a frozen Evidence record.
 */
export function createEvidence(sourceId: string, sentence: string, retrievedAt?: string): Evidence {
  return Object.freeze({
    source_id: sourceId.trim(),
    sentence,
    retrieved_at: retrievedAt ?? new Date().toISOString(),
  });
}

/**
 * Deduplicate evidence by source_id, keeping the first occurrence of each.
 */
export function dedupeEvidence(evidence: readonly Evidence[]): Evidence[] {
  const seen = new Set<string>();
  const out: Evidence[] = [];
  for (const item of evidence) {
    if (seen.has(item.source_id)) continue;
    seen.add(item.source_id);
    out.push(item);
  }
  return out;
}

export function edgeKey(sourceId: string, relationshipType: RelationshipType, targetId: string): string {
  return `${sourceId}->${relationshipType}->${targetId}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SEED ENTITIES
// ═══════════════════════════════════════════════════════════════════════════════

export interface EntityDefinition {
  label: string;
  category: NodeCategory;
  synonyms: string[];
}

/** Human-curated starting vertices of every session */
export const SEED_ENTITIES: readonly EntityDefinition[] = [
  {
    label: 'Intracranial Aneurysm Rupture',
    category: 'Disease',
    synonyms: ['Brain Aneurysm Rupture', 'Cerebral Aneurysm Rupture', 'Intracranial Aneurysm'],
  },
  {
    label: 'Inflammation',
    category: 'BiologicalProcess',
    synonyms: ['Inflammatory Response', 'Inflammatory Process'],
  },
  {
    label: 'Hemodynamics',
    category: 'Biomechanical',
    synonyms: ['Blood Flow Dynamics', 'Hemodynamic Forces', 'Vascular Hemodynamics'],
  },
];
