/**
 * medkg MCP - Zod Validation Schemas
 *
 * Input validation for every MCP tool. Each schema carries its constraints,
 * descriptions shown to MCP clients, and defaults.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir } from 'os';
import {
  EvidenceSchema,
  NodeCategorySchema,
  RelationshipTypeSchema,
} from '../models/graph.js';
import { PatientEntitySchema, PatientFilterSchema, PatientSelectSchema } from '../models/patient.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError listing every issue as "path: message"
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const NodeId = z.string().min(1).max(200).describe('Node id (label slug, e.g. "intracranial_aneurysm_rupture")');

const Label = z.string().trim().min(1).max(200);

/** YYYY, YYYY/MM or YYYY/MM/DD */
const PubDate = z
  .string()
  .regex(/^\d{4}(\/\d{2}(\/\d{2})?)?$/, 'Use YYYY, YYYY/MM or YYYY/MM/DD');

const Cui = z
  .string()
  .trim()
  .min(1)
  .describe('UMLS concept id (e.g. "C0007787")');

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const GraphSummaryInput = z.object({});

export const GraphNodesInput = z.object({
  category: NodeCategorySchema.optional().describe('Only nodes of this category'),
  validated: z.boolean().optional().describe('Only validated (true) or unvalidated (false) nodes'),
  reachable: z.boolean().optional().describe('Only reachable (true) or unreachable (false) nodes'),
  max_depth: z.number().int().min(0).optional().describe('Only nodes with depth at most this'),
});

export const GraphNodeInput = z.object({
  node_id: NodeId,
  include_edges: z.boolean().default(true),
  include_neighbors: z.boolean().default(false),
});

export const GraphAddNodeInput = z.object({
  label: Label.describe('Human-readable label; the node id is its slug'),
  category: NodeCategorySchema,
  synonyms: z.array(z.string().min(1)).max(50).default([]),
});

export const GraphAddEdgeInput = z.object({
  source_node_id: NodeId,
  target_node_id: NodeId,
  relationship_type: RelationshipTypeSchema,
  evidence: z.array(EvidenceSchema).min(1).max(200),
  confidence: z.number().min(0).max(1),
  create_target: z
    .object({
      label: Label,
      category: NodeCategorySchema,
      synonyms: z.array(z.string().min(1)).max(50).default([]),
    })
    .optional()
    .describe('Create the target node in the same admission when it does not exist'),
});

export const GraphValidateNodeInput = z.object({
  node_id: NodeId,
  umls_cui: Cui,
});

export const GraphValidateNodeUmlsInput = z.object({
  node_id: NodeId,
  min_relevance: z.number().min(0).max(1).optional().describe('Defaults to MEDKG_MIN_CONCEPT_RELEVANCE'),
});

export const GraphPathsInput = z.object({
  source_node_id: NodeId,
  target_node_id: NodeId,
  max_hops: z.number().int().min(1).max(20).optional(),
});

export const GraphExportInput = z.object({
  output_path: z.string().min(1).optional().describe('Also write the snapshot JSON to this file'),
  include_snapshot: z.boolean().default(true).describe('Return the snapshot document in the response'),
});

/** Exactly one of input_path / snapshot; checked by the handler */
export const GraphImportInput = z.object({
  input_path: z.string().min(1).optional().describe('Snapshot JSON file to import'),
  snapshot: z.record(z.unknown()).optional().describe('Snapshot document to import'),
});

export const GraphResetInput = z.object({
  confirm: z.literal(true).describe('Must be true; discards the session graph'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY / SEARCH TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const QueryBuildInput = z.object({
  text: z.string().min(1).max(2000),
  use_concepts: z.boolean().optional().describe('Resolve spans through UMLS; defaults to the session setting'),
  relationship_types: z.array(RelationshipTypeSchema).default([]),
});

export const PubMedSearchInput = z.object({
  query: z.string().min(1).max(4000),
  max_results: z.number().int().min(1).max(200).default(20),
  smart_query: z
    .boolean()
    .default(false)
    .describe('Treat query as free text and build a concept-aware expression first'),
  start_date: PubDate.optional(),
  end_date: PubDate.optional(),
  full_text_only: z.boolean().default(false),
});

export const UmlsSearchInput = z.object({
  term: z.string().trim().min(1).max(500),
  max_results: z.number().int().min(1).max(25).default(10),
  threshold: z.number().min(0).max(1).optional().describe('Minimum relevance score'),
});

export const UmlsConceptInput = z.object({
  cui: Cui,
});

// ═══════════════════════════════════════════════════════════════════════════════
// EXPANSION TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ExpandInput = z.object({
  max_cycles: z.number().int().min(1).max(50).default(1),
  deadline_ms: z.number().int().min(100).max(3_600_000).optional(),
});

export const ExpansionStatusInput = z.object({});

// ═══════════════════════════════════════════════════════════════════════════════
// PATIENT COHORT TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const PatientQueryInput = z.object({
  select: PatientSelectSchema.describe('Columns to return, by group and/or name; the case id when empty'),
  entity: PatientEntitySchema.optional().describe('Direct lookup of one case (patient) or one aneurysm'),
  filters: z.array(PatientFilterSchema).max(50).default([]).describe('Conditions combined with AND'),
  limit: z.number().int().min(1).max(1000).default(100),
});

export const PatientColumnsInput = z.object({});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

function getDefaultAllowedBaseDirs(): string[] {
  return [path.resolve(homedir()), path.resolve('/tmp'), path.resolve(process.cwd())];
}

/**
 * Resolve a file path and require it to sit under an allowed base directory
 * (home, /tmp and the working directory by default).
 *
 * @throws ValidationError on null bytes or a path outside the allowed directories
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);
  const baseDirs = allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}`
    );
  }

  return resolved;
}
