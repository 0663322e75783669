/**
 * Graph snapshot export and import.
 *
 * A snapshot is a JSON document of one session's nodes and edges. Importing
 * replaces the session graph wholesale; the session's own constraints apply.
 *
 * @module services/graph/export-service
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  GraphConstraintsSchema,
  NodeCategorySchema,
  RelationshipTypeSchema,
  type KnowledgeEdge,
  type KnowledgeNode,
} from '../../models/graph.js';
import { MCPError, validationError } from '../../server/errors.js';
import type { GraphStore, GraphSummary } from './graph-store.js';

export const SNAPSHOT_FORMAT = 'medkg-graph';
export const SNAPSHOT_VERSION = 1;

const SnapshotNodeSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  category: NodeCategorySchema,
  synonyms: z.array(z.string()).default([]),
  umls_cui: z.string().min(1).nullable().default(null),
  validated: z.boolean().default(false),
  depth: z.number().int().min(0).default(0),
  reachable: z.boolean().default(true),
  is_seed: z.boolean().default(false),
  created_at: z.string().default(() => new Date().toISOString()),
});

const SnapshotEdgeSchema = z.object({
  id: z.string().min(1),
  source_node_id: z.string().min(1),
  target_node_id: z.string().min(1),
  relationship_type: RelationshipTypeSchema,
  evidence: z.array(
    z.object({
      source_id: z.string().min(1),
      sentence: z.string().default(''),
      retrieved_at: z.string().default(() => new Date().toISOString()),
    })
  ),
  confidence: z.number().min(0).max(1),
  created_at: z.string().default(() => new Date().toISOString()),
  updated_at: z.string().default(() => new Date().toISOString()),
});

export const GraphSnapshotSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  version: z.literal(SNAPSHOT_VERSION),
  snapshot_id: z.string().uuid(),
  exported_at: z.string(),
  constraints: GraphConstraintsSchema,
  nodes: z.array(SnapshotNodeSchema),
  edges: z.array(SnapshotEdgeSchema),
});

export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>;

export interface ExportResult {
  snapshot: GraphSnapshot;
  summary: GraphSummary;
  file_path: string | null;
}

export interface ImportResult {
  snapshot_id: string;
  node_count: number;
  edge_count: number;
  unreachable_node_ids: string[];
  constraints_differ: boolean;
}

/**
 * Snapshot the store; write it to `filePath` when given.
 */
export function exportGraph(store: GraphStore, filePath?: string): ExportResult {
  const snapshot: GraphSnapshot = {
    format: SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    snapshot_id: uuidv4(),
    exported_at: new Date().toISOString(),
    constraints: { ...store.constraints },
    nodes: store.listNodes(),
    edges: store.listEdges().map((edge) => ({ ...edge, evidence: edge.evidence.map((e) => ({ ...e })) })),
  };

  let writtenTo: string | null = null;
  if (filePath !== undefined) {
    writtenTo = path.resolve(filePath);
    try {
      fs.mkdirSync(path.dirname(writtenTo), { recursive: true });
      fs.writeFileSync(writtenTo, JSON.stringify(snapshot, null, 2), 'utf-8');
    } catch (error) {
      throw new MCPError('INTERNAL_ERROR', `Failed to write snapshot to ${writtenTo}`, {
        filePath: writtenTo,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    console.error(`[Export] Wrote snapshot ${snapshot.snapshot_id} to ${writtenTo}`);
  }

  return { snapshot, summary: store.summary(), file_path: writtenTo };
}

/**
 * Validate a snapshot document.
 *
 * @throws MCPError VALIDATION_ERROR listing the first schema issues
 */
export function parseSnapshot(input: unknown): GraphSnapshot {
  const result = GraphSnapshotSchema.safeParse(input);
  if (!result.success) {
    throw validationError('Invalid graph snapshot', {
      issues: result.error.issues.slice(0, 10).map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

export function readSnapshotFile(filePath: string): GraphSnapshot {
  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new MCPError('NOT_FOUND', `Snapshot file not found: ${resolved}`, {
      filePath: resolved,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw validationError(`Snapshot file is not valid JSON: ${resolved}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parseSnapshot(parsed);
}

/**
 * Replace the store's graph with the snapshot. All-or-nothing: a snapshot
 * that breaks a store invariant leaves the store untouched.
 */
export function importGraph(store: GraphStore, snapshot: GraphSnapshot): ImportResult {
  const nodes: KnowledgeNode[] = snapshot.nodes;
  const edges: KnowledgeEdge[] = snapshot.edges;
  store.replaceState({ nodes, edges });

  const constraintsDiffer =
    snapshot.constraints.maxDepth !== store.constraints.maxDepth ||
    snapshot.constraints.maxNodes !== store.constraints.maxNodes ||
    snapshot.constraints.minPubmedCitations !== store.constraints.minPubmedCitations;
  if (constraintsDiffer) {
    console.error('[Export] Snapshot was taken under different constraints; session constraints apply');
  }

  return {
    snapshot_id: snapshot.snapshot_id,
    node_count: store.nodeCount,
    edge_count: store.edgeCount,
    unreachable_node_ids: store.listNodes().filter((n) => !n.reachable).map((n) => n.id),
    constraints_differ: constraintsDiffer,
  };
}
