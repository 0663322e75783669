/**
 * Unit Tests for Knowledge Graph MCP Tools
 *
 * Handlers run against a fresh session per test. Terminology lookups use the
 * in-process FakeResolver.
 *
 * @module tests/unit/tools/knowledge-graph
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { knowledgeGraphTools } from '../../../src/tools/knowledge-graph.js';
import { requireStore, resetState } from '../../../src/server/state.js';
import type { KnowledgeEdge, KnowledgeNode } from '../../../src/models/graph.js';
import type { GraphSummary } from '../../../src/services/graph/graph-store.js';
import { FakeResolver, concept } from '../../helpers/fakes.js';
import { parseResponse } from '../../helpers/responses.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

async function call<T = Record<string, unknown>>(name: string, params: Record<string, unknown> = {}) {
  return parseResponse<T>(await knowledgeGraphTools[name].handler(params));
}

const IL6_EDGE = {
  source_node_id: 'inflammation',
  target_node_id: 'interleukin_6',
  relationship_type: 'INFLUENCES',
  evidence: [
    { source_id: '101', sentence: 'IL-6 drives inflammation.' },
    { source_id: '102', sentence: 'Inflammation rises with IL-6.' },
  ],
  confidence: 0.5,
  create_target: { label: 'Interleukin-6', category: 'Molecular', synonyms: ['IL-6'] },
};

describe('knowledgeGraphTools', () => {
  beforeEach(() => {
    resetState();
  });

  it('registers every graph tool', () => {
    expect(Object.keys(knowledgeGraphTools)).toEqual([
      'medkg_graph_summary',
      'medkg_graph_nodes',
      'medkg_graph_node',
      'medkg_graph_add_node',
      'medkg_graph_add_edge',
      'medkg_graph_validate_node',
      'medkg_graph_validate_node_umls',
      'medkg_graph_paths',
      'medkg_graph_export',
      'medkg_graph_import',
      'medkg_graph_reset',
    ]);
  });

  describe('medkg_graph_summary', () => {
    it('summarizes the seeded graph', async () => {
      const result = await call<GraphSummary>('medkg_graph_summary');
      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        node_count: 3,
        edge_count: 0,
        seed_count: 3,
        depth_histogram: { '0': 3 },
        category_counts: { Disease: 1, BiologicalProcess: 1, Biomechanical: 1 },
      });
    });
  });

  describe('medkg_graph_add_node', () => {
    it('adds an unlinked node as unreachable and is idempotent on the slug', async () => {
      const first = await call<{ node: KnowledgeNode; created: boolean }>('medkg_graph_add_node', {
        label: 'Wall Shear Stress',
        category: 'Biomechanical',
      });
      expect(first.data?.created).toBe(true);
      expect(first.data?.node).toMatchObject({ id: 'wall_shear_stress', depth: 2, reachable: false });

      const second = await call<{ created: boolean }>('medkg_graph_add_node', {
        label: 'wall shear stress',
        category: 'Biomechanical',
      });
      expect(second.data?.created).toBe(false);
    });

    it('rejects an unknown category', async () => {
      const result = await call('medkg_graph_add_node', { label: 'Thing', category: 'Gene' });
      expect(result.success).toBe(false);
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });
  });

  describe('medkg_graph_add_edge', () => {
    it('admits an edge and creates its target', async () => {
      const result = await call<{ edge: KnowledgeEdge; created_node: KnowledgeNode | null; merged: boolean }>(
        'medkg_graph_add_edge',
        IL6_EDGE
      );
      expect(result.success).toBe(true);
      expect(result.data?.edge.id).toBe('inflammation->INFLUENCES->interleukin_6');
      expect(result.data?.created_node?.id).toBe('interleukin_6');
      expect(result.data?.merged).toBe(false);
      expect(requireStore().getNode('interleukin_6')?.synonyms).toEqual(['IL-6']);
    });

    it('refuses an edge with a single source', async () => {
      const result = await call('medkg_graph_add_edge', {
        ...IL6_EDGE,
        evidence: [
          { source_id: '101', sentence: 'a' },
          { source_id: '101', sentence: 'b' },
        ],
      });
      expect(result.error?.category).toBe('INSUFFICIENT_EVIDENCE');
      expect(requireStore().nodeCount).toBe(3);
    });

    it('rejects a blank source id instead of counting it as a citation', async () => {
      const result = await call('medkg_graph_add_edge', {
        ...IL6_EDGE,
        evidence: [
          { source_id: '101', sentence: 'a' },
          { source_id: ' ', sentence: 'b' },
        ],
      });
      expect(result.error?.category).toBe('VALIDATION_ERROR');
      expect(requireStore().edgeCount).toBe(0);
    });
  });

  describe('medkg_graph_nodes / medkg_graph_node', () => {
    beforeEach(async () => {
      await call('medkg_graph_add_edge', IL6_EDGE);
    });

    it('filters nodes', async () => {
      const seeds = await call<{ total: number; nodes: KnowledgeNode[] }>('medkg_graph_nodes', { max_depth: 0 });
      expect(seeds.data?.total).toBe(3);

      const molecular = await call<{ total: number; nodes: KnowledgeNode[] }>('medkg_graph_nodes', {
        category: 'Molecular',
      });
      expect(molecular.data?.nodes.map((n) => n.id)).toEqual(['interleukin_6']);
    });

    it('returns a node with its edges and neighbours', async () => {
      const result = await call<{
        node: KnowledgeNode;
        outgoing?: KnowledgeEdge[];
        incoming?: KnowledgeEdge[];
        neighbors?: KnowledgeNode[];
      }>('medkg_graph_node', { node_id: 'interleukin_6', include_neighbors: true });

      expect(result.data?.outgoing).toEqual([]);
      expect(result.data?.incoming?.map((e) => e.id)).toEqual(['inflammation->INFLUENCES->interleukin_6']);
      expect(result.data?.neighbors?.map((n) => n.id)).toEqual(['inflammation']);
    });

    it('omits edges when include_edges is false', async () => {
      const result = await call('medkg_graph_node', { node_id: 'inflammation', include_edges: false });
      expect(result.data).not.toHaveProperty('outgoing');
      expect(result.data).not.toHaveProperty('neighbors');
    });

    it('returns NOT_FOUND for an unknown node', async () => {
      const result = await call('medkg_graph_node', { node_id: 'nothing_here' });
      expect(result.error).toMatchObject({ category: 'NOT_FOUND', message: 'Node "nothing_here" not found' });
    });
  });

  describe('medkg_graph_validate_node', () => {
    it('attaches the CUI', async () => {
      const result = await call<{ node: KnowledgeNode }>('medkg_graph_validate_node', {
        node_id: 'inflammation',
        umls_cui: ' C0021368 ',
      });
      expect(result.data?.node).toMatchObject({ validated: true, umls_cui: 'C0021368' });
    });
  });

  describe('medkg_graph_validate_node_umls', () => {
    it('needs a terminology resolver', async () => {
      const result = await call('medkg_graph_validate_node_umls', { node_id: 'inflammation' });
      expect(result.error?.category).toBe('CONFIGURATION_ERROR');
    });

    it('validates with the best concept at the session relevance', async () => {
      const resolver = new FakeResolver({
        inflammation: [concept('C0021368', 'Inflammation', 0.97), concept('C0000099', 'Inflammations', 0.85)],
      });
      resetState({ resolver });

      const result = await call<{ node: KnowledgeNode; concept: { concept_id: string } }>(
        'medkg_graph_validate_node_umls',
        { node_id: 'inflammation' }
      );
      expect(result.data?.node.umls_cui).toBe('C0021368');
      expect(result.data?.concept.concept_id).toBe('C0021368');
      expect(resolver.calls).toEqual(['Inflammation']);
    });

    it('reports the candidates when none is relevant enough', async () => {
      resetState({ resolver: new FakeResolver({ inflammation: [concept('C0021368', 'Inflammation', 0.5)] }) });

      const result = await call('medkg_graph_validate_node_umls', { node_id: 'inflammation' });
      expect(result.error?.category).toBe('NOT_FOUND');
      expect(result.error?.message).toBe('No concept for "Inflammation" at relevance >= 0.8');
      expect(result.error?.details?.candidates).toEqual([
        { concept_id: 'C0021368', canonical_name: 'Inflammation', relevance_score: 0.5 },
      ]);
      expect(requireStore().getNode('inflammation')?.validated).toBe(false);
    });

    it('accepts a lower min_relevance', async () => {
      resetState({ resolver: new FakeResolver({ inflammation: [concept('C0021368', 'Inflammation', 0.5)] }) });
      const result = await call<{ node: KnowledgeNode }>('medkg_graph_validate_node_umls', {
        node_id: 'inflammation',
        min_relevance: 0.4,
      });
      expect(result.data?.node.validated).toBe(true);
    });
  });

  describe('medkg_graph_paths', () => {
    beforeEach(async () => {
      await call('medkg_graph_add_edge', IL6_EDGE);
    });

    it('finds a connecting path', async () => {
      const result = await call<{ found: boolean; path: { length: number; node_ids: string[]; edge_ids: string[] } }>(
        'medkg_graph_paths',
        { source_node_id: 'interleukin_6', target_node_id: 'inflammation' }
      );
      expect(result.data?.found).toBe(true);
      expect(result.data?.path).toEqual({
        length: 1,
        node_ids: ['interleukin_6', 'inflammation'],
        edge_ids: ['inflammation->INFLUENCES->interleukin_6'],
      });
    });

    it('reports disconnected nodes', async () => {
      const result = await call<{ found: boolean; path: null }>('medkg_graph_paths', {
        source_node_id: 'hemodynamics',
        target_node_id: 'interleukin_6',
      });
      expect(result.data).toMatchObject({ found: false, path: null });
    });

    it('requires both endpoints to exist', async () => {
      const result = await call('medkg_graph_paths', { source_node_id: 'inflammation', target_node_id: 'ghost' });
      expect(result.error?.category).toBe('NOT_FOUND');
    });
  });

  describe('export / import / reset', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = mkdtempSync(join(tmpdir(), 'medkg-tools-'));
      await call('medkg_graph_add_edge', IL6_EDGE);
    });

    afterEach(() => {
      rmSync(tmpDir, { recursive: true, force: true });
    });

    it('round-trips the graph through a file', async () => {
      const file = join(tmpDir, 'graph.json');
      const exported = await call<{ file_path: string; summary: GraphSummary }>('medkg_graph_export', {
        output_path: file,
        include_snapshot: false,
      });
      expect(exported.data?.file_path).toBe(file);
      expect(exported.data).not.toHaveProperty('snapshot');

      const reset = await call<{ reset: boolean; summary: GraphSummary }>('medkg_graph_reset', { confirm: true });
      expect(reset.data?.summary.node_count).toBe(3);

      const imported = await call('medkg_graph_import', { input_path: file });
      expect(imported.data).toMatchObject({ node_count: 4, edge_count: 1, constraints_differ: false });
      expect(requireStore().hasNode('interleukin_6')).toBe(true);
    });

    it('imports an inline snapshot', async () => {
      const exported = await call<{ snapshot: Record<string, unknown> }>('medkg_graph_export');
      await call('medkg_graph_reset', { confirm: true });

      const imported = await call('medkg_graph_import', { snapshot: exported.data?.snapshot });
      expect(imported.data).toMatchObject({ node_count: 4, edge_count: 1 });
    });

    it('requires exactly one import source', async () => {
      const result = await call('medkg_graph_import', {});
      expect(result.error).toMatchObject({
        category: 'VALIDATION_ERROR',
        message: 'Provide exactly one of input_path or snapshot',
      });
    });

    it('refuses to write outside the allowed directories', async () => {
      const result = await call('medkg_graph_export', { output_path: '/etc/medkg-graph.json' });
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });

    it('reset needs confirm: true', async () => {
      const result = await call('medkg_graph_reset', {});
      expect(result.error?.category).toBe('VALIDATION_ERROR');
      expect(requireStore().nodeCount).toBe(4);
    });
  });
});
