/**
 * Knowledge Graph MCP Tools
 *
 * Tools: medkg_graph_summary, medkg_graph_nodes, medkg_graph_node,
 *        medkg_graph_add_node, medkg_graph_add_edge, medkg_graph_validate_node,
 *        medkg_graph_validate_node_umls, medkg_graph_paths, medkg_graph_export,
 *        medkg_graph_import, medkg_graph_reset
 *
 * All mutations go through the session GraphStore's synchronous API.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/knowledge-graph
 */

import { createEvidence } from '../models/graph.js';
import { MCPError, validationError } from '../server/errors.js';
import { requireResolver, requireSession, requireStore, resetGraph, withGraphReplacement } from '../server/state.js';
import { successResult } from '../server/types.js';
import { bestConcept } from '../services/expansion/orchestrator.js';
import { exportGraph, importGraph, parseSnapshot, readSnapshotFile } from '../services/graph/export-service.js';
import {
  GraphAddEdgeInput,
  GraphAddNodeInput,
  GraphExportInput,
  GraphImportInput,
  GraphNodeInput,
  GraphNodesInput,
  GraphPathsInput,
  GraphResetInput,
  GraphSummaryInput,
  GraphValidateNodeInput,
  GraphValidateNodeUmlsInput,
  sanitizePath,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle medkg_graph_summary
 */
async function handleGraphSummary(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(GraphSummaryInput, params);
    return formatResponse(successResult(requireStore().summary()));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_nodes - list nodes with optional filters
 */
async function handleGraphNodes(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphNodesInput, params);
    const nodes = requireStore()
      .listNodes()
      .filter((n) => input.category === undefined || n.category === input.category)
      .filter((n) => input.validated === undefined || n.validated === input.validated)
      .filter((n) => input.reachable === undefined || n.reachable === input.reachable)
      .filter((n) => input.max_depth === undefined || n.depth <= input.max_depth);

    return formatResponse(successResult({ total: nodes.length, nodes }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_node - one node with its edges and neighbours
 */
async function handleGraphNode(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphNodeInput, params);
    const store = requireStore();
    const node = store.requireNode(input.node_id);

    return formatResponse(
      successResult({
        node,
        outgoing: input.include_edges ? store.getEdgesForNode(node.id, 'outgoing') : undefined,
        incoming: input.include_edges ? store.getEdgesForNode(node.id, 'incoming') : undefined,
        neighbors: input.include_neighbors ? store.getNeighbors(node.id) : undefined,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_add_node
 */
async function handleGraphAddNode(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphAddNodeInput, params);
    const store = requireStore();
    const before = store.nodeCount;
    const node = store.addNode(input.label, input.category, { synonyms: input.synonyms });

    return formatResponse(successResult({ node, created: store.nodeCount > before }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_add_edge
 */
async function handleGraphAddEdge(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphAddEdgeInput, params);
    const result = requireStore().addEdge(
      {
        source_node_id: input.source_node_id,
        target_node_id: input.target_node_id,
        relationship_type: input.relationship_type,
        evidence: input.evidence.map((e) => createEvidence(e.source_id, e.sentence, e.retrieved_at)),
        confidence: input.confidence,
      },
      { createTarget: input.create_target }
    );

    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_validate_node - attach an explicit CUI
 */
async function handleGraphValidateNode(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphValidateNodeInput, params);
    return formatResponse(successResult({ node: requireStore().validateNode(input.node_id, input.umls_cui) }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_validate_node_umls - resolve the label, validate with the best match
 */
async function handleGraphValidateNodeUmls(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphValidateNodeUmlsInput, params);
    const session = requireSession();
    const resolver = requireResolver();
    const node = session.store.requireNode(input.node_id);
    const store = session.store;

    const candidates = await resolver.resolve(node.label);
    const minRelevance = input.min_relevance ?? session.config.minConceptRelevance;
    const best = bestConcept(candidates, minRelevance);
    if (best === null) {
      throw new MCPError('NOT_FOUND', `No concept for "${node.label}" at relevance >= ${minRelevance}`, {
        node_id: node.id,
        candidates: candidates.slice(0, 5).map((c) => ({
          concept_id: c.concept_id,
          canonical_name: c.canonical_name,
          relevance_score: c.relevance_score,
        })),
      });
    }

    // The graph may have been reset while the lookup was in flight
    if (store !== requireStore()) {
      throw new MCPError('NOT_FOUND', 'The graph was replaced during the terminology lookup; retry', {
        node_id: node.id,
      });
    }
    const validated = store.validateNode(node.id, best.concept_id);
    return formatResponse(successResult({ node: validated, concept: best }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_paths - shortest undirected path
 */
async function handleGraphPaths(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphPathsInput, params);
    const store = requireStore();
    store.requireNode(input.source_node_id);
    store.requireNode(input.target_node_id);

    const path = store.findPath(input.source_node_id, input.target_node_id, input.max_hops);
    return formatResponse(
      successResult({
        source_node_id: input.source_node_id,
        target_node_id: input.target_node_id,
        found: path !== null,
        path,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_export
 */
async function handleGraphExport(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphExportInput, params);
    const outputPath = input.output_path === undefined ? undefined : sanitizePath(input.output_path);
    const result = exportGraph(requireStore(), outputPath);

    return formatResponse(
      successResult({
        snapshot_id: result.snapshot.snapshot_id,
        file_path: result.file_path,
        summary: result.summary,
        snapshot: input.include_snapshot ? result.snapshot : undefined,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_import - replace the session graph from a snapshot
 */
async function handleGraphImport(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphImportInput, params);
    if ((input.input_path === undefined) === (input.snapshot === undefined)) {
      throw validationError('Provide exactly one of input_path or snapshot');
    }

    const snapshot =
      input.input_path !== undefined
        ? readSnapshotFile(sanitizePath(input.input_path))
        : parseSnapshot(input.snapshot);
    const result = withGraphReplacement((store) => importGraph(store, snapshot));

    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_graph_reset
 */
async function handleGraphReset(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(GraphResetInput, params);
    const store = resetGraph();
    return formatResponse(successResult({ reset: true, summary: store.summary() }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const knowledgeGraphTools: Record<string, ToolDefinition> = {
  medkg_graph_summary: {
    description:
      'Summarize the session graph: node/edge counts, depth histogram, unreachable and validated counts, category and relationship distributions, constraints',
    inputSchema: GraphSummaryInput.shape,
    handler: handleGraphSummary,
  },
  medkg_graph_nodes: {
    description: 'List graph nodes in insertion order, optionally filtered by category, validation, reachability or depth',
    inputSchema: GraphNodesInput.shape,
    handler: handleGraphNodes,
  },
  medkg_graph_node: {
    description: 'Get one node with its outgoing and incoming edges (and optionally its neighbours)',
    inputSchema: GraphNodeInput.shape,
    handler: handleGraphNode,
  },
  medkg_graph_add_node: {
    description:
      'Add a node by label (idempotent on the label slug). The node stays unreachable until an edge links it; fails when the graph is at its node limit',
    inputSchema: GraphAddNodeInput.shape,
    handler: handleGraphAddNode,
  },
  medkg_graph_add_edge: {
    description:
      'Add an evidence-backed edge. Needs at least the minimum number of distinct PubMed sources; merges with an existing edge of the same type; can create the target node atomically',
    inputSchema: GraphAddEdgeInput.shape,
    handler: handleGraphAddEdge,
  },
  medkg_graph_validate_node: {
    description: 'Mark a node validated with an explicit UMLS CUI',
    inputSchema: GraphValidateNodeInput.shape,
    handler: handleGraphValidateNode,
  },
  medkg_graph_validate_node_umls: {
    description: "Resolve a node's label through UMLS and validate it with the best-scoring concept",
    inputSchema: GraphValidateNodeUmlsInput.shape,
    handler: handleGraphValidateNodeUmls,
  },
  medkg_graph_paths: {
    description: 'Find the shortest undirected path between two nodes using BFS',
    inputSchema: GraphPathsInput.shape,
    handler: handleGraphPaths,
  },
  medkg_graph_export: {
    description: 'Export the session graph as a JSON snapshot, optionally writing it to a file',
    inputSchema: GraphExportInput.shape,
    handler: handleGraphExport,
  },
  medkg_graph_import: {
    description: 'Replace the session graph with a JSON snapshot (from a file or inline). All-or-nothing',
    inputSchema: GraphImportInput.shape,
    handler: handleGraphImport,
  },
  medkg_graph_reset: {
    description: 'Discard the session graph and start again from the seed nodes',
    inputSchema: GraphResetInput.shape,
    handler: handleGraphReset,
  },
};
