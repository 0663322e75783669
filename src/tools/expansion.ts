/**
 * Expansion MCP Tools
 *
 * Tools: medkg_expand, medkg_expansion_status
 *
 * One expansion runs at a time per server; graph resets and imports are
 * refused while it runs.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/expansion
 */

import { isExpansionRunning, requireSession, withExpansion } from '../server/state.js';
import { successResult } from '../server/types.js';
import { ExpandInput, ExpansionStatusInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * Handle medkg_expand - run expansion cycles against the session graph
 */
async function handleExpand(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExpandInput, params);
    const report = await withExpansion((session) =>
      session.orchestrator.expand({ maxCycles: input.max_cycles, deadlineMs: input.deadline_ms })
    );
    return formatResponse(successResult(report));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_expansion_status
 */
async function handleExpansionStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(ExpansionStatusInput, params);
    const { orchestrator, store, generation } = requireSession();
    return formatResponse(
      successResult({
        running: isExpansionRunning(),
        generation,
        ...orchestrator.getStatus(),
        frontier: orchestrator.selectFrontier().map((n) => n.id),
        node_count: store.nodeCount,
        edge_count: store.edgeCount,
        constraints: store.constraints,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const expansionTools: Record<string, ToolDefinition> = {
  medkg_expand: {
    description:
      'Grow the graph: each cycle builds a query per frontier node, fetches PubMed records concurrently, derives co-occurrence candidates and admits the evidence-backed ones. Stops when the frontier is empty, the node limit is reached, max_cycles have run or deadline_ms passes',
    inputSchema: ExpandInput.shape,
    handler: handleExpand,
  },
  medkg_expansion_status: {
    description: 'Show expansion bookkeeping: state, cycles run, expanded and retired nodes, the next frontier',
    inputSchema: ExpansionStatusInput.shape,
    handler: handleExpansionStatus,
  },
};
