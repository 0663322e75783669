/**
 * Terminology MCP Tools
 *
 * Tools: medkg_umls_search, medkg_umls_concept
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/terminology
 */

import { getUmlsClient, requireResolver } from '../server/state.js';
import { successResult } from '../server/types.js';
import { UmlsConceptInput, UmlsSearchInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * Handle medkg_umls_search
 *
 * The UMLS client returns raw scored hits; any other resolver falls back to
 * its resolved concepts.
 */
async function handleUmlsSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(UmlsSearchInput, params);
    const resolver = requireResolver();
    const threshold = input.threshold ?? 0;

    const umls = getUmlsClient();
    if (umls) {
      const hits = (await umls.search(input.term))
        .filter((hit) => hit.relevance_score >= threshold)
        .slice(0, input.max_results);
      return formatResponse(successResult({ term: input.term, total: hits.length, results: hits }));
    }

    const concepts = (await resolver.resolve(input.term))
      .filter((c) => c.relevance_score >= threshold)
      .slice(0, input.max_results);
    return formatResponse(successResult({ term: input.term, total: concepts.length, results: concepts }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_umls_concept
 */
async function handleUmlsConcept(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(UmlsConceptInput, params);
    const concept = await requireResolver().lookup(input.cui);
    return formatResponse(successResult({ concept }));
  } catch (error) {
    return handleError(error);
  }
}

export const terminologyTools: Record<string, ToolDefinition> = {
  medkg_umls_search: {
    description: 'Search UMLS concepts for a term, scored by name similarity and result position (needs UMLS_API_KEY)',
    inputSchema: UmlsSearchInput.shape,
    handler: handleUmlsSearch,
  },
  medkg_umls_concept: {
    description: 'Look up a UMLS concept by CUI: name, semantic types and inferred node category (needs UMLS_API_KEY)',
    inputSchema: UmlsConceptInput.shape,
    handler: handleUmlsConcept,
  },
};
