/**
 * Search MCP Tools
 *
 * Tools: medkg_query_build, medkg_pubmed_search
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/search
 */

import { MCPError } from '../server/errors.js';
import { getPubMedClient, requireLiterature, requireSession } from '../server/state.js';
import { successResult } from '../server/types.js';
import type { ConceptUsage } from '../services/query/concept-query-builder.js';
import { withRelationshipTerms } from '../services/query/concept-query-builder.js';
import { applyDateFilter, buildDateFilter } from '../services/query/date-filter.js';
import { PubMedSearchInput, QueryBuildInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle medkg_query_build - free text to a PubMed boolean expression
 */
async function handleQueryBuild(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QueryBuildInput, params);
    const { queryBuilder, config } = requireSession();
    const useConcepts = input.use_concepts ?? (config.useConcepts && queryBuilder.hasResolver);

    const built = await queryBuilder.build(input.text, { useConcepts });
    return formatResponse(
      successResult({
        text: input.text,
        use_concepts: useConcepts,
        query: withRelationshipTerms(built.query, input.relationship_types),
        base_query: built.query,
        concepts_used: built.concepts_used,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle medkg_pubmed_search
 *
 * smart_query runs the text through the concept query builder first. Without
 * the real PubMed client (tests, custom collaborators) the generic
 * LiteratureSearch contract is used and full_text_only is unavailable.
 */
async function handlePubMedSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PubMedSearchInput, params);
    const session = requireSession();

    let query = input.query;
    let conceptsUsed: ConceptUsage[] = [];
    if (input.smart_query) {
      const built = await session.queryBuilder.build(input.query, {
        useConcepts: session.config.useConcepts && session.queryBuilder.hasResolver,
      });
      query = built.query;
      conceptsUsed = built.concepts_used;
    }

    const dateRange = { start: input.start_date, end: input.end_date };
    const pubmed = getPubMedClient();
    if (pubmed) {
      const result = await pubmed.searchArticles(query, input.max_results, {
        dateRange,
        fullTextOnly: input.full_text_only,
      });
      return formatResponse(
        successResult({
          query: result.query,
          total_count: result.total_count,
          returned: result.articles.length,
          concepts_used: input.smart_query ? conceptsUsed : undefined,
          articles: result.articles,
        })
      );
    }

    if (input.full_text_only) {
      throw new MCPError('CONFIGURATION_ERROR', 'full_text_only needs the PubMed client', {
        literature: 'custom',
      });
    }
    // Validate the dates the same way the PubMed client would
    const effectiveQuery = applyDateFilter(query, buildDateFilter(input.start_date, input.end_date));
    const records = await requireLiterature().search(query, input.max_results, dateRange);
    return formatResponse(
      successResult({
        query: effectiveQuery,
        total_count: records.length,
        returned: records.length,
        concepts_used: input.smart_query ? conceptsUsed : undefined,
        articles: records,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const searchTools: Record<string, ToolDefinition> = {
  medkg_query_build: {
    description:
      'Build a PubMed boolean query from free text. With concepts on, spans are resolved through UMLS and expanded into MeSH/synonym OR-groups; otherwise content tokens are ANDed. Optional relationship cue terms are ANDed on',
    inputSchema: QueryBuildInput.shape,
    handler: handleQueryBuild,
  },
  medkg_pubmed_search: {
    description:
      'Search PubMed by relevance. Supports a publication date range, full-text-only filtering (PMC) and smart_query (concept-aware query building)',
    inputSchema: PubMedSearchInput.shape,
    handler: handlePubMedSearch,
  },
};
