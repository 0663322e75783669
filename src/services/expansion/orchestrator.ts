/**
 * Expansion Orchestrator
 *
 * Grows the graph one cycle at a time:
 *
 *   idle -> select_frontier -> build_queries -> fetch_evidence -> admit_candidates -> idle
 *
 * and stops in `exhausted` once no frontier node is left or the store is full.
 * Network work (query building, literature fetches) fans out with a bounded
 * width; admission is one synchronous pass over the store, so no mutation
 * is ever awaited across a network call.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/expansion/orchestrator
 */

import type { EntityDefinition, KnowledgeNode, RelationshipType } from '../../models/graph.js';
import { MCPError, SKIPPABLE_CATEGORIES, type ErrorCategory } from '../../server/errors.js';
import { settleWithConcurrency } from '../../utils/concurrency.js';
import type { DateRange, LiteratureRecord, LiteratureSearch, ResolvedConcept, TerminologyResolver } from '../collaborators.js';
import type { GraphStore } from '../graph/graph-store.js';
import { compareConcepts, withRelationshipTerms, type ConceptQueryBuilder } from '../query/concept-query-builder.js';
import { buildEntityMatchers, deriveCandidates, type CandidateEdge } from './candidates.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type ExpansionState =
  | 'idle'
  | 'select_frontier'
  | 'build_queries'
  | 'fetch_evidence'
  | 'admit_candidates'
  | 'exhausted';

export interface ExpansionOptions {
  useConcepts: boolean;
  /** Cue-word groups ANDed onto every frontier query; empty for none */
  relationshipTypes: RelationshipType[];
  fetchConcurrency: number;
  maxResultsPerNode: number;
  /** A node whose fetch fails this many times leaves the frontier */
  maxFetchAttempts: number;
  /** Frontier nodes taken per cycle; undefined for all */
  frontierLimit?: number;
  dateRange?: DateRange;
  /** Resolve and validate unvalidated nodes touched by a cycle */
  validateNewNodes: boolean;
  /** Minimum relevance for a validation match */
  minValidationRelevance: number;
  /** Candidate entities beyond the graph's own nodes */
  lexicon: EntityDefinition[];
}

export interface ExpansionCollaborators {
  literature: LiteratureSearch;
  queryBuilder: ConceptQueryBuilder;
  resolver?: TerminologyResolver | null;
}

export interface SkippedCandidate {
  source_node_id: string;
  target_node_id: string;
  relationship_type: RelationshipType;
  evidence_count: number;
  reason: ErrorCategory;
  message: string;
}

export interface FetchFailure {
  node_id: string;
  attempt: number;
  stage: 'build_queries' | 'fetch_evidence';
  category: ErrorCategory;
  message: string;
}

export interface AdmittedEdge {
  edge_id: string;
  source_node_id: string;
  target_node_id: string;
  relationship_type: RelationshipType;
  evidence_count: number;
  confidence: number;
  merged: boolean;
  created_node: string | null;
}

export interface NodeValidation {
  node_id: string;
  umls_cui: string | null;
  error?: string;
}

export interface CycleSummary {
  cycle: number;
  frontier: string[];
  queries: Record<string, string>;
  records_fetched: number;
  candidate_count: number;
  admitted: AdmittedEdge[];
  created_nodes: string[];
  skipped: SkippedCandidate[];
  fetch_failures: FetchFailure[];
  validations: NodeValidation[];
  relaxed_node_ids: string[];
  cancelled: boolean;
  exhausted: boolean;
  node_count: number;
  edge_count: number;
  duration_ms: number;
}

export type ExpansionStatus = 'exhausted' | 'max_cycles' | 'cancelled';

export interface ExpandOptions {
  maxCycles?: number;
  /** Wall-clock budget; reaching it cancels like the signal does */
  deadlineMs?: number;
  signal?: AbortSignal;
}

export interface ExpansionReport {
  status: ExpansionStatus;
  stop_reason: 'frontier_empty' | 'capacity' | 'max_cycles' | 'signal' | 'deadline';
  cycles: CycleSummary[];
  nodes_added: number;
  edges_added: number;
  node_count: number;
  edge_count: number;
}

export interface OrchestratorStatus {
  state: ExpansionState;
  cycles_run: number;
  expanded: string[];
  failed_attempts: Record<string, number>;
  retired: string[];
}

export const DEFAULT_EXPANSION_OPTIONS: Readonly<Omit<ExpansionOptions, 'lexicon'>> = Object.freeze({
  useConcepts: true,
  relationshipTypes: [],
  fetchConcurrency: 3,
  maxResultsPerNode: 20,
  maxFetchAttempts: 2,
  validateNewNodes: false,
  minValidationRelevance: 0.8,
});

const DEFAULT_MAX_CYCLES = 10;

interface FrontierWork {
  node: KnowledgeNode;
  query?: string;
  records?: LiteratureRecord[];
  failure?: FetchFailure;
}

function summarizeError(error: unknown): { category: ErrorCategory; message: string } {
  const mcp = MCPError.fromUnknown(error, 'FETCH_FAILED');
  return { category: mcp.category, message: mcp.message };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class ExpansionOrchestrator {
  private readonly options: ExpansionOptions;
  private readonly expanded = new Set<string>();
  private readonly failedAttempts = new Map<string, number>();
  private _state: ExpansionState = 'idle';
  private cyclesRun = 0;

  constructor(
    private readonly store: GraphStore,
    private readonly collaborators: ExpansionCollaborators,
    options: Partial<ExpansionOptions> = {}
  ) {
    this.options = {
      ...DEFAULT_EXPANSION_OPTIONS,
      lexicon: [],
      ...options,
    };
    if (this.options.fetchConcurrency < 1 || !Number.isInteger(this.options.fetchConcurrency)) {
      throw new MCPError('VALIDATION_ERROR', 'fetchConcurrency must be a positive integer', {
        fetchConcurrency: this.options.fetchConcurrency,
      });
    }
    if (this.options.maxFetchAttempts < 1) {
      throw new MCPError('VALIDATION_ERROR', 'maxFetchAttempts must be at least 1', {
        maxFetchAttempts: this.options.maxFetchAttempts,
      });
    }
  }

  get state(): ExpansionState {
    return this._state;
  }

  getStatus(): OrchestratorStatus {
    const retired: string[] = [];
    const failed: Record<string, number> = {};
    for (const [nodeId, attempts] of this.failedAttempts) {
      failed[nodeId] = attempts;
      if (attempts >= this.options.maxFetchAttempts) retired.push(nodeId);
    }
    return {
      state: this._state,
      cycles_run: this.cyclesRun,
      expanded: [...this.expanded],
      failed_attempts: failed,
      retired,
    };
  }

  /**
   * Reachable nodes below the depth limit that still need a fetch,
   * by depth then insertion order.
   */
  selectFrontier(): KnowledgeNode[] {
    const { maxDepth } = this.store.constraints;
    const frontier = this.store
      .listNodes()
      .filter(
        (node) =>
          node.reachable &&
          node.depth < maxDepth &&
          !this.expanded.has(node.id) &&
          (this.failedAttempts.get(node.id) ?? 0) < this.options.maxFetchAttempts
      )
      // Array.prototype.sort is stable, so insertion order breaks depth ties
      .sort((a, b) => a.depth - b.depth);

    return this.options.frontierLimit === undefined ? frontier : frontier.slice(0, this.options.frontierLimit);
  }

  /**
   * Run one expansion cycle.
   */
  async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
    const startedAt = Date.now();
    const summary = this.emptySummary(this.cyclesRun + 1);

    // ── select_frontier ──────────────────────────────────────────────────────
    this._state = 'select_frontier';
    const frontier = this.store.nodeCount >= this.store.constraints.maxNodes ? [] : this.selectFrontier();
    if (frontier.length === 0) {
      this._state = 'exhausted';
      return this.finish(summary, startedAt, { exhausted: true });
    }
    this.cyclesRun++;
    summary.frontier = frontier.map((n) => n.id);
    console.error(`[Expansion] Cycle ${summary.cycle}: frontier ${summary.frontier.join(', ')}`);

    const work: FrontierWork[] = frontier.map((node) => ({ node }));
    const width = this.options.fetchConcurrency;

    // ── build_queries ────────────────────────────────────────────────────────
    this._state = 'build_queries';
    const built = await settleWithConcurrency(
      work,
      width,
      async (item) => {
        const result = await this.collaborators.queryBuilder.build(item.node.label, {
          useConcepts: this.options.useConcepts,
        });
        return withRelationshipTerms(result.query, this.options.relationshipTypes);
      },
      { signal }
    );
    if (signal?.aborted) return this.cancel(summary, startedAt);

    built.forEach((outcome, i) => {
      const item = work[i];
      if (outcome?.status === 'fulfilled') {
        item.query = outcome.value;
        summary.queries[item.node.id] = outcome.value;
      } else if (outcome?.status === 'rejected') {
        item.failure = { node_id: item.node.id, attempt: 0, stage: 'build_queries', ...summarizeError(outcome.reason) };
      }
    });

    // ── fetch_evidence ───────────────────────────────────────────────────────
    this._state = 'fetch_evidence';
    const fetchable = work.filter((item) => item.query !== undefined);
    const fetched = await settleWithConcurrency(
      fetchable,
      width,
      (item) =>
        this.collaborators.literature.search(item.query ?? '', this.options.maxResultsPerNode, this.options.dateRange),
      { signal }
    );
    if (signal?.aborted) return this.cancel(summary, startedAt);

    fetched.forEach((outcome, i) => {
      const item = fetchable[i];
      if (outcome?.status === 'fulfilled') {
        item.records = outcome.value;
        summary.records_fetched += outcome.value.length;
      } else if (outcome?.status === 'rejected') {
        item.failure = { node_id: item.node.id, attempt: 0, stage: 'fetch_evidence', ...summarizeError(outcome.reason) };
      }
    });

    // ── admit_candidates (synchronous) ───────────────────────────────────────
    this._state = 'admit_candidates';
    let touched: string[];
    try {
      touched = this.admit(work, summary);
    } finally {
      this._state = 'idle';
    }

    if (this.options.validateNewNodes && !signal?.aborted) {
      summary.validations = await this.validateNodes(touched, signal);
    }

    return this.finish(summary, startedAt, {});
  }

  /**
   * Run cycles until exhausted, maxCycles, the deadline or the signal.
   */
  async expand(options: ExpandOptions = {}): Promise<ExpansionReport> {
    const maxCycles = options.maxCycles ?? DEFAULT_MAX_CYCLES;
    const nodesBefore = this.store.nodeCount;
    const edgesBefore = this.store.edgeCount;

    const controller = new AbortController();
    let deadlineHit = false;
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) controller.abort();
    const timer =
      options.deadlineMs === undefined
        ? undefined
        : setTimeout(() => {
            deadlineHit = true;
            controller.abort();
          }, options.deadlineMs);

    const cycles: CycleSummary[] = [];
    let status: ExpansionStatus = 'max_cycles';
    let stopReason: ExpansionReport['stop_reason'] = 'max_cycles';

    try {
      for (let i = 0; i < maxCycles; i++) {
        if (controller.signal.aborted) {
          status = 'cancelled';
          break;
        }
        const cycle = await this.runCycle(controller.signal);
        cycles.push(cycle);
        if (cycle.cancelled) {
          status = 'cancelled';
          break;
        }
        if (cycle.exhausted) {
          status = 'exhausted';
          stopReason = this.store.nodeCount >= this.store.constraints.maxNodes ? 'capacity' : 'frontier_empty';
          break;
        }
      }
      if (status === 'cancelled') {
        stopReason = deadlineHit ? 'deadline' : 'signal';
      }
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }

    const report: ExpansionReport = {
      status,
      stop_reason: stopReason,
      cycles,
      nodes_added: this.store.nodeCount - nodesBefore,
      edges_added: this.store.edgeCount - edgesBefore,
      node_count: this.store.nodeCount,
      edge_count: this.store.edgeCount,
    };
    console.error(
      `[Expansion] ${status} (${stopReason}) after ${cycles.length} cycle(s): +${report.nodes_added} nodes, +${report.edges_added} edges`
    );
    return report;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * One synchronous pass: bookkeeping for every frontier node, then every
   * candidate through addEdge. Returns the ids of nodes touched.
   *
   * Matchers are built first: if that throws, no frontier node has been
   * marked expanded or charged a failed attempt.
   */
  private admit(work: readonly FrontierWork[], summary: CycleSummary): string[] {
    const matchers = buildEntityMatchers([...this.store.listNodes(), ...this.options.lexicon]);
    const touched = new Set<string>();
    const evidence: Array<{ node: KnowledgeNode; records: LiteratureRecord[] }> = [];

    for (const item of work) {
      if (item.failure) {
        const attempt = (this.failedAttempts.get(item.node.id) ?? 0) + 1;
        this.failedAttempts.set(item.node.id, attempt);
        summary.fetch_failures.push({ ...item.failure, attempt });
        console.error(
          `[Expansion] ${item.failure.stage} failed for ${item.node.id} (attempt ${attempt}/${this.options.maxFetchAttempts}): ${item.failure.message}`
        );
      } else if (item.records) {
        this.expanded.add(item.node.id);
        evidence.push({ node: item.node, records: item.records });
      }
    }

    const candidates = deriveCandidates(evidence, matchers);
    summary.candidate_count = candidates.length;

    for (const candidate of candidates) {
      this.admitOne(candidate, summary, touched);
    }
    return [...touched];
  }

  private admitOne(candidate: CandidateEdge, summary: CycleSummary, touched: Set<string>): void {
    try {
      const result = this.store.addEdge(
        {
          source_node_id: candidate.source_node_id,
          target_node_id: candidate.target_node_id,
          relationship_type: candidate.relationship_type,
          evidence: candidate.evidence,
          confidence: candidate.confidence,
        },
        { createTarget: this.store.hasNode(candidate.target_node_id) ? undefined : candidate.target }
      );

      summary.admitted.push({
        edge_id: result.edge.id,
        source_node_id: result.edge.source_node_id,
        target_node_id: result.edge.target_node_id,
        relationship_type: result.edge.relationship_type,
        evidence_count: result.edge.evidence.length,
        confidence: result.edge.confidence,
        merged: result.merged,
        created_node: result.created_node?.id ?? null,
      });
      if (result.created_node) summary.created_nodes.push(result.created_node.id);
      for (const id of result.relaxed_node_ids) {
        if (!summary.relaxed_node_ids.includes(id)) summary.relaxed_node_ids.push(id);
      }
      touched.add(result.edge.source_node_id);
      touched.add(result.edge.target_node_id);
    } catch (error) {
      if (!(error instanceof MCPError) || !SKIPPABLE_CATEGORIES.has(error.category)) {
        throw error;
      }
      summary.skipped.push({
        source_node_id: candidate.source_node_id,
        target_node_id: candidate.target_node_id,
        relationship_type: candidate.relationship_type,
        evidence_count: candidate.evidence.length,
        reason: error.category,
        message: error.message,
      });
    }
  }

  /**
   * Resolve unvalidated touched nodes (bounded fan-out), then write the
   * best matches one validateNode call at a time.
   */
  private async validateNodes(nodeIds: readonly string[], signal?: AbortSignal): Promise<NodeValidation[]> {
    const resolver = this.collaborators.resolver;
    if (!resolver) return [];

    const pending = nodeIds
      .map((id) => this.store.getNode(id))
      .filter((node): node is KnowledgeNode => node !== null && !node.validated);
    if (pending.length === 0) return [];

    const resolved = await settleWithConcurrency(
      pending,
      this.options.fetchConcurrency,
      (node) => resolver.resolve(node.label),
      { signal }
    );

    const validations: NodeValidation[] = [];
    resolved.forEach((outcome, i) => {
      const node = pending[i];
      if (outcome === undefined) return;
      if (outcome.status === 'rejected') {
        validations.push({ node_id: node.id, umls_cui: null, error: summarizeError(outcome.reason).message });
        return;
      }
      const best = bestConcept(outcome.value, this.options.minValidationRelevance);
      if (best === null) {
        validations.push({ node_id: node.id, umls_cui: null });
        return;
      }
      this.store.validateNode(node.id, best.concept_id);
      validations.push({ node_id: node.id, umls_cui: best.concept_id });
    });
    return validations;
  }

  private emptySummary(cycle: number): CycleSummary {
    return {
      cycle,
      frontier: [],
      queries: {},
      records_fetched: 0,
      candidate_count: 0,
      admitted: [],
      created_nodes: [],
      skipped: [],
      fetch_failures: [],
      validations: [],
      relaxed_node_ids: [],
      cancelled: false,
      exhausted: false,
      node_count: 0,
      edge_count: 0,
      duration_ms: 0,
    };
  }

  private cancel(summary: CycleSummary, startedAt: number): CycleSummary {
    this._state = 'idle';
    console.error(`[Expansion] Cycle ${summary.cycle} cancelled before admission`);
    return this.finish(summary, startedAt, { cancelled: true });
  }

  private finish(
    summary: CycleSummary,
    startedAt: number,
    flags: { cancelled?: boolean; exhausted?: boolean }
  ): CycleSummary {
    summary.cancelled = flags.cancelled ?? false;
    summary.exhausted = flags.exhausted ?? false;
    summary.node_count = this.store.nodeCount;
    summary.edge_count = this.store.edgeCount;
    summary.duration_ms = Date.now() - startedAt;
    return summary;
  }
}

/**
 * Best candidate with a concept id at or above the threshold, ranked by
 * compareConcepts.
 */
export function bestConcept(candidates: readonly ResolvedConcept[], minRelevance: number): ResolvedConcept | null {
  const eligible = candidates.filter((c) => c.relevance_score >= minRelevance && c.concept_id.trim().length > 0);
  if (eligible.length === 0) return null;
  return [...eligible].sort(compareConcepts)[0];
}
