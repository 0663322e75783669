/**
 * In-Memory Graph Store
 *
 * Owns the node arena (id -> node) and the ordered edge list of one session.
 * Every mutation checks the global constraints before touching state, so a
 * failed call leaves the graph exactly as it was:
 *
 * - nodes.size <= maxNodes
 * - every reachable node has depth <= maxDepth (shortest undirected hop
 *   count from any seed)
 * - every edge carries >= minPubmedCitations distinct evidence sources
 * - every edge references nodes present in the store
 *
 * Depth is not fixed at creation. Admitting an edge can shorten the seed
 * distance of either endpoint, so addEdge runs a bounded breadth-first
 * relaxation from the endpoints whose distance dropped.
 *
 * All methods are synchronous: under the event loop each call is atomic and
 * mutations never interleave.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/graph/graph-store
 */

import {
  DEFAULT_GRAPH_CONSTRAINTS,
  GraphConstraintsSchema,
  SEED_ENTITIES,
  NODE_CATEGORIES,
  RELATIONSHIP_TYPES,
  dedupeEvidence,
  edgeKey,
  type EdgeInput,
  type EntityDefinition,
  type GraphConstraints,
  type KnowledgeEdge,
  type KnowledgeNode,
  type NodeCategory,
  type RelationshipType,
} from '../../models/graph.js';
import {
  capacityExceededError,
  depthExceededError,
  insufficientEvidenceError,
  nodeNotFoundError,
  validationError,
} from '../../server/errors.js';
import { toNodeId } from './node-id.js';

// ============================================================
// Types
// ============================================================

export type EdgeDirection = 'outgoing' | 'incoming' | 'both';

export interface AddNodeOptions {
  synonyms?: string[];
}

export interface CreateTargetSpec {
  label: string;
  category: NodeCategory;
  synonyms?: string[];
}

export interface AddEdgeOptions {
  /** Create the target node as part of the same atomic admission when absent */
  createTarget?: CreateTargetSpec;
}

export interface AddEdgeResult {
  edge: KnowledgeEdge;
  merged: boolean;
  created_node: KnowledgeNode | null;
  /** Ids of nodes whose depth decreased during relaxation */
  relaxed_node_ids: string[];
}

export interface GraphSummary {
  node_count: number;
  edge_count: number;
  validated_count: number;
  seed_count: number;
  unreachable_count: number;
  depth_histogram: Record<string, number>;
  category_counts: Record<string, number>;
  relationship_counts: Record<string, number>;
  constraints: GraphConstraints;
}

export interface GraphPath {
  length: number;
  node_ids: string[];
  edge_ids: string[];
}

export interface GraphStateSnapshot {
  nodes: KnowledgeNode[];
  edges: KnowledgeEdge[];
}

function cloneNode(node: KnowledgeNode): KnowledgeNode {
  return { ...node, synonyms: [...node.synonyms] };
}

function cloneEdge(edge: KnowledgeEdge): KnowledgeEdge {
  return { ...edge, evidence: [...edge.evidence] };
}

// ============================================================
// GraphStore
// ============================================================

export class GraphStore {
  readonly constraints: GraphConstraints;

  private readonly nodes = new Map<string, KnowledgeNode>();
  private readonly edges: KnowledgeEdge[] = [];
  /** edgeKey -> index into edges */
  private readonly edgeIndex = new Map<string, number>();
  /** Undirected adjacency used for depth computation and path finding */
  private readonly adjacency = new Map<string, Set<string>>();

  constructor(
    constraints: Partial<GraphConstraints> = {},
    seeds: readonly EntityDefinition[] = SEED_ENTITIES
  ) {
    this.constraints = Object.freeze(
      GraphConstraintsSchema.parse({ ...DEFAULT_GRAPH_CONSTRAINTS, ...constraints })
    );

    if (seeds.length === 0) {
      throw validationError('At least one seed entity is required');
    }
    if (seeds.length > this.constraints.maxNodes) {
      throw validationError(
        `${seeds.length} seed entities exceed the node limit of ${this.constraints.maxNodes}`
      );
    }

    const now = new Date().toISOString();
    for (const seed of seeds) {
      const id = toNodeId(seed.label);
      if (this.nodes.has(id)) {
        throw validationError(`Duplicate seed entity "${seed.label}"`, { id });
      }
      this.insertNode({
        id,
        label: seed.label,
        category: seed.category,
        synonyms: [...seed.synonyms],
        umls_cui: null,
        validated: false,
        depth: 0,
        reachable: true,
        is_seed: true,
        created_at: now,
      });
    }
  }

  // ──────────────────────────────────────────────────────────────
  // Mutations
  // ──────────────────────────────────────────────────────────────

  /**
   * Add a node, or return the existing node with the same normalized id.
   *
   * Depth only follows edges, and a new node has none yet: it is kept but
   * flagged unreachable with depth clamped to maxDepth until addEdge links it
   * to a reachable node.
   *
   * @throws MCPError CAPACITY_EXCEEDED when the store is full
   */
  addNode(label: string, category: NodeCategory, options: AddNodeOptions = {}): KnowledgeNode {
    const id = toNodeId(label);
    const existing = this.nodes.get(id);
    if (existing) {
      return cloneNode(existing);
    }

    if (this.nodes.size >= this.constraints.maxNodes) {
      throw capacityExceededError(this.constraints.maxNodes, label);
    }

    const node: KnowledgeNode = {
      id,
      label: label.trim(),
      category,
      synonyms: [...(options.synonyms ?? [])],
      umls_cui: null,
      validated: false,
      depth: this.constraints.maxDepth,
      reachable: false,
      is_seed: false,
      created_at: new Date().toISOString(),
    };
    this.insertNode(node);

    console.error(`[GraphStore] Node "${id}" added without edges; unreachable until an edge links it`);
    return cloneNode(node);
  }

  /**
   * Attach a UMLS CUI to a node. Re-validating overwrites the previous CUI.
   *
   * @throws MCPError NOT_FOUND when the node is absent
   */
  validateNode(nodeId: string, cui: string): KnowledgeNode {
    const node = this.requireNodeInternal(nodeId);
    const trimmed = cui.trim();
    if (trimmed.length === 0) {
      throw validationError('CUI must be a non-empty string', { nodeId });
    }
    if (node.umls_cui && node.umls_cui !== trimmed) {
      console.error(`[GraphStore] Re-validating "${nodeId}": ${node.umls_cui} -> ${trimmed}`);
    }
    node.umls_cui = trimmed;
    node.validated = true;
    return cloneNode(node);
  }

  /**
   * Admit an edge. All checks run before any state changes.
   *
   * An edge with the same (source, target, relationship_type) as an existing
   * one is merged: evidence is unioned by source_id, confidence becomes the max.
   *
   * @throws MCPError NOT_FOUND when an endpoint is absent (and no createTarget)
   * @throws MCPError INSUFFICIENT_EVIDENCE below minPubmedCitations distinct sources
   * @throws MCPError DEPTH_EXCEEDED when an endpoint would lie beyond maxDepth
   * @throws MCPError CAPACITY_EXCEEDED when createTarget needs a node and the store is full
   */
  addEdge(input: EdgeInput, options: AddEdgeOptions = {}): AddEdgeResult {
    if (!RELATIONSHIP_TYPES.includes(input.relationship_type)) {
      throw validationError(`Unknown relationship type "${String(input.relationship_type)}"`);
    }
    if (!Number.isFinite(input.confidence) || input.confidence < 0 || input.confidence > 1) {
      throw validationError(`Confidence must be within [0, 1], got ${input.confidence}`);
    }
    if (input.source_node_id === input.target_node_id) {
      throw validationError('Source and target nodes cannot be the same', {
        nodeId: input.source_node_id,
      });
    }

    const source = this.requireNodeInternal(input.source_node_id);
    let target = this.nodes.get(input.target_node_id);
    const createTarget = target ? undefined : options.createTarget;
    if (!target) {
      if (!createTarget) {
        throw nodeNotFoundError(input.target_node_id);
      }
      if (!NODE_CATEGORIES.includes(createTarget.category)) {
        throw validationError(`Unknown node category "${String(createTarget.category)}"`);
      }
      if (toNodeId(createTarget.label) !== input.target_node_id) {
        throw validationError(
          `Target label "${createTarget.label}" does not normalize to "${input.target_node_id}"`
        );
      }
    }

    const evidence = dedupeEvidence(input.evidence);
    if (evidence.length < this.constraints.minPubmedCitations) {
      throw insufficientEvidenceError(evidence.length, this.constraints.minPubmedCitations, {
        source_node_id: input.source_node_id,
        target_node_id: input.target_node_id,
        relationship_type: input.relationship_type,
      });
    }

    // Distances after admission; relaxation only ever lowers them
    const sourceDistance = this.distanceOf(source);
    const targetDistance = target ? this.distanceOf(target) : Number.POSITIVE_INFINITY;
    const nextSource = Math.min(sourceDistance, targetDistance + 1);
    const nextTarget = Math.min(targetDistance, sourceDistance + 1);
    const { maxDepth } = this.constraints;
    if (nextSource > maxDepth) {
      throw depthExceededError(source.id, Number.isFinite(nextSource) ? nextSource : null, maxDepth);
    }
    if (nextTarget > maxDepth) {
      throw depthExceededError(
        input.target_node_id,
        Number.isFinite(nextTarget) ? nextTarget : null,
        maxDepth
      );
    }

    if (createTarget && this.nodes.size >= this.constraints.maxNodes) {
      throw capacityExceededError(this.constraints.maxNodes, createTarget.label);
    }

    // ── commit ──
    const now = new Date().toISOString();
    let createdNode: KnowledgeNode | null = null;
    if (!target && createTarget) {
      target = {
        id: input.target_node_id,
        label: createTarget.label.trim(),
        category: createTarget.category,
        synonyms: [...(createTarget.synonyms ?? [])],
        umls_cui: null,
        validated: false,
        depth: nextTarget,
        reachable: true,
        is_seed: false,
        created_at: now,
      };
      this.insertNode(target);
      createdNode = cloneNode(target);
    }
    if (!target) {
      throw nodeNotFoundError(input.target_node_id);
    }

    const key = edgeKey(source.id, input.relationship_type, target.id);
    const existingIndex = this.edgeIndex.get(key);
    let edge: KnowledgeEdge;
    let merged = false;

    if (existingIndex !== undefined) {
      const existing = this.edges[existingIndex];
      const before = existing.evidence.length;
      existing.evidence = dedupeEvidence([...existing.evidence, ...evidence]);
      existing.confidence = Math.max(existing.confidence, input.confidence);
      existing.updated_at = now;
      edge = existing;
      merged = true;
      console.error(
        `[GraphStore] Merged edge ${key}: evidence ${before} -> ${existing.evidence.length}, confidence ${existing.confidence}`
      );
    } else {
      edge = {
        id: key,
        source_node_id: source.id,
        target_node_id: target.id,
        relationship_type: input.relationship_type,
        evidence,
        confidence: input.confidence,
        created_at: now,
        updated_at: now,
      };
      this.edgeIndex.set(key, this.edges.length);
      this.edges.push(edge);
      this.link(source.id, target.id);
    }

    const relaxed = this.relaxFrom([
      { node: source, distance: nextSource },
      { node: target, distance: nextTarget },
    ]);

    return {
      edge: cloneEdge(edge),
      merged,
      created_node: createdNode,
      relaxed_node_ids: relaxed,
    };
  }

  /**
   * Full multi-source BFS from the seeds. Nodes farther than maxDepth are
   * re-flagged unreachable (kept, depth clamped) rather than evicted.
   *
   * @returns ids of nodes flagged unreachable
   */
  recomputeDepths(): string[] {
    const { maxDepth } = this.constraints;
    const distances = new Map<string, number>();
    const queue: string[] = [];
    for (const node of this.nodes.values()) {
      if (node.is_seed) {
        distances.set(node.id, 0);
        queue.push(node.id);
      }
    }

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      const d = distances.get(current) ?? 0;
      if (d >= maxDepth) continue;
      for (const neighbor of this.adjacency.get(current) ?? []) {
        if (!distances.has(neighbor)) {
          distances.set(neighbor, d + 1);
          queue.push(neighbor);
        }
      }
    }

    const unreachable: string[] = [];
    for (const node of this.nodes.values()) {
      const d = distances.get(node.id);
      if (d === undefined) {
        node.reachable = false;
        node.depth = maxDepth;
        unreachable.push(node.id);
      } else {
        node.reachable = true;
        node.depth = d;
      }
    }

    if (unreachable.length > 0) {
      console.error(
        `[GraphStore] ${unreachable.length} node(s) beyond ${maxDepth} hops flagged unreachable: ${unreachable.join(', ')}`
      );
    }
    return unreachable;
  }

  /**
   * Replace the whole graph state. Seeds must be present in the snapshot.
   * Invariants are checked before anything is replaced, then depths are recomputed.
   */
  replaceState(snapshot: GraphStateSnapshot): void {
    const { maxNodes, minPubmedCitations } = this.constraints;
    if (snapshot.nodes.length > maxNodes) {
      throw capacityExceededError(maxNodes);
    }

    const ids = new Set<string>();
    for (const node of snapshot.nodes) {
      if (node.id !== toNodeId(node.label)) {
        throw validationError(`Node id "${node.id}" does not match its label "${node.label}"`);
      }
      if (ids.has(node.id)) {
        throw validationError(`Duplicate node id "${node.id}"`);
      }
      ids.add(node.id);
    }
    const seedIds = new Set(
      [...this.nodes.values()].filter((n) => n.is_seed).map((n) => n.id)
    );
    for (const seedId of seedIds) {
      if (!ids.has(seedId)) {
        throw validationError(`Snapshot is missing seed node "${seedId}"`);
      }
    }

    const keys = new Set<string>();
    for (const edge of snapshot.edges) {
      if (!ids.has(edge.source_node_id)) throw nodeNotFoundError(edge.source_node_id);
      if (!ids.has(edge.target_node_id)) throw nodeNotFoundError(edge.target_node_id);
      if (edge.source_node_id === edge.target_node_id) {
        throw validationError(`Edge "${edge.id}" is a self-loop`);
      }
      const distinct = dedupeEvidence(edge.evidence).length;
      if (distinct < minPubmedCitations) {
        throw insufficientEvidenceError(distinct, minPubmedCitations, { edge_id: edge.id });
      }
      const key = edgeKey(edge.source_node_id, edge.relationship_type, edge.target_node_id);
      if (keys.has(key)) {
        throw validationError(`Duplicate edge "${key}"`);
      }
      keys.add(key);
    }

    this.nodes.clear();
    this.edges.length = 0;
    this.edgeIndex.clear();
    this.adjacency.clear();

    for (const node of snapshot.nodes) {
      this.insertNode({
        ...cloneNode(node),
        is_seed: seedIds.has(node.id),
        validated: typeof node.umls_cui === 'string' && node.umls_cui.length > 0,
      });
    }
    for (const edge of snapshot.edges) {
      const key = edgeKey(edge.source_node_id, edge.relationship_type, edge.target_node_id);
      this.edgeIndex.set(key, this.edges.length);
      this.edges.push({ ...cloneEdge(edge), id: key, evidence: dedupeEvidence(edge.evidence) });
      this.link(edge.source_node_id, edge.target_node_id);
    }

    this.recomputeDepths();
  }

  // ──────────────────────────────────────────────────────────────
  // Reads
  // ──────────────────────────────────────────────────────────────

  summary(): GraphSummary {
    const depthHistogram: Record<string, number> = {};
    const categoryCounts: Record<string, number> = {};
    const relationshipCounts: Record<string, number> = {};
    let validated = 0;
    let seeds = 0;
    let unreachable = 0;

    for (const node of this.nodes.values()) {
      if (node.validated) validated++;
      if (node.is_seed) seeds++;
      if (node.reachable) {
        const key = String(node.depth);
        depthHistogram[key] = (depthHistogram[key] ?? 0) + 1;
      } else {
        unreachable++;
      }
      categoryCounts[node.category] = (categoryCounts[node.category] ?? 0) + 1;
    }
    for (const edge of this.edges) {
      relationshipCounts[edge.relationship_type] =
        (relationshipCounts[edge.relationship_type] ?? 0) + 1;
    }

    return {
      node_count: this.nodes.size,
      edge_count: this.edges.length,
      validated_count: validated,
      seed_count: seeds,
      unreachable_count: unreachable,
      depth_histogram: depthHistogram,
      category_counts: categoryCounts,
      relationship_counts: relationshipCounts,
      constraints: this.constraints,
    };
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  getNode(nodeId: string): KnowledgeNode | null {
    const node = this.nodes.get(nodeId);
    return node ? cloneNode(node) : null;
  }

  /**
   * @throws MCPError NOT_FOUND when the node is absent
   */
  requireNode(nodeId: string): KnowledgeNode {
    return cloneNode(this.requireNodeInternal(nodeId));
  }

  /** Nodes in insertion order */
  listNodes(): KnowledgeNode[] {
    return [...this.nodes.values()].map(cloneNode);
  }

  listEdges(): KnowledgeEdge[] {
    return this.edges.map(cloneEdge);
  }

  seedNodes(): KnowledgeNode[] {
    return this.listNodes().filter((n) => n.is_seed);
  }

  getEdge(sourceId: string, relationshipType: RelationshipType, targetId: string): KnowledgeEdge | null {
    const index = this.edgeIndex.get(edgeKey(sourceId, relationshipType, targetId));
    return index === undefined ? null : cloneEdge(this.edges[index]);
  }

  getEdgesForNode(nodeId: string, direction: EdgeDirection = 'both'): KnowledgeEdge[] {
    this.requireNodeInternal(nodeId);
    return this.edges
      .filter((edge) => {
        if (direction === 'outgoing') return edge.source_node_id === nodeId;
        if (direction === 'incoming') return edge.target_node_id === nodeId;
        return edge.source_node_id === nodeId || edge.target_node_id === nodeId;
      })
      .map(cloneEdge);
  }

  getNeighbors(nodeId: string, direction: EdgeDirection = 'both'): KnowledgeNode[] {
    const neighborIds = new Set<string>();
    for (const edge of this.getEdgesForNode(nodeId, direction)) {
      neighborIds.add(edge.source_node_id === nodeId ? edge.target_node_id : edge.source_node_id);
    }
    return [...neighborIds].flatMap((id) => {
      const node = this.nodes.get(id);
      return node ? [cloneNode(node)] : [];
    });
  }

  /**
   * Shortest undirected path between two nodes using BFS.
   *
   * @returns the path, or null when none exists within maxHops
   */
  findPath(sourceId: string, targetId: string, maxHops = this.constraints.maxDepth * 2): GraphPath | null {
    this.requireNodeInternal(sourceId);
    this.requireNodeInternal(targetId);
    if (sourceId === targetId) {
      return { length: 0, node_ids: [sourceId], edge_ids: [] };
    }

    const previous = new Map<string, string>([[sourceId, sourceId]]);
    let frontier = [sourceId];
    for (let hops = 0; hops < maxHops && frontier.length > 0; hops++) {
      const next: string[] = [];
      for (const current of frontier) {
        for (const neighbor of this.adjacency.get(current) ?? []) {
          if (previous.has(neighbor)) continue;
          previous.set(neighbor, current);
          if (neighbor === targetId) {
            return this.tracePath(previous, sourceId, targetId);
          }
          next.push(neighbor);
        }
      }
      frontier = next;
    }
    return null;
  }

  // ──────────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────────

  private insertNode(node: KnowledgeNode): void {
    this.nodes.set(node.id, node);
    this.adjacency.set(node.id, new Set());
  }

  private link(a: string, b: string): void {
    this.adjacency.get(a)?.add(b);
    this.adjacency.get(b)?.add(a);
  }

  private requireNodeInternal(nodeId: string): KnowledgeNode {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw nodeNotFoundError(nodeId);
    }
    return node;
  }

  private distanceOf(node: KnowledgeNode): number {
    return node.reachable ? node.depth : Number.POSITIVE_INFINITY;
  }

  /**
   * Apply the post-admission distances of the edge endpoints, then propagate
   * any decrease breadth-first. Propagation stops at maxDepth.
   */
  private relaxFrom(updates: Array<{ node: KnowledgeNode; distance: number }>): string[] {
    const { maxDepth } = this.constraints;
    const relaxed: string[] = [];
    const queue: KnowledgeNode[] = [];

    for (const { node, distance } of updates) {
      if (distance < this.distanceOf(node)) {
        node.depth = distance;
        node.reachable = true;
        relaxed.push(node.id);
        queue.push(node);
      }
    }

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      const candidate = current.depth + 1;
      if (candidate > maxDepth) continue;
      for (const neighborId of this.adjacency.get(current.id) ?? []) {
        const neighbor = this.nodes.get(neighborId);
        if (!neighbor || candidate >= this.distanceOf(neighbor)) continue;
        neighbor.depth = candidate;
        neighbor.reachable = true;
        relaxed.push(neighbor.id);
        queue.push(neighbor);
      }
    }

    return relaxed;
  }

  private tracePath(previous: Map<string, string>, sourceId: string, targetId: string): GraphPath {
    const nodeIds = [targetId];
    let cursor = targetId;
    while (cursor !== sourceId) {
      const prior = previous.get(cursor);
      if (prior === undefined) break;
      nodeIds.unshift(prior);
      cursor = prior;
    }

    const edgeIds: string[] = [];
    for (let i = 0; i < nodeIds.length - 1; i++) {
      const a = nodeIds[i];
      const b = nodeIds[i + 1];
      const edge = this.edges.find(
        (e) =>
          (e.source_node_id === a && e.target_node_id === b) ||
          (e.source_node_id === b && e.target_node_id === a)
      );
      if (edge) edgeIds.push(edge.id);
    }

    return { length: nodeIds.length - 1, node_ids: nodeIds, edge_ids: edgeIds };
  }
}
