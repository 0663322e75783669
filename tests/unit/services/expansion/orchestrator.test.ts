/**
 * Unit Tests for ExpansionOrchestrator
 *
 * Literature and terminology collaborators are in-process fakes; query
 * building runs in literal mode unless a test says otherwise.
 *
 * @module tests/unit/services/expansion/orchestrator
 */

import { describe, it, expect } from 'vitest';
import { createEvidence, type EntityDefinition } from '../../../../src/models/graph.js';
import {
  ExpansionOrchestrator,
  bestConcept,
  type ExpansionOptions,
} from '../../../../src/services/expansion/orchestrator.js';
import { GraphStore } from '../../../../src/services/graph/graph-store.js';
import { ConceptQueryBuilder, compareConcepts } from '../../../../src/services/query/concept-query-builder.js';
import type { TerminologyResolver } from '../../../../src/services/collaborators.js';
import { FakeLiterature, FakeResolver, concept, record, type LiteratureHandler } from '../../../helpers/fakes.js';

const SEED_IDS = ['intracranial_aneurysm_rupture', 'inflammation', 'hemodynamics'];

const LEXICON: EntityDefinition[] = [
  { label: 'Interleukin-6', category: 'Molecular', synonyms: ['IL-6'] },
  { label: 'C-Reactive Protein', category: 'Biomarker', synonyms: ['CRP'] },
];

function setup(
  handler: LiteratureHandler,
  options: Partial<ExpansionOptions> = {},
  store: GraphStore = new GraphStore(),
  resolver: TerminologyResolver | null = null
): { store: GraphStore; literature: FakeLiterature; orchestrator: ExpansionOrchestrator } {
  const literature = new FakeLiterature(handler);
  const orchestrator = new ExpansionOrchestrator(
    store,
    { literature, queryBuilder: new ConceptQueryBuilder(null), resolver },
    { useConcepts: false, lexicon: LEXICON, ...options }
  );
  return { store, literature, orchestrator };
}

const IL6_RECORDS = [
  record('101', 'Interleukin-6 promotes inflammation.'),
  record('102', 'IL-6 promotes inflammation in the aneurysm wall.'),
];

describe('ExpansionOrchestrator', () => {
  describe('selectFrontier', () => {
    it('takes reachable nodes below maxDepth by depth then insertion order', () => {
      const store = new GraphStore();
      store.addEdge(
        {
          source_node_id: 'inflammation',
          target_node_id: 'deep',
          relationship_type: 'ASSOCIATED_WITH',
          evidence: [createEvidence('1', ''), createEvidence('2', '')],
          confidence: 0.5,
        },
        { createTarget: { label: 'Deep', category: 'Concept' } }
      );
      store.addNode('Orphan', 'Concept');
      const { orchestrator } = setup(() => [], {}, store);
      expect(orchestrator.selectFrontier().map((n) => n.id)).toEqual([...SEED_IDS, 'deep']);
    });

    it('honours frontierLimit', () => {
      const { orchestrator } = setup(() => [], { frontierLimit: 1 });
      expect(orchestrator.selectFrontier().map((n) => n.id)).toEqual(['intracranial_aneurysm_rupture']);
    });
  });

  describe('runCycle', () => {
    it('builds queries, fetches evidence and admits candidates', async () => {
      const { store, literature, orchestrator } = setup((query) => (query === 'inflammation' ? IL6_RECORDS : []));

      const cycle = await orchestrator.runCycle();
      expect(cycle.cycle).toBe(1);
      expect(cycle.frontier).toEqual(SEED_IDS);
      expect(cycle.queries).toEqual({
        intracranial_aneurysm_rupture: '(intracranial AND aneurysm AND rupture)',
        inflammation: 'inflammation',
        hemodynamics: 'hemodynamics',
      });
      expect(literature.queries).toEqual(['(intracranial AND aneurysm AND rupture)', 'inflammation', 'hemodynamics']);
      expect(cycle.records_fetched).toBe(2);
      expect(cycle.candidate_count).toBe(1);
      expect(cycle.admitted).toEqual([
        {
          edge_id: 'inflammation->INFLUENCES->interleukin_6',
          source_node_id: 'inflammation',
          target_node_id: 'interleukin_6',
          relationship_type: 'INFLUENCES',
          evidence_count: 2,
          confidence: 0.5,
          merged: false,
          created_node: 'interleukin_6',
        },
      ]);
      expect(cycle.created_nodes).toEqual(['interleukin_6']);
      expect(cycle).toMatchObject({ cancelled: false, exhausted: false, node_count: 4, edge_count: 1 });
      expect(store.requireNode('interleukin_6')).toMatchObject({ depth: 1, category: 'Molecular', synonyms: ['IL-6'] });
      expect(orchestrator.state).toBe('idle');
      expect(orchestrator.getStatus().expanded).toEqual(SEED_IDS);
    });

    it('records candidates below the evidence minimum as skipped', async () => {
      const { store, orchestrator } = setup((query) => (query === 'inflammation' ? IL6_RECORDS.slice(0, 1) : []));

      const cycle = await orchestrator.runCycle();
      expect(cycle.admitted).toEqual([]);
      expect(cycle.skipped).toEqual([
        {
          source_node_id: 'inflammation',
          target_node_id: 'interleukin_6',
          relationship_type: 'INFLUENCES',
          evidence_count: 1,
          reason: 'INSUFFICIENT_EVIDENCE',
          message: 'Edge has 1 distinct evidence source(s); at least 2 required',
        },
      ]);
      expect(store.edgeCount).toBe(0);
      expect(store.hasNode('interleukin_6')).toBe(false);
    });

    it('skips candidates once the store is full', async () => {
      const both = [
        record('201', 'IL-6 and CRP are associated with inflammation.'),
        record('202', 'Inflammation, IL-6 and CRP are associated.'),
      ];
      const { orchestrator } = setup(
        (query) => (query === 'inflammation' ? both : []),
        {},
        new GraphStore({ maxNodes: 4 })
      );

      const report = await orchestrator.expand({ maxCycles: 5 });
      expect(report.cycles[0].admitted.map((a) => a.target_node_id)).toEqual(['interleukin_6']);
      expect(report.cycles[0].skipped.map((s) => [s.target_node_id, s.reason])).toEqual([
        ['c_reactive_protein', 'CAPACITY_EXCEEDED'],
      ]);
      expect(report.status).toBe('exhausted');
      expect(report.stop_reason).toBe('capacity');
      expect(report.cycles).toHaveLength(2);
      expect(orchestrator.state).toBe('exhausted');
    });

    it('retries failed fetches up to maxFetchAttempts, then retires the node', async () => {
      const { orchestrator } = setup(
        (query) => {
          if (query === 'hemodynamics') throw new Error('socket hang up');
          return [];
        },
        { maxFetchAttempts: 2 }
      );

      const first = await orchestrator.runCycle();
      expect(first.fetch_failures).toEqual([
        {
          node_id: 'hemodynamics',
          attempt: 1,
          stage: 'fetch_evidence',
          category: 'FETCH_FAILED',
          message: 'socket hang up',
        },
      ]);

      const second = await orchestrator.runCycle();
      expect(second.frontier).toEqual(['hemodynamics']);
      expect(second.fetch_failures[0].attempt).toBe(2);

      const third = await orchestrator.runCycle();
      expect(third.exhausted).toBe(true);
      expect(orchestrator.getStatus()).toMatchObject({
        cycles_run: 2,
        failed_attempts: { hemodynamics: 2 },
        retired: ['hemodynamics'],
      });
    });

    it('records query build failures without fetching', async () => {
      const { literature, orchestrator } = setup(() => [], { useConcepts: true });

      const cycle = await orchestrator.runCycle();
      expect(cycle.fetch_failures.map((f) => [f.node_id, f.stage, f.category])).toEqual([
        ['intracranial_aneurysm_rupture', 'build_queries', 'CONFIGURATION_ERROR'],
        ['inflammation', 'build_queries', 'CONFIGURATION_ERROR'],
        ['hemodynamics', 'build_queries', 'CONFIGURATION_ERROR'],
      ]);
      expect(literature.queries).toEqual([]);
    });

    it('ANDs relationship cue words onto frontier queries', async () => {
      const { literature, orchestrator } = setup(() => [], { relationshipTypes: ['BIOMARKER_FOR'], frontierLimit: 1 });
      await orchestrator.runCycle();
      expect(literature.queries).toEqual([
        '((intracranial AND aneurysm AND rupture)) AND (biomarker[Title/Abstract])',
      ]);
    });

    it('passes the date range to the literature index', async () => {
      const { literature, orchestrator } = setup(() => [], { dateRange: { start: '2020' }, frontierLimit: 1 });
      await orchestrator.runCycle();
      expect(literature.dateRanges).toEqual([{ start: '2020' }]);
    });

    it('admits nothing when the signal aborts during the fetch', async () => {
      const controller = new AbortController();
      const { store, orchestrator } = setup((query) => {
        controller.abort();
        return query === 'inflammation' ? IL6_RECORDS : [];
      }, { fetchConcurrency: 1, frontierLimit: 2 });

      const cycle = await orchestrator.runCycle(controller.signal);
      expect(cycle.cancelled).toBe(true);
      expect(cycle.admitted).toEqual([]);
      expect(store.edgeCount).toBe(0);
      expect(orchestrator.state).toBe('idle');
      expect(orchestrator.selectFrontier().map((n) => n.id)).toEqual(SEED_IDS.slice(0, 2));
    });

    it('validates touched nodes when validateNewNodes is on', async () => {
      const resolver = new FakeResolver({ 'interleukin-6': [concept('C0000050', 'Interleukin-6', 0.95)] });
      const { store, orchestrator } = setup(
        (query) => (query === 'inflammation' ? IL6_RECORDS : []),
        { validateNewNodes: true },
        new GraphStore(),
        resolver
      );

      const cycle = await orchestrator.runCycle();
      expect(cycle.validations).toEqual([
        { node_id: 'inflammation', umls_cui: null },
        { node_id: 'interleukin_6', umls_cui: 'C0000050' },
      ]);
      expect(store.requireNode('interleukin_6')).toMatchObject({ validated: true, umls_cui: 'C0000050' });
    });
  });

  describe('admission with an unusable lexicon entry', () => {
    it('rejects the cycle without retiring the frontier', async () => {
      const { store, orchestrator } = setup((query) => (query === 'inflammation' ? IL6_RECORDS : []), {
        lexicon: [{ label: '∞', category: 'Concept', synonyms: [] }],
      });

      await expect(orchestrator.runCycle()).rejects.toThrow('Label "∞" does not normalize to a usable node id');
      expect(orchestrator.getStatus().expanded).toEqual([]);
      expect(orchestrator.selectFrontier().map((n) => n.id)).toEqual(SEED_IDS);
      expect(store.edgeCount).toBe(0);
    });
  });

  describe('expand', () => {
    it('runs until the frontier is empty', async () => {
      const { orchestrator } = setup((query) => (query === 'inflammation' ? IL6_RECORDS : []));

      const report = await orchestrator.expand({ maxCycles: 10 });
      expect(report).toMatchObject({
        status: 'exhausted',
        stop_reason: 'frontier_empty',
        nodes_added: 1,
        edges_added: 1,
        node_count: 4,
        edge_count: 1,
      });
      expect(report.cycles.map((c) => c.frontier)).toEqual([SEED_IDS, ['interleukin_6'], []]);
    });

    it('stops after maxCycles', async () => {
      const { orchestrator } = setup((query) => (query === 'inflammation' ? IL6_RECORDS : []));
      const report = await orchestrator.expand({ maxCycles: 1 });
      expect(report.status).toBe('max_cycles');
      expect(report.stop_reason).toBe('max_cycles');
      expect(report.cycles).toHaveLength(1);
    });

    it('does nothing when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const { literature, orchestrator } = setup(() => []);
      const report = await orchestrator.expand({ signal: controller.signal });
      expect(report).toMatchObject({ status: 'cancelled', stop_reason: 'signal', cycles: [] });
      expect(literature.queries).toEqual([]);
    });

    it('cancels at the deadline', async () => {
      const { store, orchestrator } = setup(
        (query) =>
          new Promise((resolve) => setTimeout(() => resolve(query === 'inflammation' ? IL6_RECORDS : []), 50))
      );
      const report = await orchestrator.expand({ deadlineMs: 5 });
      expect(report.status).toBe('cancelled');
      expect(report.stop_reason).toBe('deadline');
      expect(store.edgeCount).toBe(0);
    });
  });

  it('rejects a non-positive fetchConcurrency', () => {
    expect(() => setup(() => [], { fetchConcurrency: 0 })).toThrow('fetchConcurrency must be a positive integer');
  });
});

describe('bestConcept', () => {
  it('prefers score, then shorter name, then smaller id', () => {
    const best = bestConcept(
      [
        concept('C0000003', 'Aneurysm', 0.9),
        concept('C0000002', 'Aneurysm', 0.9),
        concept('C0000001', 'Aneurysms', 0.9),
        concept('C0000004', 'Low', 0.5),
      ],
      0.8
    );
    expect(best?.concept_id).toBe('C0000002');
  });

  it('returns null below the threshold', () => {
    expect(bestConcept([concept('C0000001', 'Low', 0.5)], 0.8)).toBeNull();
  });

  it('agrees with the query builder ordering', () => {
    const candidates = [
      concept('C0000009', 'Cerebral Aneurysm', 0.95),
      concept('C0000008', 'Brain Aneurysm', 0.95),
      concept('C0000007', 'Aneurysm', 0.85),
    ];
    expect(bestConcept(candidates, 0.8)).toBe([...candidates].sort(compareConcepts)[0]);
    expect(bestConcept(candidates, 0.8)?.concept_id).toBe('C0000008');
  });

  it('skips candidates with a blank concept id', () => {
    expect(bestConcept([concept(' ', 'Aneurysm', 1), concept('C0000001', 'Aneurysm', 0.9)], 0.8)?.concept_id).toBe(
      'C0000001'
    );
  });
});
