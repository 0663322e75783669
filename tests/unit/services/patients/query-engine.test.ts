/**
 * Unit Tests for PatientQueryEngine
 *
 * Runs against the bundled made-up cohort in data/patient-cohort.json.
 *
 * @module tests/unit/services/patients/query-engine
 */

import { describe, it, expect } from 'vitest';
import {
  PatientQueryEngine,
  castFilterValue,
  loadPatientQueryEngine,
} from '../../../../src/services/patients/query-engine.js';
import type {
  FilterOperator,
  FilterValue,
  PatientFilter,
  PatientQuery,
  ValueType,
} from '../../../../src/models/patient.js';
import { MCPError } from '../../../../src/server/errors.js';

const engine = loadPatientQueryEngine();

function query(partial: Partial<PatientQuery> = {}): PatientQuery {
  return {
    select: { groups: [], columns: ['aneurysm_id'] },
    filters: [],
    limit: 100,
    ...partial,
  };
}

function filter(
  column: string,
  operator: FilterOperator,
  value: FilterValue,
  valueType: ValueType = 'categorical'
): PatientFilter {
  return { column, operator, value, value_type: valueType };
}

function aneurysmIds(q: PatientQuery): unknown[] {
  return engine.query(q).data.map((row) => row.aneurysm_id);
}

function categoryOf(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof MCPError) return error.category;
    throw error;
  }
  throw new Error('expected an MCPError');
}

describe('PatientQueryEngine', () => {
  describe('entity lookup', () => {
    it('finds every aneurysm of a case given a numeric id', () => {
      const result = engine.query(
        query({ entity: { type: 'case', id: 101 }, select: { groups: ['identifiers'], columns: [] } })
      );
      expect(result.columns).toEqual(['case_id', 'aneurysm_id']);
      expect(result.data).toEqual([
        { case_id: '101', aneurysm_id: 'A101-1' },
        { case_id: '101', aneurysm_id: 'A101-2' },
      ]);
      expect(result.total_matched).toBe(2);
    });

    it('finds one aneurysm and resolves column names case-insensitively', () => {
      const result = engine.query(
        query({ entity: { type: 'aneurysm', id: 'A104-1' }, select: { groups: [], columns: ['SIZE_MM'] } })
      );
      expect(result.columns).toEqual(['size_mm']);
      expect(result.data).toEqual([{ size_mm: 9.8 }]);
    });
  });

  describe('filters', () => {
    it('ANDs a boolean and a numeric filter after casting', () => {
      const ids = aneurysmIds(
        query({
          filters: [filter('ruptured', '==', 'yes', 'boolean'), filter('size_mm', '>=', '7', 'numeric')],
        })
      );
      expect(ids).toEqual(['A101-1', 'A104-1', 'A107-1', 'A109-1']);
    });

    it('keeps both ends of a between range', () => {
      const ids = aneurysmIds(query({ filters: [filter('age', 'between', ['50', '60'], 'numeric')] }));
      expect(ids).toEqual(['A101-1', 'A101-2', 'A106-1', 'A106-2', 'A108-1']);
    });

    it('matches any listed value with in', () => {
      const ids = aneurysmIds(query({ filters: [filter('location', 'in', ['ACom', 'Basilar'])] }));
      expect(ids).toEqual(['A102-1', 'A104-1', 'A107-1']);
    });

    it('matches substrings with contains', () => {
      const ids = aneurysmIds(query({ filters: [filter('Location', 'contains', 'Com')] }));
      expect(ids).toEqual(['A102-1', 'A103-1', 'A107-1', 'A108-1']);
    });

    it('excludes a value with !=', () => {
      const ids = aneurysmIds(query({ filters: [filter('sex', '!=', 'F')] }));
      expect(ids).toEqual(['A102-1', 'A105-1', 'A107-1', 'A110-1']);
    });

    it('never matches a missing cell in an ordering comparison', () => {
      const ids = aneurysmIds(query({ filters: [filter('wss_mean_pa', '<', 1, 'numeric')] }));
      expect(ids).toEqual(['A102-1', 'A104-1', 'A109-1']);
    });

    it('rejects an ordering comparison against a boolean', () => {
      expect(categoryOf(() => engine.query(query({ filters: [filter('age', '<', true)] })))).toBe('VALIDATION_ERROR');
    });
  });

  describe('selection', () => {
    it('applies the limit after filtering', () => {
      const result = engine.query(query({ select: { groups: ['identifiers'], columns: [] }, limit: 3 }));
      expect(result.count).toBe(3);
      expect(result.total_matched).toBe(12);
    });

    it('returns the case id when nothing is selected', () => {
      const result = engine.query(query({ select: { groups: [], columns: [] }, limit: 1 }));
      expect(result.columns).toEqual(['case_id']);
      expect(result.data).toEqual([{ case_id: '101' }]);
    });

    it('reports unknown columns, groups and skipped filters', () => {
      const result = engine.query(
        query({
          select: { groups: ['Hemodynamics', 'genetics'], columns: ['size_mm', 'volume'] },
          filters: [filter('volume', '>', 1, 'numeric')],
        })
      );
      expect(result.columns).toEqual(['size_mm', 'wss_mean_pa', 'osi_mean', 'lsa_percent']);
      expect(result.unknown_columns).toEqual(['volume']);
      expect(result.unknown_groups).toEqual(['genetics']);
      expect(result.skipped_filters).toEqual(['volume']);
      expect(result.total_matched).toBe(12);
    });
  });

  describe('describe', () => {
    it('lists columns with their metadata and the groups', () => {
      const description = engine.describe();
      expect(description.row_count).toBe(12);
      expect(description.groups.identifiers).toEqual(['case_id', 'aneurysm_id']);
      expect(description.columns.find((c) => c.name === 'size_mm')).toEqual({
        name: 'size_mm',
        type: 'numeric',
        description: 'Maximum dome diameter',
        unit: 'mm',
      });
    });

    it('derives morphology and hemodynamics groups from column names when undefined', () => {
      const small = new PatientQueryEngine([{ case_id: 1, morph_score: 2, size_mm: 3, wss_max: 4, osi_mean: 5 }], {
        column_groups: { outcome: ['ruptured'] },
        columns: {},
      });
      expect(small.describe().groups).toEqual({
        outcome: [],
        morphology: ['morph_score', 'size_mm'],
        hemodynamics: ['wss_max', 'osi_mean'],
      });
      expect(small.describe().columns[0]).toEqual({ name: 'case_id', type: 'categorical', description: '', unit: null });
    });
  });

  describe('loadPatientQueryEngine', () => {
    it('fails with CONFIGURATION_ERROR for a missing table', () => {
      expect(categoryOf(() => loadPatientQueryEngine('/tmp/medkg-no-such-cohort.json'))).toBe('CONFIGURATION_ERROR');
    });
  });
});

describe('castFilterValue', () => {
  it('parses numeric strings and leaves a list with a bad item unchanged', () => {
    expect(castFilterValue(' 7.5 ', 'numeric')).toBe(7.5);
    expect(castFilterValue(['1', 'x'], 'numeric')).toEqual(['1', 'x']);
  });

  it('reads common false words as false', () => {
    expect(castFilterValue('No', 'boolean')).toBe(false);
    expect(castFilterValue('ruptured', 'boolean')).toBe(true);
    expect(castFilterValue(null, 'boolean')).toBe(false);
  });
});
