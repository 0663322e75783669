/**
 * Patient Cohort Query Engine
 *
 * Structured lookups over the bundled aneurysm-level cohort table: an
 * optional entity lookup, AND-ed column filters, column or group selection
 * and a row limit. Column and group names resolve case-insensitively.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/patients/query-engine
 */

import { z } from 'zod';
import {
  ANEURYSM_ID_COLUMN,
  CASE_ID_COLUMN,
  CellValueSchema,
  ColumnMetaSchema,
  ENTITY_ID_COLUMNS,
  type CellValue,
  type ColumnDefinition,
  type ColumnMeta,
  type FilterScalar,
  type FilterValue,
  type PatientFilter,
  type PatientQuery,
  type PatientQueryResult,
  type PatientRow,
  type ValueType,
} from '../../models/patient.js';
import { validationError } from '../../server/errors.js';
import { readJsonFile } from '../../utils/data-files.js';

export const DEFAULT_PATIENT_DATA_FILE = 'patient-cohort.json';
export const DEFAULT_COLUMN_META_FILE = 'column-meta.json';

const PatientTableSchema = z.array(z.record(CellValueSchema)).min(1);

/** Groups derived from column names when the metadata does not define them */
const FALLBACK_GROUPS: Record<string, string[]> = {
  morphology: ['morph', 'size'],
  hemodynamics: ['wss', 'osi'],
};

const FALSE_WORDS = new Set(['false', 'no', '0', 'n', 'f']);

export interface PatientColumnInfo {
  name: string;
  type: ValueType;
  description: string;
  unit: string | null;
}

export interface PatientTableDescription {
  row_count: number;
  columns: PatientColumnInfo[];
  groups: Record<string, string[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALUE HANDLING
// ═══════════════════════════════════════════════════════════════════════════════

function toNumber(value: FilterScalar): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function toBoolean(value: FilterScalar | null): boolean {
  if (typeof value === 'string') return !FALSE_WORDS.has(value.trim().toLowerCase());
  return Boolean(value);
}

/**
 * Cast a filter value by its declared type. A numeric value that does not
 * parse (or a list with one such item) is left as given.
 */
export function castFilterValue(value: FilterValue, valueType: ValueType): FilterValue {
  if (valueType === 'numeric' && value !== null) {
    const items = Array.isArray(value) ? value : [value];
    const numbers = items.map(toNumber);
    if (numbers.some((n) => n === null)) return value;
    const cast = numbers.filter((n): n is number => n !== null);
    return Array.isArray(value) ? cast : cast[0];
  }
  if (valueType === 'boolean') {
    return Array.isArray(value) ? value.map(toBoolean) : toBoolean(value);
  }
  return value;
}

type Ordered = number | string;

function isOrdered(value: unknown): value is Ordered {
  return typeof value === 'number' || typeof value === 'string';
}

/** Ordering comparisons only hold between two numbers or two strings */
function compareCells(cell: CellValue, value: Ordered): number | null {
  if (typeof cell === 'number' && typeof value === 'number') return cell - value;
  if (typeof cell === 'string' && typeof value === 'string') return cell < value ? -1 : cell > value ? 1 : 0;
  return null;
}

function requireOrdered(filter: PatientFilter, value: FilterValue): Ordered {
  if (!isOrdered(value)) {
    throw validationError(`Filter "${filter.column} ${filter.operator}" needs a number or a string`, {
      column: filter.column,
      operator: filter.operator,
    });
  }
  return value;
}

/**
 * Row predicate for one filter. Missing cells never satisfy an ordering,
 * "contains", "between" or "in" test.
 *
 * @throws MCPError VALIDATION_ERROR when the cast value cannot be compared
 */
function buildPredicate(filter: PatientFilter, column: string): (row: PatientRow) => boolean {
  const value = castFilterValue(filter.value, filter.value_type);
  const cellOf = (row: PatientRow): CellValue => row[column] ?? null;

  switch (filter.operator) {
    case '==':
      return (row) => cellOf(row) === value;
    case '!=':
      return (row) => cellOf(row) !== value;
    case '<':
    case '>':
    case '<=':
    case '>=': {
      const bound = requireOrdered(filter, value);
      const operator = filter.operator;
      return (row) => {
        const order = compareCells(cellOf(row), bound);
        if (order === null) return false;
        if (operator === '<') return order < 0;
        if (operator === '>') return order > 0;
        if (operator === '<=') return order <= 0;
        return order >= 0;
      };
    }
    case 'in': {
      const allowed = Array.isArray(value) ? value : [];
      return (row) => {
        const cell = cellOf(row);
        return cell !== null && allowed.includes(cell);
      };
    }
    case 'contains': {
      if (value === null || Array.isArray(value)) {
        throw validationError(`Filter "${filter.column} contains" needs a single value`, { column: filter.column });
      }
      const needle = String(value);
      return (row) => {
        const cell = cellOf(row);
        return cell !== null && String(cell).includes(needle);
      };
    }
    case 'between': {
      const pair = Array.isArray(value) ? value : [];
      const low = requireOrdered(filter, pair[0] ?? null);
      const high = requireOrdered(filter, pair[1] ?? null);
      return (row) => {
        const cell = cellOf(row);
        const fromLow = compareCells(cell, low);
        const toHigh = compareCells(cell, high);
        return fromLow !== null && toHigh !== null && fromLow >= 0 && toHigh <= 0;
      };
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class PatientQueryEngine {
  private readonly rows: PatientRow[];
  /** Every column seen in the table, in first-seen order */
  private readonly columnNames: string[];
  private readonly columnIndex = new Map<string, string>();
  private readonly groups = new Map<string, { name: string; columns: string[] }>();
  private readonly definitions: Record<string, ColumnDefinition>;

  constructor(rows: readonly PatientRow[], meta: ColumnMeta) {
    this.rows = rows.map((row) => normalizeIds(row));
    const names = new Set<string>();
    for (const row of this.rows) {
      for (const name of Object.keys(row)) names.add(name);
    }
    this.columnNames = [...names];
    for (const name of this.columnNames) {
      this.columnIndex.set(name.toLowerCase(), name);
    }

    for (const [name, columns] of Object.entries(meta.column_groups)) {
      this.groups.set(name.toLowerCase(), { name, columns });
    }
    for (const [name, fragments] of Object.entries(FALLBACK_GROUPS)) {
      if (this.groups.has(name)) continue;
      const columns = this.columnNames.filter((c) => fragments.some((f) => c.toLowerCase().includes(f)));
      this.groups.set(name, { name, columns });
    }
    this.definitions = meta.columns;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  describe(): PatientTableDescription {
    const groups: Record<string, string[]> = {};
    for (const { name, columns } of this.groups.values()) {
      groups[name] = columns.filter((c) => this.columnNames.includes(c));
    }
    return {
      row_count: this.rows.length,
      columns: this.columnNames.map((name) => {
        const definition = this.definitions[name];
        return {
          name,
          type: definition?.type ?? 'categorical',
          description: definition?.description ?? '',
          unit: definition?.unit ?? null,
        };
      }),
      groups,
    };
  }

  /**
   * Run a query. Filters on unknown columns are skipped and reported;
   * unknown selected columns and groups are reported. With nothing
   * selected the case id is returned.
   *
   * @throws MCPError VALIDATION_ERROR for a filter value its operator cannot use
   */
  query(query: PatientQuery): PatientQueryResult {
    const predicates: Array<(row: PatientRow) => boolean> = [];
    const skippedFilters: string[] = [];

    if (query.entity) {
      const column = ENTITY_ID_COLUMNS[query.entity.type];
      const id = String(query.entity.id).trim();
      predicates.push((row) => row[column] === id);
    }

    for (const filter of query.filters) {
      const column = this.columnIndex.get(filter.column.toLowerCase());
      if (column === undefined) {
        skippedFilters.push(filter.column);
        continue;
      }
      predicates.push(buildPredicate(filter, column));
    }

    const { columns, unknownColumns, unknownGroups } = this.resolveSelection(query.select);
    const matched = this.rows.filter((row) => predicates.every((test) => test(row)));
    const data = matched.slice(0, query.limit).map((row) => {
      const projected: PatientRow = {};
      for (const column of columns) projected[column] = row[column] ?? null;
      return projected;
    });

    if (skippedFilters.length > 0) {
      console.error(`[PatientQuery] Skipped filters on unknown columns: ${skippedFilters.join(', ')}`);
    }
    return {
      count: data.length,
      total_matched: matched.length,
      columns,
      data,
      unknown_columns: unknownColumns,
      unknown_groups: unknownGroups,
      skipped_filters: skippedFilters,
    };
  }

  private resolveSelection(select: PatientQuery['select']): {
    columns: string[];
    unknownColumns: string[];
    unknownGroups: string[];
  } {
    const selected = new Set<string>();
    const unknownColumns: string[] = [];
    const unknownGroups: string[] = [];

    for (const requested of select.columns) {
      const column = this.columnIndex.get(requested.toLowerCase());
      if (column === undefined) unknownColumns.push(requested);
      else selected.add(column);
    }
    for (const requested of select.groups) {
      const group = this.groups.get(requested.toLowerCase());
      if (group === undefined) {
        unknownGroups.push(requested);
        continue;
      }
      for (const column of group.columns) {
        if (this.columnNames.includes(column)) selected.add(column);
      }
    }

    if (selected.size === 0 && this.columnNames.includes(CASE_ID_COLUMN)) {
      selected.add(CASE_ID_COLUMN);
    }
    return { columns: [...selected], unknownColumns, unknownGroups };
  }
}

function normalizeIds(row: PatientRow): PatientRow {
  const copy: PatientRow = { ...row };
  for (const column of [CASE_ID_COLUMN, ANEURYSM_ID_COLUMN]) {
    const value = copy[column];
    if (value !== undefined && value !== null) copy[column] = String(value);
  }
  return copy;
}

/**
 * Load the cohort table and its column metadata. Relative paths resolve
 * against data/.
 *
 * @throws MCPError CONFIGURATION_ERROR when either file is missing or malformed
 */
export function loadPatientQueryEngine(
  dataPath: string = DEFAULT_PATIENT_DATA_FILE,
  metaPath: string = DEFAULT_COLUMN_META_FILE
): PatientQueryEngine {
  const rows = readJsonFile(dataPath, PatientTableSchema);
  const meta = readJsonFile(metaPath, ColumnMetaSchema);
  const engine = new PatientQueryEngine(rows, meta);
  console.error(`[PatientQuery] Loaded ${engine.rowCount} rows from ${dataPath}`);
  return engine;
}
