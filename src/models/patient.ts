/**
 * Patient Cohort Data Model
 *
 * Aneurysm-level rows of a clinical cohort table, the column metadata that
 * groups its columns, and the structured query run against it. One row is
 * one aneurysm; a case (patient) may own several rows.
 *
 * @module models/patient
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// TABLE
// ═══════════════════════════════════════════════════════════════════════════════

export type CellValue = string | number | boolean | null;

export type PatientRow = Record<string, CellValue>;

export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** Identifier columns; stored as strings whatever the source table holds */
export const CASE_ID_COLUMN = 'case_id';
export const ANEURYSM_ID_COLUMN = 'aneurysm_id';

export const ENTITY_TYPES = ['case', 'aneurysm'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const ENTITY_ID_COLUMNS: Record<EntityType, string> = {
  case: CASE_ID_COLUMN,
  aneurysm: ANEURYSM_ID_COLUMN,
};

// ═══════════════════════════════════════════════════════════════════════════════
// COLUMN METADATA
// ═══════════════════════════════════════════════════════════════════════════════

export const VALUE_TYPES = ['numeric', 'categorical', 'boolean', 'range'] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

export const ColumnDefinitionSchema = z.object({
  type: z.enum(VALUE_TYPES).default('categorical'),
  description: z.string().default(''),
  unit: z.string().min(1).optional(),
});

export type ColumnDefinition = z.infer<typeof ColumnDefinitionSchema>;

export const ColumnMetaSchema = z.object({
  column_groups: z.record(z.array(z.string().min(1))).default({}),
  columns: z.record(ColumnDefinitionSchema).default({}),
});

export type ColumnMeta = z.infer<typeof ColumnMetaSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY
// ═══════════════════════════════════════════════════════════════════════════════

export const FILTER_OPERATORS = ['==', '!=', '<', '>', '<=', '>=', 'in', 'contains', 'between'] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const FilterValueSchema = z.union([ScalarSchema, z.null(), z.array(ScalarSchema)]);

export type FilterScalar = z.infer<typeof ScalarSchema>;
export type FilterValue = z.infer<typeof FilterValueSchema>;

/** "in" takes a list, "between" a [low, high] pair, everything else one value */
export const PatientFilterSchema = z
  .object({
    column: z.string().trim().min(1),
    operator: z.enum(FILTER_OPERATORS),
    value: FilterValueSchema,
    value_type: z.enum(VALUE_TYPES).default('categorical').describe('How to cast value before comparing'),
  })
  .superRefine((filter, ctx) => {
    const isList = Array.isArray(filter.value);
    if (filter.operator === 'in' && !isList) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: '"in" needs a list of values' });
    } else if (filter.operator === 'between' && (!Array.isArray(filter.value) || filter.value.length !== 2)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: '"between" needs [low, high]' });
    } else if (filter.operator !== 'in' && filter.operator !== 'between' && isList) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: `"${filter.operator}" needs a single value`,
      });
    }
  });

export type PatientFilter = z.infer<typeof PatientFilterSchema>;

export const PatientSelectSchema = z.object({
  groups: z.array(z.string().trim().min(1)).default([]).describe('Column groups from the column metadata'),
  columns: z.array(z.string().trim().min(1)).default([]).describe('Column names (case-insensitive)'),
});

export const PatientEntitySchema = z.object({
  type: z.enum(ENTITY_TYPES),
  id: z.union([z.string().trim().min(1), z.number()]),
});

export interface PatientQuery {
  select: z.infer<typeof PatientSelectSchema>;
  entity?: z.infer<typeof PatientEntitySchema>;
  filters: PatientFilter[];
  limit: number;
}

export interface PatientQueryResult {
  /** Rows returned (at most limit) */
  count: number;
  /** Rows matching before the limit */
  total_matched: number;
  columns: string[];
  data: PatientRow[];
  unknown_columns: string[];
  unknown_groups: string[];
  /** Filters naming a column the table does not have; they were not applied */
  skipped_filters: string[];
}
