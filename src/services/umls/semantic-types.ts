/**
 * Semantic type (TUI) allow-list and TUI -> node category mapping,
 * loaded from data/semantic-types.json.
 *
 * @module services/umls/semantic-types
 */

import { z } from 'zod';
import { NodeCategorySchema, type NodeCategory } from '../../models/graph.js';
import { readJsonFile } from '../../utils/data-files.js';

const TuiSchema = z.string().regex(/^T\d{3}$/);

const SemanticTypeTableSchema = z.object({
  allowed: z.array(TuiSchema),
  categories: z.record(TuiSchema, NodeCategorySchema),
});

const table = readJsonFile('semantic-types.json', SemanticTypeTableSchema);

export const ALLOWED_SEMANTIC_TYPES: ReadonlySet<string> = new Set(table.allowed);

const CATEGORY_BY_TUI: ReadonlyMap<string, NodeCategory> = new Map(Object.entries(table.categories));

/** "https://uts-ws.nlm.nih.gov/rest/semantic-network/2024AA/TUI/T047" -> "T047" */
export function tuiFromUri(uri: string): string | null {
  const match = /\/TUI\/(T\d{3})$/.exec(uri);
  return match ? match[1] : null;
}

export function hasAllowedSemanticType(tuis: readonly string[]): boolean {
  return tuis.some((tui) => ALLOWED_SEMANTIC_TYPES.has(tui));
}

/**
 * Category of the first mapped TUI, or Concept when none is mapped.
 */
export function categoryForSemanticTypes(tuis: readonly string[]): NodeCategory {
  for (const tui of tuis) {
    const category = CATEGORY_BY_TUI.get(tui);
    if (category !== undefined) return category;
  }
  return 'Concept';
}
