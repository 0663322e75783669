/**
 * Candidate Edge Derivation
 *
 * Finds entity mentions in literature records (title + snippet) and turns
 * co-occurrence with a frontier node into evidence-backed candidate edges.
 * The entity set is every graph node plus a curated candidate lexicon.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/expansion/candidates
 */

import { z } from 'zod';
import {
  NodeCategorySchema,
  createEvidence,
  dedupeEvidence,
  edgeKey,
  type EntityDefinition,
  type Evidence,
  type KnowledgeNode,
  type NodeCategory,
  type RelationshipType,
} from '../../models/graph.js';
import { readJsonFile } from '../../utils/data-files.js';
import type { LiteratureRecord } from '../collaborators.js';
import { hasNodeId, toNodeId } from '../graph/node-id.js';

// ═══════════════════════════════════════════════════════════════════════════════
// LEXICON
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_LEXICON_FILE = 'candidate-entities.json';

const LexiconSchema = z.array(
  z.object({
    label: z.string().min(1).refine(hasNodeId, { message: 'Label does not normalize to a usable node id' }),
    category: NodeCategorySchema,
    synonyms: z.array(z.string().min(1)).default([]),
  })
);

/**
 * Load the candidate lexicon. Relative paths resolve against data/.
 *
 * @throws MCPError CONFIGURATION_ERROR when the file is unreadable or a label has no node id
 */
export function loadCandidateLexicon(filePath: string = DEFAULT_LEXICON_FILE): EntityDefinition[] {
  return readJsonFile(filePath, LexiconSchema);
}

// ═══════════════════════════════════════════════════════════════════════════════
// MENTION MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

export interface EntityMatcher {
  id: string;
  label: string;
  category: NodeCategory;
  synonyms: string[];
  patterns: RegExp[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive; "IL-6" does not match inside "IL-60" */
function termPattern(term: string): RegExp {
  const body = escapeRegExp(term.trim()).replace(/\s+/g, '\\s+');
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'i');
}

/**
 * One matcher per distinct node id, first definition wins. Graph nodes
 * should come first so their labels take precedence over the lexicon.
 */
export function buildEntityMatchers(
  entities: ReadonlyArray<Pick<EntityDefinition, 'label' | 'category' | 'synonyms'>>
): EntityMatcher[] {
  const matchers: EntityMatcher[] = [];
  const seen = new Set<string>();
  for (const entity of entities) {
    const id = toNodeId(entity.label);
    if (seen.has(id)) continue;
    seen.add(id);

    const terms = [entity.label, ...entity.synonyms].filter((t) => t.trim().length > 0);
    matchers.push({
      id,
      label: entity.label,
      category: entity.category,
      synonyms: [...entity.synonyms],
      patterns: terms.map(termPattern),
    });
  }
  return matchers;
}

export function mentions(matcher: EntityMatcher, text: string): boolean {
  return matcher.patterns.some((pattern) => pattern.test(text));
}

/**
 * Split prose into sentences on terminal punctuation followed by whitespace.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

// ═══════════════════════════════════════════════════════════════════════════════
// RELATIONSHIP CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

/** First matching rule wins */
const RELATIONSHIP_RULES: ReadonlyArray<{ type: RelationshipType; pattern: RegExp }> = [
  { type: 'BIOMARKER_FOR', pattern: /\bbiomarker/i },
  { type: 'MECHANISTIC_LINK', pattern: /\b(mechanis|pathway|mediat)/i },
  { type: 'CAUSES', pattern: /\b(caus|induc)|\b(leads?|leading|led) to\b|\bresult(s|ed|ing)? in\b/i },
  { type: 'INFLUENCES', pattern: /\b(influenc|affect|modulat|regulat|promot|contribut)/i },
];

export function classifyRelationship(sentence: string): RelationshipType {
  for (const rule of RELATIONSHIP_RULES) {
    if (rule.pattern.test(sentence)) return rule.type;
  }
  return 'ASSOCIATED_WITH';
}

// ═══════════════════════════════════════════════════════════════════════════════
// CANDIDATES
// ═══════════════════════════════════════════════════════════════════════════════

export interface CandidateEdge {
  source_node_id: string;
  target_node_id: string;
  relationship_type: RelationshipType;
  evidence: Evidence[];
  confidence: number;
  /** Definition used when the target has to be created */
  target: { label: string; category: NodeCategory; synonyms: string[] };
}

export interface FrontierEvidence {
  node: KnowledgeNode;
  records: readonly LiteratureRecord[];
}

/** n / (n + 2) for n distinct sources, 4 decimal places */
export function confidenceFor(distinctSources: number): number {
  if (distinctSources <= 0) return 0;
  return Math.round((distinctSources / (distinctSources + 2)) * 10_000) / 10_000;
}

function recordSentences(record: LiteratureRecord): string[] {
  const title = record.title.trim();
  const snippet = record.snippet.trim();
  if (snippet.length === 0 || snippet === title) return splitSentences(title);
  return [...splitSentences(title), ...splitSentences(snippet)];
}

/**
 * Derive candidate edges frontier -> entity from co-occurrence.
 *
 * Ordered by frontier order, then by first appearance across records.
 */
export function deriveCandidates(
  frontier: readonly FrontierEvidence[],
  matchers: readonly EntityMatcher[],
  retrievedAt: string = new Date().toISOString()
): CandidateEdge[] {
  const candidates: CandidateEdge[] = [];

  for (const { node, records } of frontier) {
    const self =
      matchers.find((m) => m.id === node.id) ??
      buildEntityMatchers([{ label: node.label, category: node.category, synonyms: node.synonyms }])[0];
    const byKey = new Map<string, CandidateEdge>();

    for (const record of records) {
      const sentences = recordSentences(record);
      const text = sentences.join(' ');
      if (!mentions(self, text)) continue;

      for (const other of matchers) {
        if (other.id === node.id || !mentions(other, text)) continue;

        const sentence =
          sentences.find((s) => mentions(self, s) && mentions(other, s)) ??
          sentences.find((s) => mentions(other, s)) ??
          record.title;
        const relationshipType = classifyRelationship(sentence);
        const key = edgeKey(node.id, relationshipType, other.id);

        let candidate = byKey.get(key);
        if (candidate === undefined) {
          candidate = {
            source_node_id: node.id,
            target_node_id: other.id,
            relationship_type: relationshipType,
            evidence: [],
            confidence: 0,
            target: { label: other.label, category: other.category, synonyms: [...other.synonyms] },
          };
          byKey.set(key, candidate);
          candidates.push(candidate);
        }
        candidate.evidence = dedupeEvidence([...candidate.evidence, createEvidence(record.record_id, sentence, retrievedAt)]);
      }
    }
  }

  for (const candidate of candidates) {
    candidate.confidence = confidenceFor(candidate.evidence.length);
  }
  return candidates;
}
