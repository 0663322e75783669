/**
 * Server configuration from environment variables.
 *
 * Read once at startup and validated with zod. Graph constraints are fixed
 * for the life of a session.
 *
 * @module server/config
 */

import { z } from 'zod';
import { GraphConstraintsSchema, RelationshipTypeSchema } from '../models/graph.js';
import { MCPError } from './errors.js';

export const ServerConfigSchema = z.object({
  constraints: GraphConstraintsSchema,

  // Expansion
  useConcepts: z.boolean().default(true),
  fetchConcurrency: z.number().int().min(1).max(16).default(3),
  maxResultsPerNode: z.number().int().min(1).max(200).default(20),
  maxFetchAttempts: z.number().int().min(1).max(10).default(2),
  minConceptRelevance: z.number().min(0).max(1).default(0.8),
  relationshipTypes: z.array(RelationshipTypeSchema).default([]),
  validateNewNodes: z.boolean().default(false),
  lexiconPath: z.string().min(1).optional(),

  // Patient cohort
  patientDataPath: z.string().min(1).optional(),
  columnMetaPath: z.string().min(1).optional(),

  // Collaborators
  umls: z
    .object({
      apiKey: z.string().min(1).optional(),
      version: z.string().min(1).default('current'),
    })
    .default({}),
  pubmed: z
    .object({
      apiKey: z.string().min(1).optional(),
      email: z.string().min(1).optional(),
    })
    .default({}),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new MCPError('CONFIGURATION_ERROR', `${name} must be a number, got "${raw}"`, { name, raw });
  }
  return value;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new MCPError('CONFIGURATION_ERROR', `${name} must be a boolean, got "${raw}"`, { name, raw });
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function readList(env: Env, name: string): string[] | undefined {
  const raw = readString(env, name);
  if (raw === undefined) return undefined;
  return raw
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
}

/**
 * Build the server configuration from an environment map.
 *
 * @throws MCPError CONFIGURATION_ERROR naming the offending variables
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const raw = {
    constraints: {
      maxDepth: readNumber(env, 'MEDKG_MAX_DEPTH'),
      maxNodes: readNumber(env, 'MEDKG_MAX_NODES'),
      minPubmedCitations: readNumber(env, 'MEDKG_MIN_PUBMED_CITATIONS'),
    },
    useConcepts: readBoolean(env, 'MEDKG_USE_CONCEPTS'),
    fetchConcurrency: readNumber(env, 'MEDKG_FETCH_CONCURRENCY'),
    maxResultsPerNode: readNumber(env, 'MEDKG_MAX_RESULTS_PER_NODE'),
    maxFetchAttempts: readNumber(env, 'MEDKG_MAX_FETCH_ATTEMPTS'),
    minConceptRelevance: readNumber(env, 'MEDKG_MIN_CONCEPT_RELEVANCE'),
    relationshipTypes: readList(env, 'MEDKG_RELATIONSHIP_TYPES'),
    validateNewNodes: readBoolean(env, 'MEDKG_VALIDATE_NEW_NODES'),
    lexiconPath: readString(env, 'MEDKG_LEXICON_PATH'),
    patientDataPath: readString(env, 'MEDKG_PATIENT_DATA_PATH'),
    columnMetaPath: readString(env, 'MEDKG_COLUMN_META_PATH'),
    umls: {
      apiKey: readString(env, 'UMLS_API_KEY'),
      version: readString(env, 'UMLS_VERSION'),
    },
    pubmed: {
      apiKey: readString(env, 'PUBMED_API_KEY'),
      email: readString(env, 'PUBMED_EMAIL'),
    },
  };

  const result = ServerConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new MCPError('CONFIGURATION_ERROR', 'Invalid server configuration', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

/** Configuration with every default applied; used by tests and resets */
export function defaultServerConfig(): ServerConfig {
  return ServerConfigSchema.parse({ constraints: {} });
}
