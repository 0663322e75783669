/**
 * UMLS Terminology Services configuration
 */

import { z } from 'zod';
import { MCPError } from '../../server/errors.js';

export const UMLS_BASE_URL = 'https://uts-ws.nlm.nih.gov/rest';

export const UmlsConfigSchema = z.object({
  apiKey: z.string().min(1, 'UMLS_API_KEY is required'),
  version: z.string().min(1).default('current'),
  baseUrl: z.string().url().default(UMLS_BASE_URL),

  // Search scoring
  searchThreshold: z.number().min(0).max(1).default(0.6),
  maxCandidates: z.number().int().min(1).max(25).default(5),
  pageSize: z.number().int().min(1).max(100).default(25),
  filterSemanticTypes: z.boolean().default(false),

  // Transport
  requestTimeoutMs: z.number().int().positive().default(15_000),
  cacheSize: z.number().int().min(0).default(500),
});

export type UmlsConfig = z.infer<typeof UmlsConfigSchema>;

/**
 * Load configuration from environment variables.
 *
 * Checks for UMLS_API_KEY before zod validation so the error names the variable.
 */
export function loadUmlsConfig(overrides?: Partial<UmlsConfig>): UmlsConfig {
  const apiKey = overrides?.apiKey ?? process.env.UMLS_API_KEY;
  if (!apiKey || apiKey.trim().length === 0) {
    throw new MCPError(
      'CONFIGURATION_ERROR',
      'UMLS_API_KEY environment variable is not set. ' +
        'Set it in .env or environment to use terminology lookups and concept-aware queries.'
    );
  }

  return UmlsConfigSchema.parse({
    apiKey,
    version: process.env.UMLS_VERSION || undefined,
    ...overrides,
  });
}
