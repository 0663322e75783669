/**
 * PubMed E-utilities configuration
 */

import { z } from 'zod';

export const EUTILS_BASE_URL = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

// NCBI request ceilings: 3/s anonymous, 10/s with an API key
export const PUBMED_RATE_LIMIT = {
  ANONYMOUS_RPS: 3,
  WITH_KEY_RPS: 10,
} as const;

export const PubMedConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  email: z.string().min(1).optional(),
  tool: z.string().min(1).default('medkg'),
  baseUrl: z.string().url().default(EUTILS_BASE_URL),

  /** Fetch abstracts with efetch so snippets carry more than the title */
  fetchAbstracts: z.boolean().default(true),
  /** Full-text-only searches page through esearch at most this many times */
  maxPages: z.number().int().min(1).max(50).default(10),
  overfetchFactor: z.number().int().min(1).max(20).default(5),

  requestTimeoutMs: z.number().int().positive().default(20_000),
  /** Overrides the key-dependent default */
  requestsPerSecond: z.number().positive().optional(),
});

export type PubMedConfig = z.infer<typeof PubMedConfigSchema>;

/**
 * Load configuration from environment variables. Every field is optional;
 * a missing key only lowers the request rate.
 */
export function loadPubMedConfig(overrides?: Partial<PubMedConfig>): PubMedConfig {
  return PubMedConfigSchema.parse({
    apiKey: process.env.PUBMED_API_KEY || undefined,
    email: process.env.PUBMED_EMAIL || undefined,
    ...overrides,
  });
}

export function minRequestIntervalMs(config: PubMedConfig): number {
  const rps =
    config.requestsPerSecond ??
    (config.apiKey ? PUBMED_RATE_LIMIT.WITH_KEY_RPS : PUBMED_RATE_LIMIT.ANONYMOUS_RPS);
  return Math.ceil(1000 / rps);
}
