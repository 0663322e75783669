/**
 * MCP Server State Management
 *
 * One session per server process: the GraphStore, the collaborators built
 * from configuration, the query builder and the expansion orchestrator.
 * FAIL FAST: accessors throw when a collaborator is not configured.
 *
 * @module server/state
 */

import type { EntityDefinition } from '../models/graph.js';
import type { LiteratureSearch, TerminologyResolver } from '../services/collaborators.js';
import { loadCandidateLexicon } from '../services/expansion/candidates.js';
import { ExpansionOrchestrator } from '../services/expansion/orchestrator.js';
import { GraphStore } from '../services/graph/graph-store.js';
import { loadPatientQueryEngine, type PatientQueryEngine } from '../services/patients/query-engine.js';
import { PubMedClient } from '../services/pubmed/client.js';
import { ConceptQueryBuilder } from '../services/query/concept-query-builder.js';
import { UmlsClient } from '../services/umls/client.js';
import { defaultServerConfig, loadServerConfig } from './config.js';
import { MCPError, expansionInProgressError } from './errors.js';
import type { ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION
// ═══════════════════════════════════════════════════════════════════════════════

export interface SessionCollaborators {
  resolver: TerminologyResolver | null;
  literature: LiteratureSearch | null;
}

export interface Session {
  config: ServerConfig;
  store: GraphStore;
  resolver: TerminologyResolver | null;
  literature: LiteratureSearch | null;
  queryBuilder: ConceptQueryBuilder;
  orchestrator: ExpansionOrchestrator;
  lexicon: EntityDefinition[];
  /** Cohort table, loaded on first use */
  patients: PatientQueryEngine | null;
  /** Incremented whenever the graph is reset or replaced */
  generation: number;
}

let _session: Session | null = null;

/**
 * Set while medkg_expand runs. Graph resets and imports refuse to proceed
 * and a second expansion is rejected.
 */
let _expansionRunning = false;

function buildCollaborators(config: ServerConfig): SessionCollaborators {
  const resolver = config.umls.apiKey
    ? new UmlsClient({ config: { apiKey: config.umls.apiKey, version: config.umls.version } })
    : null;
  const literature = new PubMedClient({
    config: { apiKey: config.pubmed.apiKey, email: config.pubmed.email },
  });
  return { resolver, literature };
}

function createOrchestrator(
  store: GraphStore,
  config: ServerConfig,
  queryBuilder: ConceptQueryBuilder,
  collaborators: SessionCollaborators,
  lexicon: EntityDefinition[]
): ExpansionOrchestrator {
  return new ExpansionOrchestrator(
    store,
    {
      // Without a literature index every fetch fails with CONFIGURATION_ERROR
      literature: collaborators.literature ?? noLiterature,
      queryBuilder,
      resolver: collaborators.resolver,
    },
    {
      useConcepts: config.useConcepts && collaborators.resolver !== null,
      relationshipTypes: config.relationshipTypes,
      fetchConcurrency: config.fetchConcurrency,
      maxResultsPerNode: config.maxResultsPerNode,
      maxFetchAttempts: config.maxFetchAttempts,
      validateNewNodes: config.validateNewNodes && collaborators.resolver !== null,
      minValidationRelevance: config.minConceptRelevance,
      lexicon,
    }
  );
}

const noLiterature: LiteratureSearch = {
  search: () => Promise.reject(literatureNotConfigured()),
};

function literatureNotConfigured(): MCPError {
  return new MCPError('CONFIGURATION_ERROR', 'No literature index is configured for this session');
}

/**
 * Create the session. Without explicit collaborators they are built from
 * config; tests pass in-process fakes (a missing one is null).
 */
export function configureSession(
  config: ServerConfig = loadServerConfig(),
  collaborators?: Partial<SessionCollaborators>
): Session {
  if (_expansionRunning) {
    throw expansionInProgressError();
  }

  const built: SessionCollaborators = collaborators
    ? { resolver: collaborators.resolver ?? null, literature: collaborators.literature ?? null }
    : buildCollaborators(config);

  if (config.useConcepts && built.resolver === null) {
    console.error('[Config] UMLS_API_KEY not set; expansion queries use literal terms');
  }

  const lexicon = loadCandidateLexicon(config.lexiconPath);
  const store = new GraphStore(config.constraints);
  const queryBuilder = new ConceptQueryBuilder(built.resolver, { minRelevance: config.minConceptRelevance });

  _session = {
    config,
    store,
    resolver: built.resolver,
    literature: built.literature,
    queryBuilder,
    orchestrator: createOrchestrator(store, config, queryBuilder, built, lexicon),
    lexicon,
    patients: null,
    generation: (_session?.generation ?? 0) + 1,
  };
  console.error(
    `[Config] Session ready: maxDepth=${config.constraints.maxDepth}, maxNodes=${config.constraints.maxNodes}, ` +
      `minPubmedCitations=${config.constraints.minPubmedCitations}, umls=${built.resolver ? 'on' : 'off'}`
  );
  return _session;
}

/**
 * Current session, created from the environment on first use
 */
export function requireSession(): Session {
  if (!_session) {
    _session = configureSession();
  }
  return _session;
}

export function requireStore(): GraphStore {
  return requireSession().store;
}

/**
 * @throws MCPError CONFIGURATION_ERROR when UMLS_API_KEY is not set
 */
export function requireResolver(): TerminologyResolver {
  const { resolver } = requireSession();
  if (!resolver) {
    throw new MCPError(
      'CONFIGURATION_ERROR',
      'UMLS_API_KEY environment variable is not set. Set it in .env or environment to use terminology tools.'
    );
  }
  return resolver;
}

/**
 * @throws MCPError CONFIGURATION_ERROR when no literature index is configured
 */
export function requireLiterature(): LiteratureSearch {
  const { literature } = requireSession();
  if (!literature) {
    throw literatureNotConfigured();
  }
  return literature;
}

/**
 * The cohort query engine, loaded from MEDKG_PATIENT_DATA_PATH and
 * MEDKG_COLUMN_META_PATH (or the bundled tables) on first use.
 *
 * @throws MCPError CONFIGURATION_ERROR when the tables cannot be loaded
 */
export function requirePatientEngine(): PatientQueryEngine {
  const session = requireSession();
  if (!session.patients) {
    session.patients = loadPatientQueryEngine(session.config.patientDataPath, session.config.columnMetaPath);
  }
  return session.patients;
}

/** The session's PubMed client when it is the real one (extra search options) */
export function getPubMedClient(): PubMedClient | null {
  const { literature } = requireSession();
  return literature instanceof PubMedClient ? literature : null;
}

/** The session's UMLS client when it is the real one (raw word search) */
export function getUmlsClient(): UmlsClient | null {
  const { resolver } = requireSession();
  return resolver instanceof UmlsClient ? resolver : null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Replace the session graph with a fresh seeded store. Orchestrator
 * bookkeeping starts over with it.
 *
 * @throws MCPError EXPANSION_IN_PROGRESS while an expansion runs
 */
export function resetGraph(): GraphStore {
  if (_expansionRunning) {
    throw expansionInProgressError();
  }
  const session = requireSession();
  session.store = new GraphStore(session.config.constraints);
  session.orchestrator = createOrchestrator(
    session.store,
    session.config,
    session.queryBuilder,
    { resolver: session.resolver, literature: session.literature },
    session.lexicon
  );
  session.generation++;
  console.error(`[Config] Graph reset (generation ${session.generation})`);
  return session.store;
}

/**
 * Run a graph replacement (import) under the expansion guard.
 */
export function withGraphReplacement<T>(fn: (store: GraphStore) => T): T {
  if (_expansionRunning) {
    throw expansionInProgressError();
  }
  const session = requireSession();
  const result = fn(session.store);
  // Bookkeeping refers to the old graph
  session.orchestrator = createOrchestrator(
    session.store,
    session.config,
    session.queryBuilder,
    { resolver: session.resolver, literature: session.literature },
    session.lexicon
  );
  session.generation++;
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXPANSION GUARD
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run an expansion with the single-flight guard held.
 *
 * @throws MCPError EXPANSION_IN_PROGRESS when one is already running
 */
export async function withExpansion<T>(fn: (session: Session) => Promise<T>): Promise<T> {
  if (_expansionRunning) {
    throw expansionInProgressError();
  }
  const session = requireSession();
  _expansionRunning = true;
  try {
    return await fn(session);
  } finally {
    _expansionRunning = false;
  }
}

export function isExpansionRunning(): boolean {
  return _expansionRunning;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 *
 * Installs a default-config session with the given collaborators
 * (none by default, so nothing reaches the network).
 */
export function resetState(collaborators: Partial<SessionCollaborators> = {}): Session {
  _expansionRunning = false;
  _session = null;
  return configureSession(defaultServerConfig(), {
    resolver: collaborators.resolver ?? null,
    literature: collaborators.literature ?? null,
  });
}
