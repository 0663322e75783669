/**
 * medkg MCP Server
 *
 * Entry point for the MCP server using stdio transport. One process holds one
 * knowledge graph session; the tools inspect it, grow it and query the
 * terminology and literature services behind it. A read-only cohort table
 * sits alongside.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import type { ToolDefinition } from './tools/shared.js';
import { requireSession } from './server/state.js';
import { knowledgeGraphTools } from './tools/knowledge-graph.js';
import { searchTools } from './tools/search.js';
import { terminologyTools } from './tools/terminology.js';
import { expansionTools } from './tools/expansion.js';
import { patientTools } from './tools/patients.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Load the first .env found: MEDKG_ENV_FILE, then the working directory,
 * then the package root. Configuration is read when the session is created,
 * so this only has to run before requireSession().
 */
function loadEnvironment(): string | null {
  const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
  const candidates = [
    process.env.MEDKG_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(packageRoot, '.env'),
  ].filter((p): p is string => typeof p === 'string');

  const found = candidates.find((p) => fs.existsSync(p));
  if (found === undefined) return null;
  dotenv.config({ path: found });
  return found;
}

/**
 * Keys that only degrade features. Bad MEDKG_* values are not warnings:
 * session creation throws CONFIGURATION_ERROR for them.
 */
function collectStartupWarnings(env: NodeJS.ProcessEnv): string[] {
  const warnings: string[] = [];
  if (!env.UMLS_API_KEY) {
    warnings.push(
      'UMLS_API_KEY is not set. Concept-aware queries and UMLS tools are disabled. Get one at https://uts.nlm.nih.gov/uts/'
    );
  }
  if (!env.PUBMED_EMAIL) {
    warnings.push('PUBMED_EMAIL is not set. NCBI asks E-utilities clients to identify themselves.');
  }
  return warnings;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

const TOOL_MODULES: Record<string, ToolDefinition>[] = [
  knowledgeGraphTools,
  searchTools,
  terminologyTools,
  expansionTools,
  patientTools,
];

/**
 * Register every tool module on the server.
 *
 * @throws Error on a duplicate tool name
 */
function registerTools(server: McpServer): number {
  const names = new Set<string>();
  for (const toolModule of TOOL_MODULES) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (names.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      names.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
    }
  }
  return names.size;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'medkg-mcp',
  version: '1.0.0',
});

async function main(): Promise<void> {
  const envFile = loadEnvironment();
  if (envFile) {
    console.error(`[Config] Loaded environment from ${envFile}`);
  }

  const warnings = collectStartupWarnings(process.env);
  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  const { store } = requireSession();
  const toolCount = registerTools(server);

  await server.connect(new StdioServerTransport());
  console.error(`medkg MCP Server running on stdio`);
  console.error(`Tools registered: ${toolCount}; graph has ${store.nodeCount} seed nodes`);
}

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, closing server`);
  server
    .close()
    .then(() => {
      console.error('[Shutdown] Server closed');
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error(`[Shutdown] Error closing server: ${String(err)}`);
      process.exit(1);
    });
  // Force exit after 5s if close hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
