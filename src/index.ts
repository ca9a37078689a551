/**
 * Grant Call ETL MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes segmentation, filtering, extraction and configuration tools via
 * JSON-RPC.
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

// Load .env from multiple candidate locations (first found wins):
// 1. GRANT_ETL_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (from src/ in development, from dist/src/ when built)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.GRANT_ETL_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
  path.resolve(__dirname, '..', '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './server/register-tools.js';
import { getConfig, resetState } from './server/state.js';

// =============================================================================
// SERVER INITIALIZATION
// =============================================================================

const server = new McpServer({
  name: 'grant-call-etl',
  version: '0.1.0',
});

const toolCount = registerAllTools(server);

// =============================================================================
// SERVER STARTUP
// =============================================================================

async function main(): Promise<void> {
  // Static imports run before the .env load above, so read the environment again
  resetState();
  const config = getConfig();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Grant Call ETL MCP Server running on stdio`);
  console.error(`Tools registered: ${toolCount}`);
  console.error(
    `[Config] Ollama at ${config.baseUrl}; models money=${config.moneyModel} ` +
      `entity=${config.entityModel} embedding=${config.embeddingModel}`
  );
}

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => {
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err) => {
      console.error(`[Shutdown] Error closing server: ${err}`);
      process.exit(1);
    });
  // Force exit after 5s if graceful shutdown hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
