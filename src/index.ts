/**
 * Gallica MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes Gallica full-text search, snippets and OCR text tools via JSON-RPC.
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

// Load .env from candidate locations (first found wins):
// 1. GALLICA_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.GALLICA_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllResources } from './server/register-resources.js';
import { registerAllTools } from './server/register-tools.js';
import { loadStartupConfig } from './server/startup.js';
import { resetState } from './server/state.js';

// =============================================================================
// SERVER STARTUP
// =============================================================================

const server = new McpServer({
  name: 'gallica-mcp',
  version: '1.0.0',
});

async function main(): Promise<void> {
  const config = loadStartupConfig(process.argv.slice(2));
  const options = { enableAdvancedSearch: config.enableAdvancedSearch };
  const tools = registerAllTools(server, options);
  const resources = registerAllResources(server, options);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Gallica MCP Server running on stdio');
  console.error(`Tools registered: ${tools.length} (${tools.join(', ')})`);
  console.error(`Resources registered: ${resources.join(', ')}`);
}

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down...`);
  server
    .close()
    .then(() => {
      resetState();
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error(`[Shutdown] Error closing server: ${String(err)}`);
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

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
