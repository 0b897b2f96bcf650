/**
 * Casefile Radar MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes document processing, review queue and record lookup tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import './env.js';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './server/register-tools.js';
import { initializeServerConfig } from './server/startup.js';
import { resetServerState } from './server/state.js';

// =============================================================================
// SERVER INITIALIZATION
// =============================================================================

const server = new McpServer({
  name: 'casefile-radar',
  version: '1.0.0',
});

const toolCount = registerAllTools(server);

// =============================================================================
// SERVER STARTUP
// =============================================================================

async function main(): Promise<void> {
  initializeServerConfig();

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Casefile Radar MCP Server running on stdio');
  console.error(`Tools registered: ${toolCount}`);
}

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => {
      resetServerState();
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
