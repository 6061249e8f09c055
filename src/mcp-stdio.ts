/**
 * MCP stdio transport entry point.
 *
 * Serves the script tools over stdio (no HTTP server needed).
 * Usage: npx tsx src/mcp-stdio.ts [configPath]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { initializeApp } from './server.js';
import { createMcpServer } from './mcp/index.js';

async function main() {
  const configPath = process.argv[2];

  // Redirect all console to stderr so stdout stays clean for MCP JSON-RPC
  const toStderr = (...args: unknown[]) => {
    process.stderr.write(args.map(String).join(' ') + '\n');
  };
  console.log = toStderr;
  console.warn = toStderr;
  console.error = toStderr;

  console.log('Initializing script-shelf MCP server');

  const ctx = await initializeApp(configPath !== undefined ? { configPath } : {});
  const mcpServer = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  console.log('MCP server connected via stdio');
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
