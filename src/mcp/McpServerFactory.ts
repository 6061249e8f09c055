/**
 * Factory function for creating the MCP server with all tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { registerAllTools } from './tools/index.js';

export const MCP_SERVER_NAME = 'script-shelf';
export const MCP_SERVER_VERSION = '0.1.0';

/**
 * Create and configure an MCP server bound to the given AppContext.
 */
export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer(
    { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  registerAllTools(server, ctx);

  return server;
}
