/**
 * MCP tools for finding scripts and resolving their dependencies.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { jsonResult, toolErrorResult } from '../helpers.js';

export function registerScriptTools(server: McpServer, ctx: AppContext): void {
  const { manager } = ctx;

  // script_search - Substring search over the index
  server.tool(
    'script_search',
    'Search scripts by name, tag or description. An empty query lists every indexed script.',
    { query: z.string().default('').describe('Case-insensitive substring') },
    async (args) => {
      try {
        const scripts = await manager.search(args.query);
        return jsonResult({ scripts, total: scripts.length });
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // script_get - Full script with metadata and body
  server.tool(
    'script_get',
    'Get a script by name, including its metadata and body.',
    { name: z.string().describe('Script name') },
    async (args) => {
      try {
        return jsonResult(await manager.getScript(args.name));
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // script_resolve_order - Dependency-first insertion order
  server.tool(
    'script_resolve_order',
    'Resolve scripts and everything they depend on into an order where each script comes after its dependencies.',
    {
      names: z.array(z.string()).min(1).describe('Scripts to resolve'),
      partial: z.boolean().default(false).describe('Leave out missing dependencies instead of failing'),
    },
    async (args) => {
      try {
        const resolved = await manager.resolveOrder(args.names, { partial: args.partial });
        return jsonResult({
          order: resolved.scripts.map((s) => s.name),
          unresolved: resolved.unresolved,
        });
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // script_dependency_tree - Nested dependency view
  server.tool(
    'script_dependency_tree',
    'Show the dependency tree under a script. Missing scripts and repeated references are marked.',
    { name: z.string().describe('Script name') },
    async (args) => {
      try {
        return jsonResult(await manager.dependencyTree(args.name));
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // script_suggest_dependencies - Names referenced in the body
  server.tool(
    'script_suggest_dependencies',
    'Suggest dependencies for a script: indexed scripts its body calls by name.',
    { name: z.string().describe('Script name') },
    async (args) => {
      try {
        const suggestions = await manager.suggestDependencies(args.name);
        return jsonResult({ name: args.name, suggestions });
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // script_categories - Category listing
  server.tool(
    'script_categories',
    'List the categories in use.',
    {},
    async () => {
      try {
        return jsonResult({ categories: await manager.listCategories() });
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // index_refresh - Pick up files changed outside the server
  server.tool(
    'index_refresh',
    'Rescan the repository and update the index with added, removed and changed scripts.',
    {},
    async () => {
      try {
        return jsonResult(await manager.refreshIndex());
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );
}
