/**
 * Server entry point for the script-shelf API.
 *
 * This module:
 * - Loads configuration and opens the script repository
 * - Creates the Fastify server with the REST routes and the MCP endpoint
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { loadConfig } from './config/loader.js';
import type { AppConfig, LogLevel } from './config/types.js';
import { createScriptManager, type ScriptManager } from './manager/ScriptManager.js';
import { createIndexHandlers, createScriptHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  manager: ScriptManager;
  configPath?: string | undefined;
}

export interface InitializeOptions {
  /** Use this config instead of loading one */
  config?: AppConfig;
  configPath?: string;
}

export interface CreateServerOptions {
  /** Overrides config.server.logLevel; tests pass 'silent' */
  logLevel?: LogLevel | 'silent';
  /** Overrides config.server.cors.enabled */
  cors?: boolean;
}

/**
 * Load configuration and open the repository.
 */
export async function initializeApp(options: InitializeOptions = {}): Promise<AppContext> {
  const config = options.config ?? (await loadConfig(
    options.configPath !== undefined ? { configPath: options.configPath } : {}
  ));
  const root = resolve(config.repository.root);

  console.log(`Initializing script repository at: ${root}`);

  const manager = createScriptManager({
    root,
    extension: config.repository.extension,
    indexPath: config.repository.indexPath,
    lock: config.lock,
    dataSourceFunctions: config.analysis.dataSourceFunctions,
    onRelocationPhase: (event) => {
      if (config.server.logLevel === 'debug') {
        console.log(`[relocation] ${event.operation} ${event.name}: ${event.phase}`);
      }
    },
  });

  const loaded = await manager.open();
  if (loaded.status === 'corrupt') {
    console.warn(`Index is corrupt (${loaded.diagnostic ?? 'unknown reason'}); POST /api/index/build to rebuild it`);
  } else if (loaded.diagnostic !== undefined) {
    console.warn(`Index could not be built (${loaded.diagnostic}); fix the files, then POST /api/index/build`);
  } else {
    console.log(`Index ${loaded.status}: ${loaded.entries} scripts`);
  }

  return {
    config,
    manager,
    configPath: options.configPath,
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  options: CreateServerOptions = {}
): Promise<ReturnType<typeof Fastify>> {
  const { server } = ctx.config;

  // Create Fastify instance
  const fastify = Fastify({
    logger: {
      level: options.logLevel ?? server.logLevel,
    },
  });

  // Register CORS if enabled
  if (options.cors ?? server.cors.enabled) {
    await fastify.register(cors, {
      origin: server.cors.origins.includes('*') ? true : server.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  // Create handlers
  const scriptHandlers = createScriptHandlers(ctx.manager);
  const indexHandlers = createIndexHandlers(ctx.manager);

  // Register MCP server on /mcp
  await fastify.register(mcpPlugin, { prefix: '/mcp', createMcpServer: () => createMcpServer(ctx) });

  // Register API routes with /api prefix
  await fastify.register(async (instance) => {
    registerRoutes(instance, { scriptHandlers, indexHandlers });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(options: InitializeOptions = {}): Promise<void> {
  try {
    const ctx = await initializeApp(options);
    const fastify = await createServer(ctx);
    const { port, host } = ctx.config.server;

    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);
    console.log(`Scripts indexed: ${ctx.manager.index.size}`);

    // Handle shutdown
    const shutdown = () => {
      console.log('\nShutting down...');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('Error during shutdown:', err);
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point. The config path comes from the first argument or CONFIG_PATH.
 */
async function main() {
  const configPath = process.argv[2];
  await startServer(configPath !== undefined ? { configPath } : {});
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
