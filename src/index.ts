/**
 * script-shelf: a shelf of reusable Power Query scripts with dependency
 * resolution.
 *
 * This is the main entry point for the library.
 */

// Types and errors
export * from './types/index.js';

// Repository adapter and locking
export * from './repo/index.js';

// Script file storage
export * from './store/index.js';

// Index
export * from './index/index.js';

// Dependency resolution and analysis
export * from './resolver/index.js';

// Facade and document adapters
export * from './manager/index.js';

// Configuration
export * from './config/types.js';
export { loadConfig, validateConfig, mergeConfig, substituteEnvVars, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions, PartialConfig } from './config/loader.js';

// HTTP API
export * from './api/index.js';

// MCP
export * from './mcp/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitializeOptions, CreateServerOptions } from './server.js';
