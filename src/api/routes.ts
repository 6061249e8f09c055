/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers around ScriptManager.
 */

import type { FastifyInstance } from 'fastify';
import type { ScriptHandlers } from './handlers/ScriptHandlers.js';
import type { IndexHandlers } from './handlers/IndexHandlers.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  scriptHandlers: ScriptHandlers;
  indexHandlers: IndexHandlers;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { scriptHandlers, indexHandlers } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', indexHandlers.health);

  // ============================================================================
  // Script Routes
  // ============================================================================

  fastify.get('/scripts', scriptHandlers.listScripts);
  fastify.get('/scripts/:name', scriptHandlers.getScript);
  fastify.get('/scripts/:name/dependencies', scriptHandlers.getDependencies);
  fastify.get('/scripts/:name/tree', scriptHandlers.getTree);
  fastify.get('/scripts/:name/analysis', scriptHandlers.getAnalysis);
  fastify.post('/scripts', scriptHandlers.createScript);
  fastify.patch('/scripts/:name', scriptHandlers.updateMetadata);
  fastify.put('/scripts/:name/body', scriptHandlers.updateBody);
  fastify.delete('/scripts/:name', scriptHandlers.deleteScript);

  fastify.get('/categories', scriptHandlers.listCategories);
  fastify.post('/resolve', scriptHandlers.resolve);

  // ============================================================================
  // Index Routes
  // ============================================================================

  fastify.post('/index/build', indexHandlers.buildIndex);
  fastify.post('/index/refresh', indexHandlers.refreshIndex);
}
