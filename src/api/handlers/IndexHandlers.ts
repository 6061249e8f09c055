/**
 * IndexHandlers - HTTP handlers for rebuilding and refreshing the index.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ScriptManager } from '../../manager/ScriptManager.js';
import { toApiError } from './errors.js';
import type { ApiError, BuildIndexResponse, HealthResponse, RefreshIndexResponse } from '../types.js';

/**
 * Create index handlers bound to a ScriptManager.
 */
export function createIndexHandlers(manager: ScriptManager) {
  return {
    /**
     * GET /health
     */
    async health(): Promise<HealthResponse> {
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        index: { status: manager.index.status, scripts: manager.index.size },
      };
    },

    /**
     * POST /index/build
     * Scan every file and replace the index.
     */
    async buildIndex(_request: FastifyRequest, reply: FastifyReply): Promise<BuildIndexResponse | ApiError> {
      try {
        return await manager.buildIndex();
      } catch (err) {
        return toApiError(reply, err, 'build index');
      }
    },

    /**
     * POST /index/refresh
     */
    async refreshIndex(_request: FastifyRequest, reply: FastifyReply): Promise<RefreshIndexResponse | ApiError> {
      try {
        return await manager.refreshIndex();
      } catch (err) {
        return toApiError(reply, err, 'refresh index');
      }
    },
  };
}

export type IndexHandlers = ReturnType<typeof createIndexHandlers>;
