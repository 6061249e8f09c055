/**
 * ScriptHandlers - HTTP handlers for script queries and edits.
 *
 * These handlers are thin wrappers around ScriptManager. Request bodies are
 * checked with zod; every failure becomes an ApiError.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { ScriptManager } from '../../manager/ScriptManager.js';
import type { MetadataEdits } from '../../types/ScriptRecord.js';
import { toApiError } from './errors.js';
import type {
  AnalysisResponse,
  ApiError,
  CategoriesResponse,
  CreateScriptRequest,
  DeleteQuery,
  DependenciesQuery,
  DependenciesResponse,
  EntryResponse,
  ListScriptsQuery,
  ListScriptsResponse,
  ResolveRequest,
  ResolveResponse,
  ScriptParams,
  ScriptResponse,
  TreeResponse,
  UpdateBodyRequest,
  UpdateMetadataRequest,
} from '../types.js';

const MetadataFieldsSchema = z.object({
  name: z.string().optional(),
  category: z.string().optional(),
  tags: z.array(z.string()).optional(),
  dependencies: z.array(z.string()).optional(),
  description: z.string().optional(),
  version: z.string().optional(),
});

const CreateScriptSchema = MetadataFieldsSchema.extend({
  name: z.string(),
  body: z.string().optional(),
});

const UpdateBodySchema = z.object({
  body: z.string(),
});

const ResolveSchema = z.object({
  names: z.array(z.string()).min(1),
  partial: z.boolean().optional(),
});

type MetadataFields = z.infer<typeof MetadataFieldsSchema>;

/**
 * Keep only the fields that were sent.
 */
function toEdits(fields: MetadataFields): MetadataEdits {
  return {
    ...(fields.name !== undefined ? { name: fields.name } : {}),
    ...(fields.category !== undefined ? { category: fields.category } : {}),
    ...(fields.tags !== undefined ? { tags: fields.tags } : {}),
    ...(fields.dependencies !== undefined ? { dependencies: fields.dependencies } : {}),
    ...(fields.description !== undefined ? { description: fields.description } : {}),
    ...(fields.version !== undefined ? { version: fields.version } : {}),
  };
}

/**
 * Create script handlers bound to a ScriptManager.
 */
export function createScriptHandlers(manager: ScriptManager) {
  return {
    /**
     * GET /scripts?q=
     * Search the index; no query lists everything.
     */
    async listScripts(
      request: FastifyRequest<{ Querystring: ListScriptsQuery }>,
      reply: FastifyReply
    ): Promise<ListScriptsResponse | ApiError> {
      try {
        const scripts = await manager.search(request.query.q ?? '');
        return { scripts, total: scripts.length };
      } catch (err) {
        return toApiError(reply, err, 'list scripts');
      }
    },

    /**
     * GET /scripts/:name
     */
    async getScript(
      request: FastifyRequest<{ Params: ScriptParams }>,
      reply: FastifyReply
    ): Promise<ScriptResponse | ApiError> {
      try {
        return { script: await manager.getScript(request.params.name) };
      } catch (err) {
        return toApiError(reply, err, 'get script');
      }
    },

    /**
     * GET /scripts/:name/dependencies?partial=true
     */
    async getDependencies(
      request: FastifyRequest<{ Params: ScriptParams; Querystring: DependenciesQuery }>,
      reply: FastifyReply
    ): Promise<DependenciesResponse | ApiError> {
      try {
        return await manager.getWithDependencies(request.params.name, {
          partial: request.query.partial === 'true',
        });
      } catch (err) {
        return toApiError(reply, err, 'resolve dependencies');
      }
    },

    /**
     * GET /scripts/:name/tree
     */
    async getTree(
      request: FastifyRequest<{ Params: ScriptParams }>,
      reply: FastifyReply
    ): Promise<TreeResponse | ApiError> {
      try {
        return { tree: await manager.dependencyTree(request.params.name) };
      } catch (err) {
        return toApiError(reply, err, 'build dependency tree');
      }
    },

    /**
     * GET /scripts/:name/analysis
     */
    async getAnalysis(
      request: FastifyRequest<{ Params: ScriptParams }>,
      reply: FastifyReply
    ): Promise<AnalysisResponse | ApiError> {
      try {
        return { analysis: await manager.analyze(request.params.name) };
      } catch (err) {
        return toApiError(reply, err, 'analyze script');
      }
    },

    /**
     * GET /categories
     */
    async listCategories(_request: FastifyRequest, reply: FastifyReply): Promise<CategoriesResponse | ApiError> {
      try {
        return { categories: await manager.listCategories() };
      } catch (err) {
        return toApiError(reply, err, 'list categories');
      }
    },

    /**
     * POST /scripts
     */
    async createScript(
      request: FastifyRequest<{ Body: CreateScriptRequest }>,
      reply: FastifyReply
    ): Promise<ScriptResponse | ApiError> {
      try {
        const { body, ...fields } = CreateScriptSchema.parse(request.body);
        const script = await manager.createScript({
          metadata: { ...toEdits(fields), name: fields.name },
          body: body ?? '',
        });
        reply.status(201);
        return { script };
      } catch (err) {
        return toApiError(reply, err, 'create script');
      }
    },

    /**
     * PATCH /scripts/:name
     * Edit metadata; category and name changes move the file.
     */
    async updateMetadata(
      request: FastifyRequest<{ Params: ScriptParams; Body: UpdateMetadataRequest }>,
      reply: FastifyReply
    ): Promise<EntryResponse | ApiError> {
      try {
        const edits = toEdits(MetadataFieldsSchema.parse(request.body));
        return { entry: await manager.updateMetadata(request.params.name, edits) };
      } catch (err) {
        return toApiError(reply, err, 'update script');
      }
    },

    /**
     * PUT /scripts/:name/body
     */
    async updateBody(
      request: FastifyRequest<{ Params: ScriptParams; Body: UpdateBodyRequest }>,
      reply: FastifyReply
    ): Promise<ScriptResponse | ApiError> {
      try {
        const { body } = UpdateBodySchema.parse(request.body);
        return { script: await manager.updateBody(request.params.name, body) };
      } catch (err) {
        return toApiError(reply, err, 'update script body');
      }
    },

    /**
     * DELETE /scripts/:name?force=true
     */
    async deleteScript(
      request: FastifyRequest<{ Params: ScriptParams; Querystring: DeleteQuery }>,
      reply: FastifyReply
    ): Promise<EntryResponse | ApiError> {
      try {
        const entry = await manager.deleteScript(request.params.name, { force: request.query.force === 'true' });
        return { entry };
      } catch (err) {
        return toApiError(reply, err, 'delete script');
      }
    },

    /**
     * POST /resolve
     * Resolve scripts and their dependencies into insertion order.
     */
    async resolve(
      request: FastifyRequest<{ Body: ResolveRequest }>,
      reply: FastifyReply
    ): Promise<ResolveResponse | ApiError> {
      try {
        const { names, partial } = ResolveSchema.parse(request.body);
        return await manager.resolveOrder(names, { partial: partial ?? false });
      } catch (err) {
        return toApiError(reply, err, 'resolve scripts');
      }
    },
  };
}

export type ScriptHandlers = ReturnType<typeof createScriptHandlers>;
