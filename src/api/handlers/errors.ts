/**
 * Mapping from thrown errors to API error responses.
 */

import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { ScriptRepositoryError } from '../../types/errors.js';
import type { ApiError } from '../types.js';

/**
 * Set the reply status for `err` and return its JSON body.
 *
 * Repository errors keep their code and status; invalid request bodies are
 * 400 BAD_REQUEST; anything else is 500 INTERNAL_ERROR.
 */
export function toApiError(reply: FastifyReply, err: unknown, action: string): ApiError {
  if (err instanceof ScriptRepositoryError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message, details: err.details };
  }

  if (err instanceof ZodError) {
    reply.status(400);
    const issue = err.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return {
      error: 'BAD_REQUEST',
      message: `Invalid request: ${where}${issue?.message ?? 'malformed body'}`,
      details: { issues: err.issues },
    };
  }

  const message = err instanceof Error ? err.message : String(err);
  reply.status(500);
  return { error: 'INTERNAL_ERROR', message: `Failed to ${action}: ${message}`, details: {} };
}
