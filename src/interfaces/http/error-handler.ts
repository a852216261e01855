import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance } from 'fastify';
import {
  AuthenticationError,
  InvalidRoutingNameError,
  OutboxError,
  RoutingNameTakenError,
  StorageFailureError,
  TenantInactiveError,
  UnknownEventError,
  UnknownTenantError,
  ValidationError,
} from '../../domain/index.js';
import { errorResponse } from './response.js';

/** HTTP status for a thrown error; undefined means "not ours, use 500". */
export function statusForError(error: unknown): number | undefined {
  if (error instanceof ValidationError || error instanceof InvalidRoutingNameError) return 422;
  if (error instanceof AuthenticationError) return 401;
  if (error instanceof TenantInactiveError) return 403;
  // TenantMismatchError is an UnknownEventError and answers identically.
  if (error instanceof UnknownEventError || error instanceof UnknownTenantError) return 404;
  if (error instanceof RoutingNameTakenError) return 409;
  if (error instanceof StorageFailureError) return 503;
  return undefined;
}

/**
 * Single error handler for every route: maps domain errors to status codes
 * and wraps everything in the response envelope.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const mapped = statusForError(error);

    if (mapped !== undefined) {
      if (mapped === 503) {
        request.log.error({ err: error }, 'Storage failure');
      }
      return reply.status(mapped).send(errorResponse(mapped, error.message));
    }

    if (!(error instanceof OutboxError)
      && error.statusCode !== undefined
      && error.statusCode >= 400
      && error.statusCode < 500) {
      return reply.status(error.statusCode).send(errorResponse(error.statusCode, error.message));
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send(errorResponse(500, 'Internal server error'));
  });

  fastify.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send(errorResponse(404, 'Route not found'));
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
