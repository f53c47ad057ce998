import { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { InsufficientStockError, NotFoundError, ValidationError, isCustomError } from '../utils/errors';

/**
 * Domain errors answer with their own status; zod failures are 400 with
 * the issues; anything else is logged and answered with 500.
 */
export function registerErrorHandler(server: FastifyInstance): void {
  server.setErrorHandler((error: FastifyError | Error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        success: false,
        error: 'Validation failed',
        type: 'ValidationError',
        details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    if (isCustomError(error)) {
      const body: Record<string, unknown> = { success: false, error: error.message, type: error.name };
      if (error instanceof ValidationError && error.details !== null) body.details = error.details;
      if (error instanceof NotFoundError) {
        body.details = { resourceType: error.resourceType, resourceId: error.resourceId };
      }
      if (error instanceof InsufficientStockError) {
        body.details = {
          itemName: error.itemName,
          itemKind: error.itemKind,
          available: error.available,
          requested: error.requested,
        };
      }
      if (error.statusCode >= 500) request.log.warn({ err: error }, error.message);
      return reply.code(error.statusCode).send(body);
    }

    // Fastify's own client errors (malformed JSON, oversized body)
    if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ success: false, error: error.message, type: 'RequestError' });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({ success: false, error: 'Internal server error', type: 'InternalError' });
  });

  server.setNotFoundHandler((request, reply) => {
    return reply.code(404).send({ success: false, error: `Route ${request.method} ${request.url} not found` });
  });
}
