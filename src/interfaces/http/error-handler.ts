import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance } from 'fastify';
import { InternalError, RelayError, ValidationError } from '../../domain/index.js';

/**
 * Maps errors to JSON responses of the form `{ error, code }`.
 *
 * - `RelayError`s answer with their own status and message
 *   (`ValidationError` adds `issues`).
 * - Fastify's own 4xx errors (bad media type, body too large, …) keep
 *   their status.
 * - Anything else is an internal fault: logged, answered with a generic 500.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof RelayError && !(error instanceof InternalError)) {
      request.log.info({ code: error.code, url: request.url }, error.message);
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
        ...(error instanceof ValidationError && error.details !== undefined && { issues: error.details }),
      });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.status(statusCode).send({
        error: error.message,
        code: error.code ?? 'BAD_REQUEST',
      });
    }

    request.log.error(
      { err: error, method: request.method, url: request.url },
      'Request failed with internal error',
    );
    const internal = new InternalError('Internal server error');
    return reply.status(internal.statusCode).send({ error: internal.message, code: internal.code });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: `Route ${request.method} ${request.url} not found`,
      code: 'NOT_FOUND',
    });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
