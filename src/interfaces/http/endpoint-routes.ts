import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { createEndpointSchema, updateStatusSchema } from '../../application/index.js';
import { NotFoundError, ValidationError } from '../../domain/index.js';

/** First issue's message as the headline, all issues as details. */
function toValidationError(error: ZodError): ValidationError {
  const message = error.issues[0]?.message ?? 'Invalid request body';
  return new ValidationError(message, error.issues);
}

/**
 * Endpoint registry management routes (the contract the static UI uses).
 *
 * GET    /endpoints             — list all endpoints
 * POST   /endpoints             — register endpoint, returns updated list
 * PUT    /endpoints/:id/status  — enable/disable, returns updated endpoint
 * DELETE /endpoints/:id         — delete endpoint, returns updated list
 */
async function endpointRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /endpoints ───────────────────────────────────────
  fastify.get(
    '/endpoints',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.registry.list());
    },
  );

  // ── POST /endpoints ──────────────────────────────────────
  fastify.post(
    '/endpoints',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = createEndpointSchema.safeParse(request.body);
      if (!parsed.success) {
        throw toValidationError(parsed.error);
      }

      await fastify.registry.create(parsed.data);

      return reply.status(201).send(fastify.registry.list());
    },
  );

  // ── PUT /endpoints/:id/status ────────────────────────────
  fastify.put(
    '/endpoints/:id/status',
    async (
      request: FastifyRequest<{ Params: { id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = updateStatusSchema.safeParse(request.body);
      if (!parsed.success) {
        throw toValidationError(parsed.error);
      }

      const { id } = request.params;
      const endpoint = await fastify.registry.setStatus(id, parsed.data.is_active);
      if (endpoint === null) {
        throw new NotFoundError(`Endpoint ${id} not found`);
      }

      return reply.status(200).send(endpoint);
    },
  );

  // ── DELETE /endpoints/:id ────────────────────────────────
  fastify.delete(
    '/endpoints/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const { id } = request.params;
      const deleted = await fastify.registry.remove(id);
      if (!deleted) {
        throw new NotFoundError(`Endpoint ${id} not found`);
      }

      return reply.status(200).send(fastify.registry.list());
    },
  );
}

export default fp(endpointRoutes, {
  name: 'endpoint-routes',
  dependencies: ['relay-services'],
  fastify: '5.x',
});
