import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { toResponseBody } from '../../application/index.js';
import { ValidationError } from '../../domain/index.js';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for non-integers.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Operator visibility routes.
 *
 * GET /dispatches  — recent dispatch results, newest first
 * GET /health      — liveness plus endpoint counts
 */
async function dispatchRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/dispatches',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const limit = safeInt(request.query.limit) ?? DEFAULT_LIMIT;
      if (Number.isNaN(limit) || limit < 1 || limit > MAX_LIMIT) {
        throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIMIT}`);
      }

      const dispatches = fastify.history
        .recent(limit)
        .map((result) => ({
          ...toResponseBody(result, { includeOutcomes: true }),
          received_at: result.receivedAt,
        }));

      return reply.status(200).send({ count: dispatches.length, dispatches });
    },
  );

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const all = fastify.registry.list();
      return reply.status(200).send({
        status: 'ok',
        endpoints: {
          total: all.length,
          active: all.filter((e) => e.is_active).length,
        },
      });
    },
  );
}

export default fp(dispatchRoutes, {
  name: 'dispatch-routes',
  dependencies: ['relay-services'],
  fastify: '5.x',
});
