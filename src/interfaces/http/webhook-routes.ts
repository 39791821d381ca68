import { randomUUID } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { selectForwardHeaders, toResponseBody } from '../../application/index.js';
import type { DispatchOptions } from '../../application/index.js';
import type { WebhookEvent } from '../../domain/index.js';
import { NotFoundError, ValidationError } from '../../domain/index.js';

/** Throws on malformed UTF-8 instead of substituting U+FFFD. */
const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Inbound webhook routes.
 *
 * POST /webhook      — relay to every active endpoint
 * POST /webhook/:id  — relay to one registered endpoint
 *
 * The plugin is encapsulated: its JSON parser keeps the raw body bytes
 * (validated as UTF-8 JSON) so downstreams receive exactly what was posted,
 * without affecting how other routes parse bodies.
 */
async function webhookRoutes(fastify: FastifyInstance): Promise<void> {
  // JSON only: anything else is answered 415 by Fastify.
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser(
    'application/json',
    { parseAs: 'buffer' },
    (_request, body: Buffer, done) => {
      try {
        JSON.parse(strictUtf8.decode(body));
        done(null, body);
      } catch (err: unknown) {
        done(new ValidationError('Request body must be valid JSON', undefined, { cause: err }));
      }
    },
  );

  const { dispatch: dispatchConfig } = fastify.relayConfig;

  /**
   * Builds the event, runs the dispatch and answers.
   *
   * sync:  200 with the dispatch summary, whatever happened downstream.
   * async: 202 immediately; the result is logged and kept in history.
   */
  const relay = async (
    request: Pick<FastifyRequest, 'headers' | 'log' | 'body'>,
    reply: FastifyReply,
    options: DispatchOptions,
  ) => {
    // No body at all skips the parser.
    const payload = request.body;
    if (!Buffer.isBuffer(payload)) {
      throw new ValidationError('Request body must be valid JSON');
    }

    const event: WebhookEvent = {
      id: randomUUID(),
      payload,
      receivedAt: new Date(),
      headers: dispatchConfig.forwardHeaders ? selectForwardHeaders(request.headers) : {},
    };

    request.log.info(
      { event_id: event.id, bytes: event.payload.length, endpoint_id: options.endpointId },
      'Webhook received',
    );

    if (dispatchConfig.mode === 'async') {
      void fastify.engine.dispatch(event, options)
        .then((result) => fastify.history.record(result))
        .catch((err: unknown) => {
          fastify.log.error({ err, event_id: event.id }, 'Background dispatch failed');
        });

      return reply.status(202).send({ status: 'accepted', event_id: event.id });
    }

    const result = await fastify.engine.dispatch(event, options);
    fastify.history.record(result);

    return reply.status(200).send(
      toResponseBody(result, { includeOutcomes: dispatchConfig.includeOutcomes }),
    );
  };

  // ── POST /webhook ────────────────────────────────────────
  fastify.post(
    '/webhook',
    async (request: FastifyRequest, reply: FastifyReply) => relay(request, reply, {}),
  );

  // ── POST /webhook/:id ────────────────────────────────────
  fastify.post(
    '/webhook/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const { id } = request.params;
      if (fastify.registry.get(id) === undefined) {
        throw new NotFoundError(`Endpoint ${id} not found`);
      }

      return relay(request, reply, { endpointId: id });
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['relay-services'],
  fastify: '5.x',
  encapsulate: true,
});
