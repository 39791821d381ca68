import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { RelayConfig } from '../../config.js';
import type { DispatchEngine, DispatchHistory, EndpointRegistry } from '../../application/index.js';

export interface RelayServices {
  config: RelayConfig;
  registry: EndpointRegistry;
  engine: DispatchEngine;
  history: DispatchHistory;
}

/**
 * Decorates the relay's services on the Fastify instance so every route
 * plugin reaches them as `fastify.registry`, `fastify.engine`, …
 */
async function servicesPlugin(fastify: FastifyInstance, services: RelayServices): Promise<void> {
  fastify.decorate('relayConfig', services.config);
  fastify.decorate('registry', services.registry);
  fastify.decorate('engine', services.engine);
  fastify.decorate('history', services.history);
}

export default fp(servicesPlugin, {
  name: 'relay-services',
  fastify: '5.x',
});

/** Extend Fastify's type system so the services are available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    relayConfig: RelayConfig;
    registry: EndpointRegistry;
    engine: DispatchEngine;
    history: DispatchHistory;
  }
}
