import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { Logger } from 'pino';
import type { RelayConfig } from './config.js';
import { createDispatchEngine, DispatchHistory } from './application/index.js';
import type { DeliveryAttempt, DispatchEngine, EndpointRegistry } from './application/index.js';
import {
  servicesPlugin,
  endpointRoutes,
  webhookRoutes,
  dispatchRoutes,
  errorHandler,
} from './interfaces/http/index.js';

export interface BuildServerOptions {
  config: RelayConfig;
  registry: EndpointRegistry;
  log: Logger;
  /** Overrides the engine built from `config` and `registry`. */
  engine?: DispatchEngine;
  /** Overrides the delivery attempt used by the default engine. */
  attempt?: DeliveryAttempt;
}

/**
 * Builds the Fastify app without listening.
 *
 * Order:
 * 1) Error handlers
 * 2) CORS, so a management UI on another origin can call every route
 * 3) Services (registry, engine, history, config)
 * 4) HTTP routes
 */
export async function buildServer(options: BuildServerOptions) {
  const { config, registry, log } = options;

  const fastify = Fastify({
    loggerInstance: log,
    bodyLimit: config.bodyLimitBytes,
  });

  await fastify.register(errorHandler);

  await fastify.register(cors, {
    origin: config.corsOrigin,
    methods: 'GET,POST,PUT,DELETE',
  });

  const engine = options.engine
    ?? createDispatchEngine(registry, { timeoutMs: config.dispatch.timeoutMs }, log, options.attempt);

  await fastify.register(servicesPlugin, {
    config,
    registry,
    engine,
    history: new DispatchHistory(config.historySize),
  });

  await fastify.register(endpointRoutes);
  await fastify.register(webhookRoutes);
  await fastify.register(dispatchRoutes);

  return fastify;
}
