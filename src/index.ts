import pino from 'pino';
import { loadConfig } from './config.js';
import { openRegistry } from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap the relay.
 *
 * Order:
 * 1) Config (fails fast on invalid env)
 * 2) Registry backend + initial snapshot (+ Redis change propagation)
 * 3) Fastify app, shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const log = pino({ level: config.logLevel });

  const { registry, close } = await openRegistry(config, log);

  const fastify = await buildServer({ config, registry, log });

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    await close();
  });

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  log.info(
    {
      backend: config.registry.backend,
      timeoutMs: config.dispatch.timeoutMs,
      mode: config.dispatch.mode,
      endpoints: registry.list().length,
    },
    'Webhook relay ready',
  );

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    void fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start webhook relay',
    err,
  );

  process.exit(1);

});
