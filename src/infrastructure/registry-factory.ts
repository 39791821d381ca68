import type { Logger } from 'pino';
import type { RelayConfig } from '../config.js';
import { EndpointRegistry } from '../application/index.js';
import type { EndpointChangeNotifier, EndpointRepository } from '../application/index.js';
import { createDbClient, ensureSchema, createPgEndpointRepository } from './db/index.js';
import { JsonFileEndpointRepository } from './file/index.js';
import { InMemoryEndpointRepository } from './memory/index.js';
import { createRedisClient, createEndpointChangeNotifier, startEndpointSubscriber } from './redis/index.js';

export interface OpenedRegistry {
  registry: EndpointRegistry;
  /** Releases the database pool and Redis connections, in reverse order of opening. */
  close(): Promise<void>;
}

/**
 * Builds the endpoint registry for the configured backend and loads its
 * initial snapshot.
 *
 * With `redisUrl` set, mutations are published on Pub/Sub and this
 * instance reloads on changes made by any instance.
 */
export async function openRegistry(config: RelayConfig, log: Logger): Promise<OpenedRegistry> {
  const cleanups: Array<() => Promise<void>> = [];

  const close = async (): Promise<void> => {
    for (const cleanup of cleanups.splice(0).reverse()) {
      await cleanup();
    }
  };

  try {
    const repository = await openRepository(config, log, cleanups);

    let notifier: EndpointChangeNotifier | undefined;
    if (config.redisUrl !== undefined) {
      const publisher = createRedisClient(config.redisUrl);
      await publisher.connect();
      log.info('Redis connected');
      cleanups.push(async () => {
        await publisher.quit();
        log.info('Redis disconnected');
      });
      notifier = createEndpointChangeNotifier(publisher, log);
    }

    const registry = new EndpointRegistry(repository, log, notifier);
    await registry.reload();

    if (config.redisUrl !== undefined) {
      cleanups.push(await startEndpointSubscriber(config.redisUrl, registry, log));
    }

    return { registry, close };
  } catch (err: unknown) {
    await close();
    throw err;
  }
}

async function openRepository(
  config: RelayConfig,
  log: Logger,
  cleanups: Array<() => Promise<void>>,
): Promise<EndpointRepository> {
  const { backend, endpointsFile, databaseUrl } = config.registry;

  switch (backend) {
    case 'postgres': {
      if (databaseUrl === undefined) {
        throw new Error('DATABASE_URL is required when REGISTRY_BACKEND=postgres');
      }
      const { sql, db } = createDbClient(databaseUrl);
      cleanups.push(async () => {
        await sql.end();
        log.info('Database disconnected');
      });
      await ensureSchema(sql);
      log.info('Database ready (endpoints table)');
      return createPgEndpointRepository(db);
    }
    case 'file':
      log.info({ file: endpointsFile }, 'Using file-backed endpoint registry');
      return new JsonFileEndpointRepository(endpointsFile);
    case 'memory':
      log.warn('Using in-memory endpoint registry; endpoints will not survive a restart');
      return new InMemoryEndpointRepository();
  }
}
