import { Redis } from 'ioredis';

/**
 * Creates an ioredis client that connects on `connect()`.
 *
 * Pub/Sub needs two of these: once a client subscribes it can no longer
 * issue regular commands such as PUBLISH.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
