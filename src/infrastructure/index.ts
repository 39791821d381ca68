export {
  createDbClient,
  ensureSchema,
  endpoints,
  findAllEndpoints,
  insertEndpoint,
  updateEndpointStatus,
  deleteEndpoint,
  createPgEndpointRepository,
} from './db/index.js';
export type { Database, SqlClient, EndpointRow } from './db/index.js';
export { JsonFileEndpointRepository } from './file/index.js';
export { InMemoryEndpointRepository } from './memory/index.js';
export {
  createRedisClient,
  createEndpointChangeNotifier,
  startEndpointSubscriber,
  createReloadHandler,
  ENDPOINTS_CHANNEL,
  endpointChangeSchema,
} from './redis/index.js';
export type { EndpointChangePayload } from './redis/index.js';
export { openRegistry } from './registry-factory.js';
export type { OpenedRegistry } from './registry-factory.js';
