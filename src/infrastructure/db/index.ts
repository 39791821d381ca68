export { endpoints } from './schema.js';
export { createDbClient, ensureSchema } from './client.js';
export type { Database, SqlClient } from './client.js';
export {
  findAllEndpoints,
  insertEndpoint,
  updateEndpointStatus,
  deleteEndpoint,
  createPgEndpointRepository,
} from './endpoint-repository.js';
export type { EndpointRow } from './endpoint-repository.js';
