export { InMemoryEndpointRepository } from './in-memory-endpoint-repository.js';
