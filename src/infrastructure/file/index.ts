export { JsonFileEndpointRepository } from './json-endpoint-repository.js';
