export { default as servicesPlugin } from './services-plugin.js';
export type { RelayServices } from './services-plugin.js';
export { default as endpointRoutes } from './endpoint-routes.js';
export { default as webhookRoutes } from './webhook-routes.js';
export { default as dispatchRoutes } from './dispatch-routes.js';
export { default as errorHandler } from './error-handler.js';
