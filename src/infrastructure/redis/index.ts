export { createRedisClient } from './client.js';
export {
  createEndpointChangeNotifier,
  ENDPOINTS_CHANNEL,
  endpointChangeSchema,
} from './endpoint-notifier.js';
export type { EndpointChangePayload } from './endpoint-notifier.js';
export { startEndpointSubscriber, createReloadHandler } from './endpoint-subscriber.js';
