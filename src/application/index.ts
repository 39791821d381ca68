export type {
  EndpointRepository,
  EndpointChangeNotifier,
  EndpointChangeReason,
  ActiveEndpointSource,
} from './ports.js';
export { EndpointStore } from './endpoint-store.js';
export { EndpointRegistry } from './endpoint-registry.js';
export {
  createEndpointSchema,
  updateStatusSchema,
  storedEndpointSchema,
  storedEndpointListSchema,
} from './endpoint-schema.js';
export type { CreateEndpointInput, UpdateStatusInput } from './endpoint-schema.js';
export { attemptDelivery, classifyFailure } from './delivery.js';
export type { DeliveryAttempt, DeliveryOptions } from './delivery.js';
export { selectForwardHeaders } from './forward-headers.js';
export { aggregate, formatSummary, toResponseBody } from './aggregator.js';
export type { DispatchResponseBody, DispatchResponseOutcome, ResponseBodyOptions } from './aggregator.js';
export { createDispatchEngine, EVENT_ID_HEADER } from './dispatch-engine.js';
export type { DispatchEngine, DispatchEngineConfig, DispatchOptions } from './dispatch-engine.js';
export { DispatchHistory, DEFAULT_HISTORY_SIZE } from './dispatch-history.js';
