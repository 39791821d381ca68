export type { Endpoint, NewEndpoint } from './endpoint.js';
export type {
  WebhookEvent,
  DeliveryErrorKind,
  DeliveryOutcome,
  DispatchSummary,
  DispatchResult,
} from './dispatch.js';
export {
  RelayError,
  ValidationError,
  NotFoundError,
  DeliveryError,
  InternalError,
} from './errors.js';
