import type { Logger } from 'pino';
import type { DeliveryOutcome, DispatchResult, Endpoint, WebhookEvent } from '../domain/index.js';
import { InternalError } from '../domain/index.js';
import { aggregate, formatSummary } from './aggregator.js';
import { attemptDelivery } from './delivery.js';
import type { DeliveryAttempt } from './delivery.js';
import type { ActiveEndpointSource } from './ports.js';

export const EVENT_ID_HEADER = 'X-Relay-Event-Id';

/** Forwarded headers plus the relay's event id, which no inbound casing of it can override. */
function relayHeaders(event: WebhookEvent): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(event.headers)) {
    if (name.toLowerCase() !== EVENT_ID_HEADER.toLowerCase()) headers[name] = value;
  }
  headers[EVENT_ID_HEADER] = event.id;
  return headers;
}

export interface DispatchEngineConfig {
  timeoutMs: number;
}

export interface DispatchOptions {
  /** Deliver only to this endpoint (if it is in the active snapshot). */
  endpointId?: string;
}

export interface DispatchEngine {
  dispatch(event: WebhookEvent, options?: DispatchOptions): Promise<DispatchResult>;
}

/**
 * Creates the fan-out engine.
 *
 * Per dispatch:
 * 1. Reads the active snapshot once. Registry changes after this point
 *    only affect later dispatches.
 * 2. Starts one attempt per endpoint, all before awaiting any of them,
 *    each bounded by the same timeout.
 * 3. Joins every attempt (no short-circuit) and aggregates in snapshot order.
 *
 * Attempts share nothing. A rejected attempt is turned into an `other`
 * outcome for that endpoint alone.
 */
export function createDispatchEngine(
  source: ActiveEndpointSource,
  config: DispatchEngineConfig,
  log: Logger,
  attempt: DeliveryAttempt = attemptDelivery,
) {
  const guarded = async (endpoint: Endpoint, event: WebhookEvent, headers: Readonly<Record<string, string>>): Promise<DeliveryOutcome> => {
    try {
      return await attempt(endpoint, event.payload, { timeoutMs: config.timeoutMs, headers });
    } catch (err: unknown) {
      const fault = new InternalError('Delivery attempt raised instead of returning an outcome', { cause: err });
      log.error({ err, event_id: event.id, endpoint_id: endpoint.id }, fault.message);
      const fallback: DeliveryOutcome = {
        endpointId: endpoint.id,
        endpointName: endpoint.name,
        url: endpoint.url,
        success: false,
        error: 'other',
        detail: fault.message,
        latencyMs: 0,
      };
      return Object.freeze(fallback);
    }
  };

  const report = (event: WebhookEvent, outcomes: readonly DeliveryOutcome[]): void => {
    for (const o of outcomes) {
      if (o.success) {
        log.debug(
          { event_id: event.id, endpoint_id: o.endpointId, http_status: o.httpStatus, latency_ms: o.latencyMs },
          'Delivery succeeded',
        );
      } else {
        log.warn(
          {
            event_id: event.id,
            endpoint_id: o.endpointId,
            url: o.url,
            error: o.error,
            http_status: o.httpStatus,
            detail: o.detail,
            latency_ms: o.latencyMs,
          },
          'Delivery failed',
        );
      }
    }
  };

  const engine: DispatchEngine = {
    async dispatch(event, options = {}) {
      const started = performance.now();

      const active = await source.listActive();
      const snapshot = options.endpointId === undefined
        ? active
        : active.filter((e) => e.id === options.endpointId);

      if (snapshot.length === 0) {
        log.info({ event_id: event.id, endpoint_id: options.endpointId }, 'No active endpoints, nothing to dispatch');
      }

      const headers = relayHeaders(event);
      const outcomes = await Promise.all(snapshot.map((endpoint) => guarded(endpoint, event, headers)));
      report(event, outcomes);

      const summary = aggregate(outcomes, snapshot.map((e) => e.id));
      const result: DispatchResult = Object.freeze({
        ...summary,
        eventId: event.id,
        receivedAt: event.receivedAt.toISOString(),
        durationMs: Math.round(performance.now() - started),
      });

      const line = formatSummary(result);
      const fields = { event_id: event.id, total: result.total, succeeded: result.succeeded, failed: result.failed };
      if (result.failed > 0) {
        log.warn(fields, line);
      } else {
        log.info(fields, line);
      }

      return result;
    },
  };

  return engine;
}
