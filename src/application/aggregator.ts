import type { DeliveryOutcome, DispatchResult, DispatchSummary } from '../domain/index.js';

/**
 * Counts outcomes and orders them deterministically.
 *
 * With `order` (endpoint ids in snapshot order) outcomes are sorted to
 * match it; ids not in `order` keep their relative position at the end.
 * Pure: no I/O.
 */
export function aggregate(
  outcomes: readonly DeliveryOutcome[],
  order?: readonly string[],
): DispatchSummary {
  let ordered: readonly DeliveryOutcome[] = outcomes;

  if (order !== undefined) {
    const rank = new Map(order.map((id, index) => [id, index]));
    ordered = [...outcomes].sort(
      (a, b) => (rank.get(a.endpointId) ?? order.length) - (rank.get(b.endpointId) ?? order.length),
    );
  }

  const succeeded = ordered.filter((o) => o.success).length;

  return {
    total: ordered.length,
    succeeded,
    failed: ordered.length - succeeded,
    outcomes: ordered,
  };
}

/**
 * One-line summary for logs.
 * Failed endpoints are listed by name with their error classification.
 */
export function formatSummary(result: DispatchResult): string {
  const line = `dispatch ${result.eventId} total=${result.total} succeeded=${result.succeeded} failed=${result.failed} in ${result.durationMs}ms`;

  const failures = result.outcomes
    .filter((o) => !o.success)
    .map((o) => `${o.endpointName}:${o.error ?? 'other'}`);

  return failures.length > 0 ? `${line} [${failures.join(', ')}]` : line;
}

export interface ResponseBodyOptions {
  includeOutcomes: boolean;
}

export interface DispatchResponseOutcome {
  endpoint_id: string;
  name: string;
  success: boolean;
  http_status: number | null;
  error: string | null;
  latency_ms: number;
}

export interface DispatchResponseBody {
  event_id: string;
  total: number;
  succeeded: number;
  failed: number;
  duration_ms: number;
  outcomes?: DispatchResponseOutcome[];
}

/** Shape returned to whoever posted the webhook. */
export function toResponseBody(
  result: DispatchResult,
  options: ResponseBodyOptions,
): DispatchResponseBody {
  const body: DispatchResponseBody = {
    event_id: result.eventId,
    total: result.total,
    succeeded: result.succeeded,
    failed: result.failed,
    duration_ms: result.durationMs,
  };

  if (options.includeOutcomes) {
    body.outcomes = result.outcomes.map((o) => ({
      endpoint_id: o.endpointId,
      name: o.endpointName,
      success: o.success,
      http_status: o.httpStatus ?? null,
      error: o.error ?? null,
      latency_ms: o.latencyMs,
    }));
  }

  return body;
}
