/**
 * Core types for one fan-out of an inbound webhook.
 *
 * An event lives only for the duration of a single dispatch call;
 * outcomes and results are immutable once built.
 */

/** Inbound webhook as handed to the dispatch engine. */
export interface WebhookEvent {
  readonly id: string;
  /** JSON body exactly as received. Forwarded byte-for-byte. */
  readonly payload: Buffer;
  readonly receivedAt: Date;
  /** Inbound headers retained for forwarding (already filtered). */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Failure classification recorded on an outcome.
 * `http_error:<code>` carries the downstream status code.
 */
export type DeliveryErrorKind =
  | 'timeout'
  | 'connection_error'
  | `http_error:${number}`
  | 'other';

export interface DeliveryOutcome {
  readonly endpointId: string;
  readonly endpointName: string;
  readonly url: string;
  readonly success: boolean;
  readonly httpStatus?: number;
  readonly error?: DeliveryErrorKind;
  /** Underlying error message or a truncated response body. */
  readonly detail?: string;
  readonly latencyMs: number;
}

/** Counts plus ordered outcomes. `total === succeeded + failed === outcomes.length`. */
export interface DispatchSummary {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly outcomes: readonly DeliveryOutcome[];
}

export interface DispatchResult extends DispatchSummary {
  readonly eventId: string;
  readonly receivedAt: string; // ISO-8601
  readonly durationMs: number;
}
