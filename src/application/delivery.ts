import type { DeliveryOutcome, Endpoint } from '../domain/index.js';
import { DeliveryError } from '../domain/index.js';

const DETAIL_MAX_LENGTH = 256;

/** Socket and resolver error codes that mean the destination was not reachable. */
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'EHOSTDOWN',
  'ENETUNREACH',
  'ENETDOWN',
  'ETIMEDOUT',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_CLOSED',
  'UND_ERR_DESTROYED',
]);

export interface DeliveryOptions {
  timeoutMs: number;
  /** Extra request headers. `Content-Type` is always application/json. */
  headers?: Readonly<Record<string, string>>;
}

export type DeliveryAttempt = (
  endpoint: Endpoint,
  payload: Buffer,
  options: DeliveryOptions,
) => Promise<DeliveryOutcome>;

/**
 * Performs one HTTP POST of `payload` to `endpoint.url` and classifies the result.
 *
 * Success means a 2xx status arrived before `timeoutMs` elapsed. Every
 * failure mode is captured in the returned outcome; this function does not
 * reject. One outbound call, no retries.
 */
export const attemptDelivery: DeliveryAttempt = async (endpoint, payload, options) => {
  const started = performance.now();
  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  try {
    const response = await fetch(endpoint.url, {
      method: 'POST',
      headers: requestHeaders(options.headers),
      body: payload,
      signal: controller.signal,
    });

    if (response.ok) {
      await discardBody(response);
      return outcome(endpoint, started, { success: true, httpStatus: response.status });
    }

    const failure = new DeliveryError(
      `http_error:${response.status}`,
      await readDetail(response),
      { httpStatus: response.status },
    );
    return failureOutcome(endpoint, started, failure);
  } catch (err: unknown) {
    return failureOutcome(endpoint, started, classifyFailure(err, timedOut));
  } finally {
    clearTimeout(timer);
  }
};

/** Caller headers plus `Content-Type: application/json`, which replaces any other casing of it. */
function requestHeaders(extra: Readonly<Record<string, string>> = {}): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(extra)) {
    if (name.toLowerCase() !== 'content-type') headers[name] = value;
  }
  headers['Content-Type'] = 'application/json';
  return headers;
}

/**
 * Maps a thrown fetch error to a `DeliveryError`.
 *
 * `timedOut` is whether our own timer fired; an abort from anywhere else
 * is not a timeout.
 */
export function classifyFailure(err: unknown, timedOut: boolean): DeliveryError {
  const message = err instanceof Error ? err.message : String(err);

  if (timedOut) {
    return new DeliveryError('timeout', 'Delivery timed out', { cause: err });
  }

  const cause = err instanceof Error ? err.cause : undefined;
  const code = errorCode(cause);
  if (code !== undefined && CONNECTION_ERROR_CODES.has(code)) {
    return new DeliveryError('connection_error', `${message} (${code})`, { cause: err });
  }

  return new DeliveryError('other', message, { cause: err });
}

/**
 * Pulls a Node-style `code` off an error, looking inside AggregateError
 * (dual-stack connects fail with one of those).
 */
function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;

  if ('code' in err && typeof err.code === 'string') {
    return err.code;
  }

  if (err instanceof AggregateError) {
    for (const inner of err.errors) {
      const code = errorCode(inner);
      if (code !== undefined) return code;
    }
  }

  return undefined;
}

async function readDetail(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.length > DETAIL_MAX_LENGTH ? `${text.slice(0, DETAIL_MAX_LENGTH)}…` : text;
  } catch (err: unknown) {
    return `Unable to read error response: ${err instanceof Error ? err.message : String(err)}`;
  }
}

/** Releases the connection without waiting for a body nobody reads. */
async function discardBody(response: Response): Promise<void> {
  if (response.body === null) return;
  await response.body.cancel().catch(() => undefined);
}

function failureOutcome(endpoint: Endpoint, started: number, failure: DeliveryError): DeliveryOutcome {
  return outcome(endpoint, started, {
    success: false,
    httpStatus: failure.httpStatus,
    error: failure.kind,
    detail: failure.message,
  });
}

function outcome(
  endpoint: Endpoint,
  started: number,
  fields: Pick<DeliveryOutcome, 'success' | 'httpStatus' | 'error' | 'detail'>,
): DeliveryOutcome {
  const result: DeliveryOutcome = {
    endpointId: endpoint.id,
    endpointName: endpoint.name,
    url: endpoint.url,
    success: fields.success,
    latencyMs: Math.round(performance.now() - started),
    ...(fields.httpStatus !== undefined && { httpStatus: fields.httpStatus }),
    ...(fields.error !== undefined && { error: fields.error }),
    ...(fields.detail !== undefined && { detail: fields.detail }),
  };
  return Object.freeze(result);
}
