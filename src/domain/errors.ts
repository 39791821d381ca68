import type { DeliveryErrorKind } from './dispatch.js';

/**
 * Base class for errors the relay answers HTTP requests with.
 *
 * `statusCode` is what the HTTP layer answers with; `code` is a stable
 * machine-readable identifier included in the error body.
 */
export abstract class RelayError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad registry input or a malformed inbound body. */
export class ValidationError extends RelayError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR';
  readonly details: unknown;

  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.details = details;
  }
}

/** Unknown endpoint id. */
export class NotFoundError extends RelayError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';
}

/**
 * Per-endpoint transport, timeout or status failure.
 *
 * Not a `RelayError`: it has no HTTP status because it never reaches a
 * client. A delivery attempt builds one to classify what went wrong and
 * folds it into the outcome.
 */
export class DeliveryError extends Error {
  readonly kind: DeliveryErrorKind;
  readonly httpStatus: number | undefined;

  constructor(kind: DeliveryErrorKind, message: string, options?: { cause?: unknown; httpStatus?: number }) {
    super(message, options);
    this.name = 'DeliveryError';
    this.kind = kind;
    this.httpStatus = options?.httpStatus;
  }
}

/** Unexpected fault inside the relay itself. */
export class InternalError extends RelayError {
  readonly statusCode = 500;
  readonly code = 'INTERNAL_ERROR';
}
