/**
 * @pkv2/sdk — Typed Errors
 */
import type { ErrorResponse, SubError } from '@pkv2/core';

export { DecodeError, EncodeError } from '@pkv2/core';
export type { DecodeErrorKind } from '@pkv2/core';

/**
 * Base error class for all SDK errors. `status` is the HTTP status, or 0 when
 * the failure never produced one.
 */
export class PKError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, status: number, code: string, details?: unknown) {
    super(message);
    this.name = 'PKError';
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/**
 * Thrown before any network call when an operation needs a token and the
 * client was built without one.
 */
export class CapabilityError extends PKError {
  constructor(operation?: string) {
    super(
      operation ? `${operation} requires authorization` : 'This operation requires authorization',
      0,
      'NOT_AUTHORIZED',
    );
    this.name = 'CapabilityError';
  }
}

/**
 * Thrown when a client is used after `close()`.
 */
export class ClientClosedError extends PKError {
  constructor() {
    super('Client has been closed', 0, 'CLIENT_CLOSED');
    this.name = 'ClientClosedError';
  }
}

/**
 * Thrown for connection failures, timeouts, and failed responses without a
 * usable error body.
 */
export class TransportError extends PKError {
  constructor(message: string, status = 0, details?: unknown, code = 'TRANSPORT_ERROR') {
    super(message, status, code, details);
    this.name = 'TransportError';
  }
}

/**
 * Thrown when the server returns 429. Never retried: the API's retry hints
 * are not dependable, so `retryAfter` is informational only.
 */
export class RateLimitedError extends TransportError {
  public readonly retryAfter: number | null;

  constructor(retryAfter: number | null = null) {
    super('Rate limit exceeded (HTTP 429)', 429, undefined, 'RATE_LIMITED');
    this.name = 'RateLimitedError';
    this.retryAfter = retryAfter;
  }
}

function describeSubError(error: SubError): string {
  const lengths =
    error.max_length != null
      ? ` (${error.actual_length ?? '?'}/${error.max_length})`
      : '';
  return error.field ? `${error.field}: ${error.message}${lengths}` : `${error.message}${lengths}`;
}

/**
 * Thrown when the API rejects a request with a structured error body.
 */
export class HttpError extends PKError {
  public readonly httpCode: number;
  public readonly apiCode: number;
  public readonly subErrors: SubError[];
  public readonly retryAfter: number | null;
  public readonly response: ErrorResponse;

  constructor(response: ErrorResponse) {
    const sub = response.errors.map(describeSubError).join('; ');
    super(
      `Error ${response.code}: ${response.message}${sub ? ` (${sub})` : ''}`,
      response.http_code,
      'API_ERROR',
      response.errors,
    );
    this.name = 'HttpError';
    this.httpCode = response.http_code;
    this.apiCode = response.code;
    this.subErrors = response.errors;
    this.retryAfter = response.retry_after ?? null;
    this.response = response;
  }
}

/** HTTP 400 */
export class BadRequestError extends HttpError {
  constructor(response: ErrorResponse) {
    super(response);
    this.name = 'BadRequestError';
  }
}

/** HTTP 401 */
export class UnauthorizedError extends HttpError {
  constructor(response: ErrorResponse) {
    super(response);
    this.name = 'UnauthorizedError';
  }
}

/** HTTP 403 */
export class ForbiddenError extends HttpError {
  constructor(response: ErrorResponse) {
    super(response);
    this.name = 'ForbiddenError';
  }
}

/** HTTP 404 */
export class NotFoundError extends HttpError {
  constructor(response: ErrorResponse) {
    super(response);
    this.name = 'NotFoundError';
  }
}

export function isNotFound(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError;
}
