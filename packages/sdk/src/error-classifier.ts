/**
 * @pkv2/sdk — Error Classifier
 *
 * Maps a failed response (status + raw body) to a typed error. Pure: no I/O,
 * no retry decisions.
 */
import {
  DecodeError,
  decode,
  errorKindForStatus,
  intSchema,
  parseJson,
  type ErrorResponse,
  type RawPayload,
} from '@pkv2/core';
import {
  BadRequestError,
  ForbiddenError,
  HttpError,
  NotFoundError,
  RateLimitedError,
  TransportError,
  UnauthorizedError,
  type PKError,
} from './errors.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Best-effort read of retry_after from a 429 body; never trusted for waiting */
function readRetryAfter(body: string): number | null {
  if (body.trim() === '') return null;
  let raw: RawPayload;
  try {
    raw = parseJson(body);
  } catch (err) {
    if (err instanceof DecodeError) return null;
    throw err;
  }
  if (!isObject(raw)) return null;
  const parsed = intSchema.safeParse(raw['retry_after']);
  return parsed.success ? parsed.data : null;
}

export function httpErrorFromResponse(response: ErrorResponse): HttpError {
  switch (response.http_code) {
    case 400:
      return new BadRequestError(response);
    case 401:
      return new UnauthorizedError(response);
    case 403:
      return new ForbiddenError(response);
    case 404:
      return new NotFoundError(response);
    default:
      return new HttpError(response);
  }
}

/**
 * Classify a non-2xx response. `http_code` on the decoded body is always the
 * transport status, whatever the body says.
 */
export function classifyHttpError(status: number, body: string): PKError {
  if (status === 429) return new RateLimitedError(readRetryAfter(body));
  if (body.trim() === '') return new TransportError(`HTTP ${status} with an empty body`, status);

  try {
    const raw = parseJson(body);
    const withStatus = isObject(raw) ? { ...raw, http_code: status } : raw;
    return httpErrorFromResponse(decode(withStatus, errorKindForStatus(status)));
  } catch (err) {
    if (err instanceof DecodeError) {
      return new TransportError(`HTTP ${status} with an unrecognised error body`, status, {
        body,
        cause: err,
      });
    }
    throw err;
  }
}
