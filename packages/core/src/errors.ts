/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

export type DecodeErrorKind =
  | 'missing_field'
  | 'unknown_enum'
  | 'malformed_date'
  | 'invalid_value'
  | 'malformed_json';

/**
 * Thrown when a response body does not conform to the expected record schema.
 * A record is never returned partially populated.
 */
export class DecodeError extends Error {
  public readonly kind: DecodeErrorKind;
  /** Dotted path of the offending field ('' for the root) */
  public readonly path: string;
  /** Registry kind being decoded, when known */
  public readonly recordKind?: string;

  constructor(kind: DecodeErrorKind, message: string, path = '', recordKind?: string) {
    super(message);
    this.name = 'DecodeError';
    this.kind = kind;
    this.path = path;
    this.recordKind = recordKind;
  }
}

/**
 * Thrown when a request payload holds a value with no wire form, such as an
 * invalid Date. Raised before any request is made.
 */
export class EncodeError extends Error {
  /** Dotted path of the offending field ('' for the root) */
  public readonly path: string;

  constructor(message: string, path = '') {
    super(message);
    this.name = 'EncodeError';
    this.path = path;
  }
}
