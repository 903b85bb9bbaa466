/**
 * @pkv2/core — Object Mapper
 *
 * Turns parsed response bodies into typed records through the schema
 * registry. Every record kind goes through `decode`; failures surface as
 * `DecodeError`, never as a partially populated record.
 */
import { z } from 'zod';
import { DecodeError, getErrorMessage, type DecodeErrorKind } from './errors.js';
import { recordSchemas, type RecordKind, type RecordTypes } from './schemas.js';

/** Untyped JSON tree as produced by JSON.parse */
export type RawPayload = unknown;

/** Wire values for fields the response omits but the caller already knows */
export type DecodeOverrides = Readonly<Record<string, unknown>>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function hasPath(root: unknown, path: ReadonlyArray<string | number>): boolean {
  let current: unknown = root;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return false;
    if (!(key in current)) return false;
    const next: unknown = Reflect.get(current, key);
    if (next === undefined) return false;
    current = next;
  }
  return true;
}

/** Follows union failures down to the most specific issue */
function mostSpecificIssue(issue: z.ZodIssue): z.ZodIssue {
  if (issue.code !== z.ZodIssueCode.invalid_union) return issue;
  let best: z.ZodIssue = issue;
  for (const unionError of issue.unionErrors) {
    for (const nested of unionError.issues) {
      const candidate = mostSpecificIssue(nested);
      if (candidate.path.length > best.path.length) best = candidate;
    }
  }
  return best;
}

function classify(issue: z.ZodIssue, input: unknown): DecodeErrorKind {
  if (issue.code === z.ZodIssueCode.custom && issue.params?.['kind'] === 'malformed_date') {
    return 'malformed_date';
  }
  if (issue.code === z.ZodIssueCode.invalid_enum_value) return 'unknown_enum';
  if (issue.path.length > 0 && !hasPath(input, issue.path)) return 'missing_field';
  return 'invalid_value';
}

function toDecodeError(error: z.ZodError, input: unknown, kind: RecordKind): DecodeError {
  const first = error.issues[0];
  if (!first) return new DecodeError('invalid_value', `Could not decode ${kind}`, '', kind);

  const issue = mostSpecificIssue(first);
  const errorKind = classify(issue, input);
  const path = issue.path.join('.');
  switch (errorKind) {
    case 'missing_field':
      return new DecodeError(errorKind, `Missing required field '${path}' in ${kind}`, path, kind);
    case 'unknown_enum':
      return new DecodeError(errorKind, `Unknown value for '${path}' in ${kind}: ${issue.message}`, path, kind);
    case 'malformed_date':
      return new DecodeError(errorKind, `Malformed date at '${path}' in ${kind}: ${issue.message}`, path, kind);
    default:
      return new DecodeError(
        errorKind,
        `Invalid value at '${path || '<root>'}' in ${kind}: ${issue.message}`,
        path,
        kind,
      );
  }
}

function applyOverrides(raw: RawPayload, overrides: DecodeOverrides): RawPayload {
  if (!isPlainObject(raw)) return raw;
  const merged: Record<string, unknown> = { ...raw };
  for (const [key, value] of Object.entries(overrides)) {
    if (merged[key] === undefined) merged[key] = value;
  }
  return merged;
}

/**
 * Decode one record. Fields missing from `raw` are taken from `overrides`
 * when given there; payload values always win.
 */
export function decode<K extends RecordKind>(
  raw: RawPayload,
  kind: K,
  overrides?: DecodeOverrides,
): RecordTypes[K] {
  const input = overrides ? applyOverrides(raw, overrides) : raw;
  const result = recordSchemas[kind].safeParse(input);
  if (!result.success) throw toDecodeError(result.error, input, kind);
  return result.data;
}

/**
 * Decode a JSON array of records. Error paths are prefixed with the index of
 * the failing element.
 */
export function decodeList<K extends RecordKind>(
  raw: RawPayload,
  kind: K,
  overrides?: DecodeOverrides,
): RecordTypes[K][] {
  if (!Array.isArray(raw)) {
    throw new DecodeError('invalid_value', `Expected a list of ${kind}`, '', kind);
  }
  return raw.map((item: unknown, index) => {
    try {
      return decode(item, kind, overrides);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      const path = err.path ? `${index}.${err.path}` : String(index);
      throw new DecodeError(err.kind, `[${index}] ${err.message}`, path, kind);
    }
  });
}

/** Parse a response body into a RawPayload */
export function parseJson(body: string): RawPayload {
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (err) {
    throw new DecodeError('malformed_json', `Response body is not valid JSON: ${getErrorMessage(err)}`);
  }
}

export function decodeBody<K extends RecordKind>(
  body: string,
  kind: K,
  overrides?: DecodeOverrides,
): RecordTypes[K] {
  return decode(parseJson(body), kind, overrides);
}

export function decodeListBody<K extends RecordKind>(
  body: string,
  kind: K,
  overrides?: DecodeOverrides,
): RecordTypes[K][] {
  return decodeList(parseJson(body), kind, overrides);
}
