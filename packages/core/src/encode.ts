/**
 * @pkv2/core — Request payload encoding
 *
 * PATCH endpoints treat a missing key as "leave unchanged" and `null` as
 * "clear". `undefined` is the not-provided state: such keys are dropped,
 * while `null` is kept.
 */
import { formatCalendarDate, isCalendarDate } from './dates.js';
import { EncodeError } from './errors.js';

export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | { [key: string]: WireValue };

export type WirePayload = { [key: string]: WireValue };

function joinPath(path: string, key: string | number): string {
  return path ? `${path}.${key}` : String(key);
}

/**
 * Convert a value into its JSON wire form. Returns undefined for values
 * that must not be sent. Throws EncodeError for an invalid Date.
 */
export function toWireValue(value: unknown, path = ''): WireValue | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new EncodeError(`Invalid date at '${path || '<root>'}'`, path);
    }
    return value.toISOString();
  }

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'function':
    case 'symbol':
      return undefined;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toWireValue(item, joinPath(path, index)) ?? null);
  }
  if (isCalendarDate(value)) return formatCalendarDate(value);
  if (typeof value === 'object') return toWirePayload(value, path);
  return undefined;
}

/** Encode an update or create object, omitting not-provided fields */
export function toWirePayload(value: object, path = ''): WirePayload {
  const out: WirePayload = {};
  for (const [key, field] of Object.entries(value)) {
    const wire = toWireValue(field, joinPath(path, key));
    if (wire !== undefined) out[key] = wire;
  }
  return out;
}
