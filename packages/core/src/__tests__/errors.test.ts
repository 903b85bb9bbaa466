import { describe, it, expect } from 'vitest';
import { DecodeError, getErrorMessage } from '../errors.js';

describe('getErrorMessage', () => {
  it('returns message from Error instance', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('returns message from TypeError instance', () => {
    expect(getErrorMessage(new TypeError('type boom'))).toBe('type boom');
  });

  it('returns string as-is', () => {
    expect(getErrorMessage('something failed')).toBe('something failed');
  });

  it('returns Unknown error for number', () => {
    expect(getErrorMessage(42)).toBe('Unknown error');
  });

  it('returns Unknown error for null', () => {
    expect(getErrorMessage(null)).toBe('Unknown error');
  });

  it('returns Unknown error for object with message property', () => {
    expect(getErrorMessage({ message: 'not an error' })).toBe('Unknown error');
  });
});

describe('DecodeError', () => {
  it('carries kind, path and record kind', () => {
    const err = new DecodeError('missing_field', "Missing required field 'name' in member", 'name', 'member');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('DecodeError');
    expect(err.kind).toBe('missing_field');
    expect(err.path).toBe('name');
    expect(err.recordKind).toBe('member');
  });

  it('defaults to the root path', () => {
    const err = new DecodeError('malformed_json', 'bad body');
    expect(err.path).toBe('');
    expect(err.recordKind).toBeUndefined();
  });
});
