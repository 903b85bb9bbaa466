import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger } from '../logger.js';

function spyOnStreams() {
  return {
    stdout: vi.spyOn(process.stdout, 'write').mockReturnValue(true),
    stderr: vi.spyOn(process.stderr, 'write').mockReturnValue(true),
  };
}

function firstEntry(calls: unknown[][]): Record<string, unknown> {
  return JSON.parse(String(calls[0]?.[0]).trim());
}

describe('createLogger', () => {
  let spies: ReturnType<typeof spyOnStreams>;

  beforeEach(() => {
    spies = spyOnStreams();
  });

  afterEach(() => {
    spies.stdout.mockRestore();
    spies.stderr.mockRestore();
    vi.unstubAllEnvs();
  });

  it('info outputs correct JSON format', () => {
    const log = createLogger('PluralKit');
    log.info('hello');
    const out = firstEntry(spies.stdout.mock.calls);
    expect(out).toMatchObject({ level: 'info', ns: 'PluralKit', msg: 'hello' });
    expect(typeof out['ts']).toBe('string');
  });

  it('warn goes to stdout', () => {
    createLogger('PluralKit').warn('careful');
    expect(firstEntry(spies.stdout.mock.calls)).toMatchObject({ level: 'warn', msg: 'careful' });
    expect(spies.stderr).not.toHaveBeenCalled();
  });

  it('error writes to stderr', () => {
    createLogger('PluralKit').error('boom');
    expect(firstEntry(spies.stderr.mock.calls)).toMatchObject({ level: 'error', msg: 'boom' });
  });

  it('filters debug at default log level (info)', () => {
    vi.stubEnv('LOG_LEVEL', '');
    createLogger('PluralKit').debug('hidden');
    expect(spies.stdout).not.toHaveBeenCalled();
  });

  it('includes debug when LOG_LEVEL=debug', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    createLogger('PluralKit').debug('visible');
    expect(firstEntry(spies.stdout.mock.calls)).toMatchObject({ level: 'debug', msg: 'visible' });
  });

  it('drops info when LOG_LEVEL=warn', () => {
    vi.stubEnv('LOG_LEVEL', 'WARN');
    createLogger('PluralKit').info('quiet');
    expect(spies.stdout).not.toHaveBeenCalled();
  });

  it('serialises snowflakes in data as strings', () => {
    createLogger('PluralKit').info('guild', { guild_id: 123456789012345678n });
    expect(firstEntry(spies.stdout.mock.calls)['data']).toEqual({ guild_id: '123456789012345678' });
  });

  it('redacts credential fields at any depth', () => {
    createLogger('PluralKit').info('headers', {
      headers: { Authorization: 'test-token', Accept: 'application/json' },
      token: 'test-token',
    });
    expect(firstEntry(spies.stdout.mock.calls)['data']).toEqual({
      headers: { Authorization: '[redacted]', Accept: 'application/json' },
      token: '[redacted]',
    });
  });

  it('omits data field when not provided', () => {
    createLogger('PluralKit').info('no data');
    expect(firstEntry(spies.stdout.mock.calls)).not.toHaveProperty('data');
  });
});
