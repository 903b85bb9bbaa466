/**
 * @pkv2/sdk — Structured logger
 */
const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

function getThreshold(): number {
  const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(env) ? LEVELS[env] : LEVELS.info;
}

/** Keys whose values carry credentials; matched case-insensitively */
const REDACTED_KEYS = new Set(['authorization', 'token']);

function toLoggable(key: string, value: unknown): unknown {
  if (REDACTED_KEYS.has(key.toLowerCase()) && value != null) return '[redacted]';
  return typeof value === 'bigint' ? value.toString() : value;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

/**
 * JSON-lines logger; errors go to stderr, the rest to stdout. Snowflakes are
 * written as strings and credential fields as `[redacted]`.
 */
export function createLogger(namespace: string): Logger {
  const write = (level: LogLevel, msg: string, data?: unknown) => {
    if (LEVELS[level] < getThreshold()) return;
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      ns: namespace,
      msg,
    };
    if (data !== undefined) entry.data = data;
    const line = JSON.stringify(entry, toLoggable);
    if (level === 'error') process.stderr.write(line + '\n');
    else process.stdout.write(line + '\n');
  };

  return {
    debug: (msg, data?) => write('debug', msg, data),
    info: (msg, data?) => write('info', msg, data),
    warn: (msg, data?) => write('warn', msg, data),
    error: (msg, data?) => write('error', msg, data),
  };
}
