/**
 * Client configuration — PLURALKIT_* environment variables, falling back to defaults.
 */
import {
  DEFAULT_BASE_URL,
  DEFAULT_RATE_LIMIT_MAX,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
  DEFAULT_TIMEOUT_MS,
} from '@pkv2/core';

export interface ClientConfig {
  /** API token (PLURALKIT_TOKEN); unset means read-only access */
  token?: string;
  /** API base URL (PLURALKIT_API_URL) */
  baseUrl: string;
  /** Request timeout in ms (PLURALKIT_TIMEOUT_MS) */
  timeout: number;
  rateLimit: {
    /** PLURALKIT_RATE_LIMIT_MAX */
    maxRequests: number;
    /** PLURALKIT_RATE_LIMIT_WINDOW_MS */
    windowMs: number;
  };
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw ?? '', 10);
  return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

/**
 * Read configuration from environment variables.
 */
export function getClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return {
    token: env['PLURALKIT_TOKEN'] || undefined,
    baseUrl: env['PLURALKIT_API_URL'] || DEFAULT_BASE_URL,
    timeout: positiveInt(env['PLURALKIT_TIMEOUT_MS'], DEFAULT_TIMEOUT_MS),
    rateLimit: {
      maxRequests: positiveInt(env['PLURALKIT_RATE_LIMIT_MAX'], DEFAULT_RATE_LIMIT_MAX),
      windowMs: positiveInt(env['PLURALKIT_RATE_LIMIT_WINDOW_MS'], DEFAULT_RATE_LIMIT_WINDOW_MS),
    },
  };
}
