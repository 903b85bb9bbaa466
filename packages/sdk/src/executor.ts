/**
 * @pkv2/sdk — Request Executor
 *
 * Single path for every API call: permit, auth header, JSON body, dispatch,
 * full body read, and routing of failures through the error classifier.
 * Successful bodies are returned raw; decoding belongs to the caller.
 */
import {
  DEFAULT_BASE_URL,
  DEFAULT_RATE_LIMIT_MAX,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
  DEFAULT_TIMEOUT_MS,
  getErrorMessage,
  toWireValue,
} from '@pkv2/core';
import { classifyHttpError } from './error-classifier.js';
import {
  CapabilityError,
  ClientClosedError,
  RateLimitedError,
  TransportError,
} from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { RateLimiter } from './rate-limiter.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | bigint | null | undefined;

export interface RateLimitConfig {
  /** Requests per window (default: 2) */
  maxRequests?: number;
  /** Window length in ms (default: 1000) */
  windowMs?: number;
}

export interface RequestExecutorOptions {
  /** API base URL (default: https://api.pluralkit.me/v2) */
  baseUrl?: string;
  /** Token sent verbatim as the Authorization header */
  token?: string;
  /** Custom fetch implementation (defaults to global fetch) */
  fetch?: typeof globalThis.fetch;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  rateLimit?: RateLimitConfig;
  /** User-Agent header value */
  userAgent?: string;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Request body; encoded with toWireValue, so undefined fields are dropped */
  payload?: object;
  query?: Record<string, QueryValue>;
  /** Fail with CapabilityError before any I/O when no token is configured */
  requiresAuth?: boolean;
  /** Name used in CapabilityError messages */
  operation?: string;
  signal?: AbortSignal;
}

export interface RawResponse {
  status: number;
  body: string;
}

export const DEFAULT_USER_AGENT = 'pkv2-sdk';

export class RequestExecutor {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly _fetch: typeof globalThis.fetch;
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly limiter: RateLimiter;
  private closed = false;

  constructor(options: RequestExecutorOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.token = options.token;
    this._fetch = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger ?? createLogger('PluralKit');
    this.limiter = new RateLimiter(
      options.rateLimit?.maxRequests ?? DEFAULT_RATE_LIMIT_MAX,
      options.rateLimit?.windowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS,
    );
  }

  get authenticated(): boolean {
    return this.token !== undefined;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Throws CapabilityError when no token is configured */
  requireAuth(operation?: string): void {
    if (!this.authenticated) throw new CapabilityError(operation);
  }

  buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    if (!query) return url;
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value != null) params.set(key, String(value));
    }
    const qs = params.toString();
    return qs ? `${url}?${qs}` : url;
  }

  async execute(
    method: HttpMethod,
    path: string,
    options: ExecuteOptions = {},
  ): Promise<RawResponse> {
    if (this.closed) throw new ClientClosedError();
    if (options.requiresAuth) this.requireAuth(options.operation ?? `${method} ${path}`);

    // Encode first: a payload that cannot be sent must not cost a permit.
    const jsonBody =
      options.payload === undefined
        ? undefined
        : JSON.stringify(toWireValue(options.payload) ?? null);

    await this.limiter.acquire(options.signal);
    options.signal?.throwIfAborted();

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': this.userAgent,
    };
    if (this.token !== undefined) {
      headers['Authorization'] = this.token;
    }

    if (jsonBody !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const url = this.buildUrl(path, options.query);
    const { status, body } = await this.dispatch(url, method, headers, jsonBody, options.signal);
    this.logger.debug('request', { method, path, status });

    if (status >= 200 && status < 300) return { status, body };

    const error = classifyHttpError(status, body);
    if (error instanceof RateLimitedError) {
      this.logger.warn('Rate limited by the API; not retrying', { method, path });
    }
    throw error;
  }

  /** Release the limiter. Later calls fail with ClientClosedError. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.limiter.destroy(new ClientClosedError());
  }

  private async dispatch(
    url: string,
    method: HttpMethod,
    headers: Record<string, string>,
    body: string | undefined,
    signal?: AbortSignal,
  ): Promise<RawResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) forwardAbort();
    else signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await this._fetch(url, {
        method,
        headers,
        body,
        signal: controller.signal,
      });
      // Read the body even on failure: it carries the structured error.
      const text = await response.text();
      return { status: response.status, body: text };
    } catch (err) {
      if (timedOut) {
        throw new TransportError(`Request to ${url} timed out after ${this.timeout}ms`);
      }
      if (signal?.aborted) throw signal.reason;
      throw new TransportError(
        `Failed to reach PluralKit at ${this.baseUrl}: ${getErrorMessage(err)}`,
        0,
        err,
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
