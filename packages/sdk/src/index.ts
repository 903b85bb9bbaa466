/**
 * @pkv2/sdk — Programmatic client for the PluralKit v2 API
 */

// Client
export { PluralKitClient } from './client.js';
export type { PluralKitClientOptions, SwitchListOptions, GroupListOptions } from './client.js';

// Request Executor
export { RequestExecutor, DEFAULT_USER_AGENT } from './executor.js';
export type {
  ExecuteOptions,
  HttpMethod,
  QueryValue,
  RateLimitConfig,
  RawResponse,
  RequestExecutorOptions,
} from './executor.js';

// Rate Limiter
export { RateLimiter } from './rate-limiter.js';
export type { RateLimitPermit } from './rate-limiter.js';

// Configuration
export { getClientConfig } from './config.js';
export type { ClientConfig } from './config.js';

// Logging
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// Errors
export {
  PKError,
  CapabilityError,
  ClientClosedError,
  TransportError,
  RateLimitedError,
  HttpError,
  BadRequestError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  DecodeError,
  EncodeError,
  isNotFound,
} from './errors.js';
export type { DecodeErrorKind } from './errors.js';
export { classifyHttpError, httpErrorFromResponse } from './error-classifier.js';

// Re-export core types consumers will need
export type {
  AutoproxyMode,
  AutoproxySettings,
  AutoproxySettingsPatch,
  CalendarDate,
  EntityRef,
  ErrorResponse,
  Group,
  GroupInput,
  GroupPatch,
  GroupPrivacy,
  Member,
  MemberGuildSettings,
  MemberGuildSettingsPatch,
  MemberInput,
  MemberPatch,
  MemberPrivacy,
  Message,
  Patch,
  Privacy,
  ProxyTag,
  Snowflake,
  SubError,
  Switch,
  SwitchInput,
  System,
  SystemGuildSettings,
  SystemGuildSettingsPatch,
  SystemPatch,
  SystemPrivacy,
  SystemRef,
  SystemSettings,
  SystemSettingsPatch,
} from '@pkv2/core';
