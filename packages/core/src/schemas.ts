/**
 * @pkv2/core — Zod Record Schemas
 *
 * One schema per record kind, reached through `recordSchemas`. Each schema
 * owns its coercions (digit strings to integers, snowflakes to bigint,
 * ISO-8601 text to dates) and the defaults the API leaves implicit.
 */
import { z } from 'zod';
import { AUTOPROXY_MODES, PRIVACY_LEVELS } from './constants.js';
import { parseCalendarDate, parseInstant } from './dates.js';
import type {
  AutoproxySettings,
  CalendarDate,
  ErrorResponse,
  Group,
  GroupPrivacy,
  Member,
  MemberGuildSettings,
  MemberPrivacy,
  Message,
  ProxyTag,
  Snowflake,
  SubError,
  Switch,
  System,
  SystemGuildSettings,
  SystemPrivacy,
  SystemSettings,
} from './types.js';

type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ─── Scalars ────────────────────────────────────────────────────────

export const privacySchema = z.enum(PRIVACY_LEVELS);

export const autoproxyModeSchema = z.enum(AUTOPROXY_MODES);

/** Integer, also accepted as a string of digits */
export const intSchema: RecordSchema<number> = z.union([
  z.number().int(),
  z.string().regex(/^-?\d+$/).transform(Number),
]);

/** Discord id as digits or a non-negative integer */
export const snowflakeSchema: RecordSchema<Snowflake> = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

/** ISO-8601 date-time */
export const instantSchema: RecordSchema<Date> = z.string().transform((text, ctx) => {
  const date = parseInstant(text);
  if (date === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ISO-8601 date-time: '${text}'`,
      params: { kind: 'malformed_date' },
    });
    return z.NEVER;
  }
  return date;
});

/** `YYYY-MM-DD` */
export const calendarDateSchema: RecordSchema<CalendarDate> = z.string().transform((text, ctx) => {
  const date = parseCalendarDate(text);
  if (date === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid calendar date: '${text}'`,
      params: { kind: 'malformed_date' },
    });
    return z.NEVER;
  }
  return date;
});

const privacyField = privacySchema.default('public');

// ─── Systems ────────────────────────────────────────────────────────

export const proxyTagSchema: RecordSchema<ProxyTag> = z.object({
  prefix: z.string().nullish(),
  suffix: z.string().nullish(),
});

export const systemPrivacySchema: RecordSchema<SystemPrivacy> = z.object({
  description_privacy: privacyField,
  pronoun_privacy: privacyField,
  member_list_privacy: privacyField,
  group_list_privacy: privacyField,
  front_privacy: privacyField,
  front_history_privacy: privacyField,
});

export const systemSchema: RecordSchema<System> = z.object({
  id: z.string(),
  uuid: z.string(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  tag: z.string().nullish(),
  pronouns: z.string().nullish(),
  avatar_url: z.string().nullish(),
  banner: z.string().nullish(),
  color: z.string().nullish(),
  webhook_url: z.string().nullish(),
  created: instantSchema,
  privacy: systemPrivacySchema.nullish(),
});

export const systemSettingsSchema: RecordSchema<SystemSettings> = z.object({
  timezone: z.string().default('UTC'),
  pings_enabled: z.boolean().default(false),
  latch_timeout: intSchema.nullish(),
  member_default_private: z.boolean().default(false),
  group_default_private: z.boolean().default(false),
  show_private_info: z.boolean().default(false),
  member_limit: intSchema,
  group_limit: intSchema,
});

export const systemGuildSettingsSchema: RecordSchema<SystemGuildSettings> = z.object({
  guild_id: snowflakeSchema,
  proxying_enabled: z.boolean().default(true),
  tag: z.string().nullish(),
  tag_enabled: z.boolean().default(true),
});

export const autoproxySettingsSchema: RecordSchema<AutoproxySettings> = z.object({
  autoproxy_mode: autoproxyModeSchema,
  autoproxy_member: z.string().nullish(),
  last_latch_timestamp: instantSchema.nullish(),
});

// ─── Members ────────────────────────────────────────────────────────

export const memberPrivacySchema: RecordSchema<MemberPrivacy> = z.object({
  visibility: privacyField,
  name_privacy: privacyField,
  description_privacy: privacyField,
  birthday_privacy: privacyField,
  pronoun_privacy: privacyField,
  avatar_privacy: privacyField,
  metadata_privacy: privacyField,
  proxy_privacy: privacyField,
});

export const memberSchema: RecordSchema<Member> = z.object({
  id: z.string(),
  uuid: z.string(),
  system: z.string().optional(),
  name: z.string(),
  display_name: z.string().nullish(),
  color: z.string().nullish(),
  birthday: calendarDateSchema.nullish(),
  pronouns: z.string().nullish(),
  avatar_url: z.string().nullish(),
  webhook_avatar_url: z.string().nullish(),
  banner: z.string().nullish(),
  description: z.string().nullish(),
  created: instantSchema,
  proxy_tags: z.array(proxyTagSchema).default([]),
  keep_proxy: z.boolean().default(false),
  tts: z.boolean().default(false),
  autoproxy_enabled: z.boolean().default(true),
  message_count: intSchema.nullish(),
  last_message_timestamp: instantSchema.nullish(),
  privacy: memberPrivacySchema.nullish(),
});

export const memberGuildSettingsSchema: RecordSchema<MemberGuildSettings> = z.object({
  guild_id: snowflakeSchema,
  display_name: z.string().nullish(),
  avatar_url: z.string().nullish(),
  keep_proxy: z.boolean().nullish(),
});

// ─── Groups ─────────────────────────────────────────────────────────

export const groupPrivacySchema: RecordSchema<GroupPrivacy> = z.object({
  name_privacy: privacyField,
  description_privacy: privacyField,
  icon_privacy: privacyField,
  list_privacy: privacyField,
  metadata_privacy: privacyField,
  visibility: privacyField,
});

export const groupSchema: RecordSchema<Group> = z.object({
  id: z.string(),
  uuid: z.string(),
  system: z.string().optional(),
  name: z.string(),
  display_name: z.string().nullish(),
  description: z.string().nullish(),
  icon: z.string().nullish(),
  banner: z.string().nullish(),
  color: z.string().nullish(),
  created: instantSchema,
  privacy: groupPrivacySchema.nullish(),
  members: z.array(z.string()).optional(),
});

// ─── Switches & messages ────────────────────────────────────────────

export const switchSchema: RecordSchema<Switch> = z.object({
  id: z.string(),
  timestamp: instantSchema,
  members: z.union([z.array(z.string()), z.array(memberSchema)]),
});

export const messageSchema: RecordSchema<Message> = z.object({
  timestamp: instantSchema,
  id: snowflakeSchema,
  original: snowflakeSchema,
  sender: snowflakeSchema,
  channel: snowflakeSchema,
  guild: snowflakeSchema,
  system: systemSchema.nullish(),
  member: memberSchema.nullish(),
});

// ─── Errors ─────────────────────────────────────────────────────────

const subErrorSchema = z.object({
  message: z.string(),
  max_length: intSchema.nullish(),
  actual_length: intSchema.nullish(),
});

/** Sub-errors arrive as a list, or keyed by field name */
const subErrorsSchema = z
  .union([z.array(subErrorSchema), z.record(z.array(subErrorSchema))])
  .nullish()
  .transform((value): SubError[] => {
    if (value == null) return [];
    if (Array.isArray(value)) return value;
    return Object.entries(value).flatMap(([field, errors]) =>
      errors.map((error) => ({ field, ...error })),
    );
  });

function errorResponseSchema(defaultHttpCode?: number): RecordSchema<ErrorResponse> {
  return z.object({
    http_code: defaultHttpCode === undefined ? intSchema : intSchema.default(defaultHttpCode),
    code: intSchema.default(0),
    message: z.string(),
    errors: subErrorsSchema,
    retry_after: intSchema.nullish(),
  });
}

export const errorResponseSchemas = {
  error_response: errorResponseSchema(),
  bad_request: errorResponseSchema(400),
  unauthorized: errorResponseSchema(401),
  forbidden: errorResponseSchema(403),
  not_found: errorResponseSchema(404),
};

export type ErrorResponseKind = keyof typeof errorResponseSchemas;

// ─── Registry ───────────────────────────────────────────────────────

/** Decoded type for every registered record kind */
export interface RecordTypes extends Record<ErrorResponseKind, ErrorResponse> {
  proxy_tag: ProxyTag;
  system_privacy: SystemPrivacy;
  system: System;
  system_settings: SystemSettings;
  system_guild_settings: SystemGuildSettings;
  autoproxy_settings: AutoproxySettings;
  member_privacy: MemberPrivacy;
  member: Member;
  member_guild_settings: MemberGuildSettings;
  group_privacy: GroupPrivacy;
  group: Group;
  switch: Switch;
  message: Message;
}

export type RecordKind = keyof RecordTypes;

export const recordSchemas: { readonly [K in RecordKind]: RecordSchema<RecordTypes[K]> } = {
  proxy_tag: proxyTagSchema,
  system_privacy: systemPrivacySchema,
  system: systemSchema,
  system_settings: systemSettingsSchema,
  system_guild_settings: systemGuildSettingsSchema,
  autoproxy_settings: autoproxySettingsSchema,
  member_privacy: memberPrivacySchema,
  member: memberSchema,
  member_guild_settings: memberGuildSettingsSchema,
  group_privacy: groupPrivacySchema,
  group: groupSchema,
  switch: switchSchema,
  message: messageSchema,
  ...errorResponseSchemas,
};

/** Schema used to decode an error body for a given transport status */
export function errorKindForStatus(status: number): ErrorResponseKind {
  switch (status) {
    case 400:
      return 'bad_request';
    case 401:
      return 'unauthorized';
    case 403:
      return 'forbidden';
    case 404:
      return 'not_found';
    default:
      return 'error_response';
  }
}
