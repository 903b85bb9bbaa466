/**
 * @pkv2/core — Record Types
 *
 * Decoded shapes of the PluralKit v2 models. Field names keep the API's
 * snake_case wire names so a decoded record can be sent back unchanged.
 */

import type { AUTOPROXY_MODES, PRIVACY_LEVELS } from './constants.js';

// ─── Scalars ───────────────────────────────────────────────────────

/** Discord snowflake (exceeds Number.MAX_SAFE_INTEGER) */
export type Snowflake = bigint;

/** Calendar date without time zone, e.g. a member birthday */
export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
}

/** Short 5/6-character id, UUID, Discord account id, or "@me" */
export type SystemRef = string;

/** Short id or UUID */
export type EntityRef = string;

// ─── Enums ─────────────────────────────────────────────────────────

export type Privacy = (typeof PRIVACY_LEVELS)[number];

export type AutoproxyMode = (typeof AUTOPROXY_MODES)[number];

// ─── Systems ───────────────────────────────────────────────────────

export interface ProxyTag {
  prefix?: string | null;
  suffix?: string | null;
}

export interface SystemPrivacy {
  description_privacy: Privacy;
  pronoun_privacy: Privacy;
  member_list_privacy: Privacy;
  group_list_privacy: Privacy;
  front_privacy: Privacy;
  front_history_privacy: Privacy;
}

export interface System {
  id: string;
  uuid: string;
  name?: string | null;
  description?: string | null;
  tag?: string | null;
  pronouns?: string | null;
  avatar_url?: string | null;
  banner?: string | null;
  color?: string | null;
  webhook_url?: string | null;
  created: Date;
  /** Only present when the caller owns the system */
  privacy?: SystemPrivacy | null;
}

export interface SystemSettings {
  timezone: string;
  pings_enabled: boolean;
  /** Minutes; null means the server default */
  latch_timeout?: number | null;
  member_default_private: boolean;
  group_default_private: boolean;
  show_private_info: boolean;
  member_limit: number;
  group_limit: number;
}

export interface SystemGuildSettings {
  guild_id: Snowflake;
  proxying_enabled: boolean;
  tag?: string | null;
  tag_enabled: boolean;
}

export interface AutoproxySettings {
  autoproxy_mode: AutoproxyMode;
  autoproxy_member?: string | null;
  last_latch_timestamp?: Date | null;
}

// ─── Members ───────────────────────────────────────────────────────

export interface MemberPrivacy {
  visibility: Privacy;
  name_privacy: Privacy;
  description_privacy: Privacy;
  birthday_privacy: Privacy;
  pronoun_privacy: Privacy;
  avatar_privacy: Privacy;
  metadata_privacy: Privacy;
  proxy_privacy: Privacy;
}

export interface Member {
  id: string;
  uuid: string;
  /** Owning system id */
  system?: string;
  name: string;
  display_name?: string | null;
  color?: string | null;
  birthday?: CalendarDate | null;
  pronouns?: string | null;
  avatar_url?: string | null;
  webhook_avatar_url?: string | null;
  banner?: string | null;
  description?: string | null;
  created: Date;
  proxy_tags: ProxyTag[];
  keep_proxy: boolean;
  tts: boolean;
  autoproxy_enabled: boolean;
  message_count?: number | null;
  last_message_timestamp?: Date | null;
  privacy?: MemberPrivacy | null;
}

export interface MemberGuildSettings {
  guild_id: Snowflake;
  display_name?: string | null;
  avatar_url?: string | null;
  keep_proxy?: boolean | null;
}

// ─── Groups ────────────────────────────────────────────────────────

export interface GroupPrivacy {
  name_privacy: Privacy;
  description_privacy: Privacy;
  icon_privacy: Privacy;
  list_privacy: Privacy;
  metadata_privacy: Privacy;
  visibility: Privacy;
}

export interface Group {
  id: string;
  uuid: string;
  system?: string;
  name: string;
  display_name?: string | null;
  description?: string | null;
  icon?: string | null;
  banner?: string | null;
  color?: string | null;
  created: Date;
  privacy?: GroupPrivacy | null;
  /** Member ids, only when listed with members */
  members?: string[];
}

// ─── Switches & messages ───────────────────────────────────────────

export interface Switch {
  id: string;
  timestamp: Date;
  /** Member ids, or full members for the fronters endpoint */
  members: string[] | Member[];
}

export interface Message {
  timestamp: Date;
  id: Snowflake;
  original: Snowflake;
  sender: Snowflake;
  channel: Snowflake;
  guild: Snowflake;
  system?: System | null;
  member?: Member | null;
}

// ─── Errors ────────────────────────────────────────────────────────

export interface SubError {
  /** Field the error refers to, when the API keyed it */
  field?: string;
  message: string;
  max_length?: number | null;
  actual_length?: number | null;
}

/** Decoded API error body; http_code always mirrors the transport status */
export interface ErrorResponse {
  http_code: number;
  code: number;
  message: string;
  errors: SubError[];
  retry_after?: number | null;
}

// ─── Update payloads ───────────────────────────────────────────────

/**
 * Update shape for PATCH endpoints. A property left out (or undefined) is not
 * sent and leaves the field unchanged; `null` is sent and clears it.
 */
export type Patch<T> = { [K in keyof T]?: T[K] | null };

export type SystemPatch = Patch<
  Pick<System, 'name' | 'description' | 'tag' | 'pronouns' | 'avatar_url' | 'banner' | 'color'>
> & {
  privacy?: Partial<SystemPrivacy>;
};

export type SystemSettingsPatch = Patch<
  Pick<
    SystemSettings,
    | 'timezone'
    | 'pings_enabled'
    | 'latch_timeout'
    | 'member_default_private'
    | 'group_default_private'
    | 'show_private_info'
  >
>;

export type SystemGuildSettingsPatch = Patch<
  Pick<SystemGuildSettings, 'proxying_enabled' | 'tag' | 'tag_enabled'>
>;

export type AutoproxySettingsPatch = Patch<
  Pick<AutoproxySettings, 'autoproxy_mode' | 'autoproxy_member'>
>;

export type MemberPatch = Patch<
  Pick<
    Member,
    | 'name'
    | 'display_name'
    | 'color'
    | 'birthday'
    | 'pronouns'
    | 'avatar_url'
    | 'webhook_avatar_url'
    | 'banner'
    | 'description'
    | 'proxy_tags'
    | 'keep_proxy'
    | 'tts'
    | 'autoproxy_enabled'
  >
> & {
  privacy?: Partial<MemberPrivacy>;
};

export type MemberInput = MemberPatch & { name: string };

export type MemberGuildSettingsPatch = Patch<
  Pick<MemberGuildSettings, 'display_name' | 'avatar_url' | 'keep_proxy'>
>;

export type GroupPatch = Patch<
  Pick<Group, 'name' | 'display_name' | 'description' | 'icon' | 'banner' | 'color'>
> & {
  privacy?: Partial<GroupPrivacy>;
};

export type GroupInput = GroupPatch & { name: string };

export interface SwitchInput {
  /** Member refs; an empty list registers a switch-out */
  members: EntityRef[];
  timestamp?: Date;
}
