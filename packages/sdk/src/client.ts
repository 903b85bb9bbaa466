/**
 * @pkv2/sdk — PluralKitClient
 *
 * Typed client for the PluralKit v2 REST API. Each method is a thin binding
 * of one endpoint onto the request executor and the object mapper.
 */

import {
  MAX_SWITCH_PAGE_SIZE,
  decodeBody,
  decodeListBody,
  type AutoproxySettings,
  type AutoproxySettingsPatch,
  type DecodeOverrides,
  type EntityRef,
  type Group,
  type GroupInput,
  type GroupPatch,
  type Member,
  type MemberGuildSettings,
  type MemberGuildSettingsPatch,
  type MemberInput,
  type MemberPatch,
  type Message,
  type RecordKind,
  type RecordTypes,
  type Snowflake,
  type Switch,
  type SwitchInput,
  type System,
  type SystemGuildSettings,
  type SystemGuildSettingsPatch,
  type SystemPatch,
  type SystemRef,
  type SystemSettings,
  type SystemSettingsPatch,
} from '@pkv2/core';
import { getClientConfig } from './config.js';
import { isNotFound } from './errors.js';
import {
  RequestExecutor,
  type ExecuteOptions,
  type HttpMethod,
  type RequestExecutorOptions,
} from './executor.js';

// ─── Types ──────────────────────────────────────────────────────────

export type PluralKitClientOptions = RequestExecutorOptions;

export interface SwitchListOptions {
  /** Only switches strictly before this instant */
  before?: Date;
  /** Page size, 1-100 (server default 100) */
  limit?: number;
}

export interface GroupListOptions {
  /** Include member ids on each group */
  withMembers?: boolean;
}

interface CallOptions extends ExecuteOptions {
  overrides?: DecodeOverrides;
}

/** Encode a path segment; keeps the leading "@" of "@me" readable */
function segment(ref: string | Snowflake): string {
  return encodeURIComponent(String(ref)).replace(/^%40/, '@');
}

// ─── Client ─────────────────────────────────────────────────────────

export class PluralKitClient {
  readonly executor: RequestExecutor;

  /**
   * Create a client from environment variables.
   * - `PLURALKIT_TOKEN` → token
   * - `PLURALKIT_API_URL` → baseUrl
   * - `PLURALKIT_TIMEOUT_MS`, `PLURALKIT_RATE_LIMIT_MAX`, `PLURALKIT_RATE_LIMIT_WINDOW_MS`
   * Explicit overrides take priority over env vars.
   */
  static fromEnv(overrides?: Partial<PluralKitClientOptions>): PluralKitClient {
    const config = getClientConfig();
    return new PluralKitClient({
      ...overrides,
      token: overrides?.token ?? config.token,
      baseUrl: overrides?.baseUrl ?? config.baseUrl,
      timeout: overrides?.timeout ?? config.timeout,
      rateLimit: { ...config.rateLimit, ...overrides?.rateLimit },
    });
  }

  constructor(options: PluralKitClientOptions = {}) {
    this.executor = new RequestExecutor(options);
  }

  /** Whether a token was supplied */
  get authenticated(): boolean {
    return this.executor.authenticated;
  }

  /** Release the client. Every later call fails with ClientClosedError. */
  close(): void {
    this.executor.close();
  }

  // ─── Systems ─────────────────────────────────────────────

  /**
   * Get a system by short id, UUID, linked Discord account id, or "@me".
   * Resolves to null when the system does not exist.
   */
  async getSystem(ref: SystemRef = '@me'): Promise<System | null> {
    return this.orNull(this.one('GET', `systems/${segment(ref)}`, 'system'));
  }

  async updateSystem(ref: SystemRef, patch: SystemPatch): Promise<System> {
    return this.one('PATCH', `systems/${segment(ref)}`, 'system', {
      payload: patch,
      requiresAuth: true,
      operation: 'updateSystem',
    });
  }

  async getSystemSettings(ref: SystemRef = '@me'): Promise<SystemSettings> {
    return this.one('GET', `systems/${segment(ref)}/settings`, 'system_settings');
  }

  async updateSystemSettings(ref: SystemRef, patch: SystemSettingsPatch): Promise<SystemSettings> {
    return this.one('PATCH', `systems/${segment(ref)}/settings`, 'system_settings', {
      payload: patch,
      requiresAuth: true,
      operation: 'updateSystemSettings',
    });
  }

  /**
   * Get the authenticated system's settings for one guild. The response does
   * not echo the guild id, so it is filled in from the argument.
   */
  async getSystemGuildSettings(guildId: Snowflake | string): Promise<SystemGuildSettings> {
    return this.one('GET', `systems/@me/guilds/${segment(guildId)}`, 'system_guild_settings', {
      requiresAuth: true,
      operation: 'getSystemGuildSettings',
      overrides: { guild_id: String(guildId) },
    });
  }

  async updateSystemGuildSettings(
    guildId: Snowflake | string,
    patch: SystemGuildSettingsPatch,
  ): Promise<SystemGuildSettings> {
    return this.one('PATCH', `systems/@me/guilds/${segment(guildId)}`, 'system_guild_settings', {
      payload: patch,
      requiresAuth: true,
      operation: 'updateSystemGuildSettings',
      overrides: { guild_id: String(guildId) },
    });
  }

  async getAutoproxySettings(guildId: Snowflake | string): Promise<AutoproxySettings> {
    return this.one('GET', 'systems/@me/autoproxy', 'autoproxy_settings', {
      query: { guild_id: guildId },
      requiresAuth: true,
      operation: 'getAutoproxySettings',
    });
  }

  async updateAutoproxySettings(
    guildId: Snowflake | string,
    patch: AutoproxySettingsPatch,
  ): Promise<AutoproxySettings> {
    return this.one('PATCH', 'systems/@me/autoproxy', 'autoproxy_settings', {
      query: { guild_id: guildId },
      payload: patch,
      requiresAuth: true,
      operation: 'updateAutoproxySettings',
    });
  }

  // ─── Members ─────────────────────────────────────────────

  async getSystemMembers(ref: SystemRef = '@me'): Promise<Member[]> {
    return this.many('GET', `systems/${segment(ref)}/members`, 'member');
  }

  async createMember(input: MemberInput): Promise<Member> {
    return this.one('POST', 'members', 'member', {
      payload: input,
      requiresAuth: true,
      operation: 'createMember',
    });
  }

  /** Resolves to null when the member does not exist. */
  async getMember(ref: EntityRef): Promise<Member | null> {
    return this.orNull(this.one('GET', `members/${segment(ref)}`, 'member'));
  }

  async updateMember(ref: EntityRef, patch: MemberPatch): Promise<Member> {
    return this.one('PATCH', `members/${segment(ref)}`, 'member', {
      payload: patch,
      requiresAuth: true,
      operation: 'updateMember',
    });
  }

  async deleteMember(ref: EntityRef): Promise<void> {
    await this.none('DELETE', `members/${segment(ref)}`, {
      requiresAuth: true,
      operation: 'deleteMember',
    });
  }

  async getMemberGroups(ref: EntityRef): Promise<Group[]> {
    return this.many('GET', `members/${segment(ref)}/groups`, 'group');
  }

  async addMemberGroups(ref: EntityRef, groups: EntityRef[]): Promise<void> {
    await this.editMemberGroups(ref, 'add', groups);
  }

  async removeMemberGroups(ref: EntityRef, groups: EntityRef[]): Promise<void> {
    await this.editMemberGroups(ref, 'remove', groups);
  }

  /** Replace the member's group list */
  async overwriteMemberGroups(ref: EntityRef, groups: EntityRef[]): Promise<void> {
    await this.editMemberGroups(ref, 'overwrite', groups);
  }

  async getMemberGuildSettings(
    ref: EntityRef,
    guildId: Snowflake | string,
  ): Promise<MemberGuildSettings> {
    return this.one('GET', `members/${segment(ref)}/guilds/${segment(guildId)}`, 'member_guild_settings', {
      requiresAuth: true,
      operation: 'getMemberGuildSettings',
      overrides: { guild_id: String(guildId) },
    });
  }

  async updateMemberGuildSettings(
    ref: EntityRef,
    guildId: Snowflake | string,
    patch: MemberGuildSettingsPatch,
  ): Promise<MemberGuildSettings> {
    return this.one('PATCH', `members/${segment(ref)}/guilds/${segment(guildId)}`, 'member_guild_settings', {
      payload: patch,
      requiresAuth: true,
      operation: 'updateMemberGuildSettings',
      overrides: { guild_id: String(guildId) },
    });
  }

  // ─── Groups ──────────────────────────────────────────────

  async getSystemGroups(ref: SystemRef = '@me', options: GroupListOptions = {}): Promise<Group[]> {
    return this.many('GET', `systems/${segment(ref)}/groups`, 'group', {
      query: { with_members: options.withMembers ? true : undefined },
    });
  }

  async createGroup(input: GroupInput): Promise<Group> {
    return this.one('POST', 'groups', 'group', {
      payload: input,
      requiresAuth: true,
      operation: 'createGroup',
    });
  }

  /** Resolves to null when the group does not exist. */
  async getGroup(ref: EntityRef): Promise<Group | null> {
    return this.orNull(this.one('GET', `groups/${segment(ref)}`, 'group'));
  }

  async updateGroup(ref: EntityRef, patch: GroupPatch): Promise<Group> {
    return this.one('PATCH', `groups/${segment(ref)}`, 'group', {
      payload: patch,
      requiresAuth: true,
      operation: 'updateGroup',
    });
  }

  async deleteGroup(ref: EntityRef): Promise<void> {
    await this.none('DELETE', `groups/${segment(ref)}`, {
      requiresAuth: true,
      operation: 'deleteGroup',
    });
  }

  async getGroupMembers(ref: EntityRef): Promise<Member[]> {
    return this.many('GET', `groups/${segment(ref)}/members`, 'member');
  }

  async addGroupMembers(ref: EntityRef, members: EntityRef[]): Promise<void> {
    await this.editGroupMembers(ref, 'add', members);
  }

  async removeGroupMembers(ref: EntityRef, members: EntityRef[]): Promise<void> {
    await this.editGroupMembers(ref, 'remove', members);
  }

  /** Replace the group's member list */
  async overwriteGroupMembers(ref: EntityRef, members: EntityRef[]): Promise<void> {
    await this.editGroupMembers(ref, 'overwrite', members);
  }

  // ─── Switches ────────────────────────────────────────────

  /**
   * List switches, newest first. Page backwards by passing the timestamp of
   * the last switch received as `before`.
   */
  async getSystemSwitches(ref: SystemRef = '@me', options: SwitchListOptions = {}): Promise<Switch[]> {
    const { before, limit } = options;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1 || limit > MAX_SWITCH_PAGE_SIZE)) {
      throw new RangeError(`limit must be an integer between 1 and ${MAX_SWITCH_PAGE_SIZE}, got ${limit}`);
    }
    return this.many('GET', `systems/${segment(ref)}/switches`, 'switch', {
      query: { before: before?.toISOString(), limit },
    });
  }

  /** Current fronters with full member records; null when no switch is registered. */
  async getFronters(ref: SystemRef = '@me'): Promise<Switch | null> {
    const { body } = await this.executor.execute('GET', `systems/${segment(ref)}/fronters`);
    if (body.trim() === '') return null;
    return decodeBody(body, 'switch');
  }

  async createSwitch(ref: SystemRef, input: SwitchInput): Promise<Switch> {
    return this.one('POST', `systems/${segment(ref)}/switches`, 'switch', {
      payload: input,
      requiresAuth: true,
      operation: 'createSwitch',
    });
  }

  /** Resolves to null when the switch does not exist. */
  async getSwitch(ref: SystemRef, switchId: string): Promise<Switch | null> {
    return this.orNull(this.one('GET', `systems/${segment(ref)}/switches/${segment(switchId)}`, 'switch'));
  }

  /** Move a switch to another point in time */
  async updateSwitch(ref: SystemRef, switchId: string, timestamp: Date): Promise<Switch> {
    return this.one('PATCH', `systems/${segment(ref)}/switches/${segment(switchId)}`, 'switch', {
      payload: { timestamp },
      requiresAuth: true,
      operation: 'updateSwitch',
    });
  }

  async updateSwitchMembers(ref: SystemRef, switchId: string, members: EntityRef[]): Promise<Switch> {
    return this.one('PATCH', `systems/${segment(ref)}/switches/${segment(switchId)}/members`, 'switch', {
      payload: members,
      requiresAuth: true,
      operation: 'updateSwitchMembers',
    });
  }

  async deleteSwitch(ref: SystemRef, switchId: string): Promise<void> {
    await this.none('DELETE', `systems/${segment(ref)}/switches/${segment(switchId)}`, {
      requiresAuth: true,
      operation: 'deleteSwitch',
    });
  }

  // ─── Messages ────────────────────────────────────────────

  /**
   * Look up a proxied message by its id or the id of the original trigger
   * message. Resolves to null when PluralKit has no record of it.
   */
  async getMessage(messageId: Snowflake | string): Promise<Message | null> {
    return this.orNull(this.one('GET', `messages/${segment(messageId)}`, 'message'));
  }

  // ─── Internal ────────────────────────────────────────────

  private async one<K extends RecordKind>(
    method: HttpMethod,
    path: string,
    kind: K,
    options: CallOptions = {},
  ): Promise<RecordTypes[K]> {
    const { overrides, ...execOptions } = options;
    const { body } = await this.executor.execute(method, path, execOptions);
    return decodeBody(body, kind, overrides);
  }

  private async many<K extends RecordKind>(
    method: HttpMethod,
    path: string,
    kind: K,
    options: CallOptions = {},
  ): Promise<RecordTypes[K][]> {
    const { overrides, ...execOptions } = options;
    const { body } = await this.executor.execute(method, path, execOptions);
    return decodeListBody(body, kind, overrides);
  }

  private async none(method: HttpMethod, path: string, options: ExecuteOptions = {}): Promise<void> {
    await this.executor.execute(method, path, options);
  }

  /** 404 on a single-resource lookup means "absent", not an error */
  private async orNull<T>(pending: Promise<T>): Promise<T | null> {
    try {
      return await pending;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  private async editMemberGroups(
    ref: EntityRef,
    action: 'add' | 'remove' | 'overwrite',
    groups: EntityRef[],
  ): Promise<void> {
    await this.none('POST', `members/${segment(ref)}/groups/${action}`, {
      payload: groups,
      requiresAuth: true,
      operation: `${action}MemberGroups`,
    });
  }

  private async editGroupMembers(
    ref: EntityRef,
    action: 'add' | 'remove' | 'overwrite',
    members: EntityRef[],
  ): Promise<void> {
    await this.none('POST', `groups/${segment(ref)}/members/${action}`, {
      payload: members,
      requiresAuth: true,
      operation: `${action}GroupMembers`,
    });
  }
}
