import { describe, it, expect } from 'vitest';
import { DecodeError } from '../errors.js';
import { decode, decodeBody, decodeList, decodeListBody, parseJson } from '../mapper.js';
import { toWirePayload } from '../encode.js';
import type { Member } from '../types.js';

function rawMember(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'abcde',
    uuid: '6f1f6c4e-5b0c-4c55-9b8e-0a4a7e7f2f10',
    system: 'sysab',
    name: 'Ada',
    created: '2022-03-04T05:06:07.000Z',
    proxy_tags: [{ prefix: 'a:', suffix: null }],
    ...overrides,
  };
}

function rawSystem(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'sysab',
    uuid: '0b8a0a31-0f9c-4e8a-a7a7-3a6f4bfa1d22',
    name: 'Test System',
    tag: null,
    created: '2021-01-02T03:04:05.000Z',
    ...overrides,
  };
}

function expectDecodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(DecodeError);
    if (err instanceof DecodeError) return err;
  }
  throw new Error('expected a DecodeError');
}

describe('decode', () => {
  it('decodes a member with dates, nested tags and defaults', () => {
    const member = decode(rawMember(), 'member');
    expect(member.id).toBe('abcde');
    expect(member.name).toBe('Ada');
    expect(member.created).toEqual(new Date(Date.UTC(2022, 2, 4, 5, 6, 7)));
    expect(member.proxy_tags).toEqual([{ prefix: 'a:', suffix: null }]);
    expect(member.keep_proxy).toBe(false);
    expect(member.tts).toBe(false);
    expect(member.autoproxy_enabled).toBe(true);
    expect(member.privacy).toBeUndefined();
  });

  it('keeps explicit nulls on optional fields', () => {
    const system = decode(rawSystem(), 'system');
    expect(system.tag).toBeNull();
    expect(system.description).toBeUndefined();
  });

  it('drops fields the schema does not declare', () => {
    const system = decode(rawSystem({ future_field: 1 }), 'system');
    expect('future_field' in system).toBe(false);
  });

  it('fails with missing_field when a required field is absent', () => {
    const { name: _name, ...withoutName } = rawMember();
    const err = expectDecodeError(() => decode(withoutName, 'member'));
    expect(err.kind).toBe('missing_field');
    expect(err.path).toBe('name');
    expect(err.recordKind).toBe('member');
    expect(err.message).toBe("Missing required field 'name' in member");
  });

  it('treats a present null on a required field as an invalid value', () => {
    const err = expectDecodeError(() => decode(rawMember({ name: null }), 'member'));
    expect(err.kind).toBe('invalid_value');
    expect(err.path).toBe('name');
  });

  it('fills absent fields from overrides', () => {
    const settings = decode(
      { proxying_enabled: false, tag: '| TS', tag_enabled: true },
      'system_guild_settings',
      { guild_id: '123456789012345678' },
    );
    expect(settings.guild_id).toBe(123456789012345678n);
    expect(settings.proxying_enabled).toBe(false);
  });

  it('fails without the override when the field is required', () => {
    const err = expectDecodeError(() => decode({ proxying_enabled: false }, 'system_guild_settings'));
    expect(err.kind).toBe('missing_field');
    expect(err.path).toBe('guild_id');
  });

  it('prefers payload values over overrides', () => {
    const settings = decode({ guild_id: '5' }, 'system_guild_settings', { guild_id: '9' });
    expect(settings.guild_id).toBe(5n);
  });

  it('fails with unknown_enum for undeclared wire strings', () => {
    const err = expectDecodeError(() =>
      decode(rawMember({ privacy: { visibility: 'secret' } }), 'member'),
    );
    expect(err.kind).toBe('unknown_enum');
    expect(err.path).toBe('privacy.visibility');
  });

  it('decodes every declared privacy variant', () => {
    for (const value of ['public', 'private'] as const) {
      const privacy = decode({ visibility: value }, 'member_privacy');
      expect(privacy.visibility).toBe(value);
      expect(privacy.name_privacy).toBe('public');
    }
  });

  it('decodes every autoproxy mode and rejects others', () => {
    for (const mode of ['off', 'front', 'latch', 'member'] as const) {
      expect(decode({ autoproxy_mode: mode }, 'autoproxy_settings').autoproxy_mode).toBe(mode);
    }
    const err = expectDecodeError(() => decode({ autoproxy_mode: 'always' }, 'autoproxy_settings'));
    expect(err.kind).toBe('unknown_enum');
    expect(err.path).toBe('autoproxy_mode');
  });

  it('fails with malformed_date for bad timestamps', () => {
    const err = expectDecodeError(() => decode(rawMember({ created: 'yesterday' }), 'member'));
    expect(err.kind).toBe('malformed_date');
    expect(err.path).toBe('created');
    expect(err.message).toBe(
      "Malformed date at 'created' in member: Invalid ISO-8601 date-time: 'yesterday'",
    );
  });

  it('parses birthdays into calendar dates', () => {
    const member = decode(rawMember({ birthday: '0004-12-25' }), 'member');
    expect(member.birthday).toEqual({ year: 4, month: 12, day: 25 });
  });

  it('rejects a non-object payload at the root', () => {
    const err = expectDecodeError(() => decode('not a member', 'member'));
    expect(err.kind).toBe('invalid_value');
    expect(err.path).toBe('');
  });

  describe('switch members', () => {
    it('decodes a list of member ids', () => {
      const sw = decode(
        { id: 'sw-1', timestamp: '2024-01-01T00:00:00Z', members: ['abcde', 'fghij'] },
        'switch',
      );
      expect(sw.members).toEqual(['abcde', 'fghij']);
      expect(sw.timestamp).toEqual(new Date(Date.UTC(2024, 0, 1)));
    });

    it('decodes a list of full members', () => {
      const sw = decode(
        { id: 'sw-1', timestamp: '2024-01-01T00:00:00Z', members: [rawMember()] },
        'switch',
      );
      const [first] = sw.members;
      expect(typeof first).toBe('object');
      expect((sw.members as Member[])[0]?.name).toBe('Ada');
    });

    it('reports the deepest failure inside a member list', () => {
      const { name: _name, ...withoutName } = rawMember();
      const err = expectDecodeError(() =>
        decode({ id: 'sw-1', timestamp: '2024-01-01T00:00:00Z', members: [withoutName] }, 'switch'),
      );
      expect(err.kind).toBe('missing_field');
      expect(err.path).toBe('members.0.name');
    });
  });

  it('decodes messages with snowflakes and nested records', () => {
    const message = decode(
      {
        timestamp: '2023-06-07T08:09:10.000Z',
        id: '1100000000000000001',
        original: '1100000000000000000',
        sender: '200000000000000002',
        channel: '300000000000000003',
        guild: '400000000000000004',
        system: rawSystem(),
        member: rawMember(),
      },
      'message',
    );
    expect(message.id).toBe(1100000000000000001n);
    expect(message.guild).toBe(400000000000000004n);
    expect(message.system?.name).toBe('Test System');
    expect(message.member?.name).toBe('Ada');
  });

  it('round-trips decoded values back to their wire form', () => {
    const raw = rawMember({
      birthday: '0004-02-29',
      color: 'ff00ff',
      privacy: { visibility: 'private' },
    });
    const wire = toWirePayload(decode(raw, 'member'));
    expect(wire['id']).toBe(raw['id']);
    expect(wire['name']).toBe(raw['name']);
    expect(wire['created']).toBe(raw['created']);
    expect(wire['birthday']).toBe('0004-02-29');
    expect(wire['color']).toBe('ff00ff');
    expect(wire['proxy_tags']).toEqual([{ prefix: 'a:', suffix: null }]);
    expect(wire['privacy']).toMatchObject({ visibility: 'private' });
  });
});

describe('decodeList', () => {
  it('decodes each element', () => {
    const members = decodeList([rawMember(), rawMember({ id: 'fghij', name: 'Grace' })], 'member');
    expect(members.map((m) => m.name)).toEqual(['Ada', 'Grace']);
  });

  it('prefixes error paths with the element index', () => {
    const err = expectDecodeError(() =>
      decodeList([rawMember(), rawMember({ created: 'soon' })], 'member'),
    );
    expect(err.kind).toBe('malformed_date');
    expect(err.path).toBe('1.created');
    expect(err.message.startsWith('[1] ')).toBe(true);
  });

  it('rejects a payload that is not a list', () => {
    const err = expectDecodeError(() => decodeList(rawMember(), 'member'));
    expect(err.kind).toBe('invalid_value');
    expect(err.message).toBe('Expected a list of member');
  });
});

describe('body helpers', () => {
  it('parses and decodes a response body', () => {
    const system = decodeBody(JSON.stringify(rawSystem()), 'system');
    expect(system.id).toBe('sysab');
  });

  it('parses and decodes a list body', () => {
    expect(decodeListBody('[]', 'group')).toEqual([]);
  });

  it('fails with malformed_json for invalid JSON', () => {
    const err = expectDecodeError(() => parseJson('{"id": '));
    expect(err.kind).toBe('malformed_json');
  });
});
