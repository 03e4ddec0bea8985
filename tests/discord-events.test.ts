import { describe, it, expect } from 'vitest';

import { Permissions, hasPermissions } from '../src/core/permissions.js';
import { DiscordCache } from '../src/platforms/discord/cache.js';
import { translateDispatch } from '../src/platforms/discord/events.js';
import { computeChannelPermissions } from '../src/platforms/discord/permissions.js';

const author = { id: '300', username: 'alice' };

function guildCreate() {
  return {
    id: '10',
    owner_id: '11',
    roles: [
      { id: '10', permissions: String(Permissions.VIEW_CHANNEL | Permissions.SEND_MESSAGES), position: 0 },
      { id: '20', permissions: String(Permissions.MANAGE_MESSAGES), position: 1 },
    ],
    channels: [
      {
        id: '200',
        type: 0,
        name: 'general',
        permission_overwrites: [{ id: '10', type: 0, allow: '0', deny: String(Permissions.SEND_MESSAGES) }],
      },
      { id: '201', type: 2, name: 'voice' },
    ],
    members: [{ user: author, roles: ['20'] }],
  };
}

describe('translateDispatch', () => {
  it('translates READY', () => {
    const event = translateDispatch('READY', {
      user: { id: '1000', username: 'demo-bot', bot: true },
      application: { id: '2000' },
      guilds: [{ id: '10' }, { id: '11' }],
    }, new DiscordCache());

    expect(event).toEqual({
      type: 'ready',
      ready: { user: { id: '1000', username: 'demo-bot', bot: true }, applicationId: '2000', guildIds: ['10', '11'] },
    });
  });

  it('translates MESSAGE_CREATE with defaults for omitted fields', () => {
    const event = translateDispatch('MESSAGE_CREATE', {
      id: '500',
      channel_id: '200',
      guild_id: '10',
      content: '!ping',
      timestamp: '2024-01-01T00:00:00.000Z',
      author,
    }, new DiscordCache());

    expect(event).toEqual({
      type: 'messageCreate',
      message: {
        id: '500',
        channelId: '200',
        guildId: '10',
        kind: 0,
        content: '!ping',
        tts: false,
        pinned: false,
        timestamp: Date.parse('2024-01-01T00:00:00.000Z'),
        editedTimestamp: null,
        author: { id: '300', username: 'alice', bot: false },
        mentionEveryone: false,
        mentions: [],
        mentionRoles: [],
        attachments: [],
        embeds: [],
      },
    });
  });

  it('keeps MESSAGE_UPDATE partial', () => {
    const event = translateDispatch('MESSAGE_UPDATE', {
      id: '500',
      channel_id: '200',
      content: '!pong',
      edited_timestamp: '2024-01-01T00:01:00.000Z',
    }, new DiscordCache());

    expect(event?.type).toBe('messageUpdate');
    if (event?.type !== 'messageUpdate') return;
    expect(event.update.content).toBe('!pong');
    expect(event.update.editedTimestamp).toBe(Date.parse('2024-01-01T00:01:00.000Z'));
    expect(event.update.author).toBeUndefined();
    expect(event.update.pinned).toBeUndefined();
    expect(event.update.attachments).toBeUndefined();
  });

  it('translates MESSAGE_DELETE', () => {
    expect(translateDispatch('MESSAGE_DELETE', { id: '500', channel_id: '200' }, new DiscordCache())).toEqual({
      type: 'messageDelete',
      channelId: '200',
      messageId: '500',
      guildId: undefined,
    });
  });

  it('fills the cache from GUILD_CREATE', () => {
    const cache = new DiscordCache();
    const event = translateDispatch('GUILD_CREATE', guildCreate(), cache);

    expect(event?.type).toBe('other');
    const guild = cache.getGuild('10');
    expect(guild?.ownerId).toBe('11');
    expect(guild?.roles.get('20')?.permissions).toBe(Permissions.MANAGE_MESSAGES);
    expect(guild?.members.get('300')?.roleIds).toEqual(['20']);
    expect(guild?.channels.get('200')).toEqual({
      type: 'guild',
      id: '200',
      guildId: '10',
      name: 'general',
      permissionOverwrites: [{ id: '10', type: 'role', allow: 0n, deny: Permissions.SEND_MESSAGES }],
    });
    expect(guild?.channels.get('201')?.type).toBe('guild');
  });

  it('keeps members and channels current', () => {
    const cache = new DiscordCache();
    translateDispatch('GUILD_CREATE', guildCreate(), cache);

    translateDispatch('GUILD_MEMBER_ADD', { guild_id: '10', user: { id: '301', username: 'bob' }, roles: [] }, cache);
    translateDispatch('GUILD_MEMBER_UPDATE', { guild_id: '10', user: author, roles: [] }, cache);
    translateDispatch('CHANNEL_DELETE', { id: '201', type: 2, guild_id: '10' }, cache);

    const guild = cache.getGuild('10');
    expect(guild?.members.get('301')?.user.username).toBe('bob');
    expect(guild?.members.get('300')?.roleIds).toEqual([]);
    expect(guild?.channels.has('201')).toBe(false);

    translateDispatch('GUILD_MEMBER_REMOVE', { guild_id: '10', user: { id: '301', username: 'bob' } }, cache);
    expect(guild?.members.has('301')).toBe(false);

    translateDispatch('GUILD_DELETE', { id: '10' }, cache);
    expect(cache.guildCount).toBe(0);
  });

  it('revokes permissions when a role is updated', () => {
    const cache = new DiscordCache();
    translateDispatch('GUILD_CREATE', guildCreate(), cache);
    const canManage = () => {
      const guild = cache.getGuild('10');
      const channel = guild?.channels.get('200');
      const member = guild?.members.get('300');
      if (!guild || channel?.type !== 'guild' || !member) throw new Error('guild not cached');
      return hasPermissions(computeChannelPermissions(guild, channel, member), Permissions.MANAGE_MESSAGES);
    };
    expect(canManage()).toBe(true);

    const event = translateDispatch('GUILD_ROLE_UPDATE', {
      guild_id: '10',
      role: { id: '20', permissions: '0', position: 1 },
    }, cache);

    expect(event?.type).toBe('other');
    expect(cache.getGuild('10')?.roles.get('20')?.permissions).toBe(0n);
    expect(canManage()).toBe(false);
  });

  it('adds and deletes roles', () => {
    const cache = new DiscordCache();
    translateDispatch('GUILD_CREATE', guildCreate(), cache);

    translateDispatch('GUILD_ROLE_CREATE', {
      guild_id: '10',
      role: { id: '21', permissions: String(Permissions.KICK_MEMBERS), position: 2 },
    }, cache);
    expect(cache.getGuild('10')?.roles.get('21')?.permissions).toBe(Permissions.KICK_MEMBERS);

    translateDispatch('GUILD_ROLE_DELETE', { guild_id: '10', role_id: '20' }, cache);
    const guild = cache.getGuild('10');
    expect(guild?.roles.has('20')).toBe(false);
    expect(guild?.members.get('300')?.roleIds).toEqual([]);
  });

  it('applies GUILD_UPDATE owner and roles', () => {
    const cache = new DiscordCache();
    translateDispatch('GUILD_CREATE', guildCreate(), cache);

    translateDispatch('GUILD_UPDATE', {
      id: '10',
      owner_id: '300',
      roles: [{ id: '10', permissions: String(Permissions.VIEW_CHANNEL), position: 0 }],
    }, cache);

    const guild = cache.getGuild('10');
    expect(guild?.ownerId).toBe('300');
    expect([...(guild?.roles.keys() ?? [])]).toEqual(['10']);
    expect(guild?.channels.has('200')).toBe(true);
    expect(guild?.members.has('300')).toBe(true);
  });

  it('passes unavailable guilds through without caching them', () => {
    const cache = new DiscordCache();
    const payload = { id: '10', unavailable: true };

    expect(translateDispatch('GUILD_CREATE', payload, cache)).toEqual({ type: 'other', name: 'GUILD_CREATE', payload });
    expect(cache.guildCount).toBe(0);
  });

  it('translates application command interactions', () => {
    const event = translateDispatch('INTERACTION_CREATE', {
      id: '700',
      type: 2,
      token: 'test-token',
      application_id: '2000',
      channel_id: '200',
      guild_id: '10',
      member: { user: author },
      data: {
        name: 'config',
        options: [{ name: 'set', type: 1, options: [{ name: 'key', type: 3, value: 'volume' }] }],
      },
    }, new DiscordCache());

    expect(event).toEqual({
      type: 'interactionCreate',
      interaction: {
        kind: 'applicationCommand',
        id: '700',
        token: 'test-token',
        applicationId: '2000',
        channelId: '200',
        guildId: '10',
        user: { id: '300', username: 'alice', bot: false },
        commandName: 'config',
        options: [{
          name: 'set',
          type: 1,
          value: undefined,
          options: [{ name: 'key', type: 3, value: 'volume', options: undefined }],
        }],
      },
    });
  });

  it('translates component interactions and drops unsupported ones', () => {
    const base = { id: '701', token: 'test-token', application_id: '2000', channel_id: '200', user: author };

    const component = translateDispatch('INTERACTION_CREATE', { ...base, type: 3, data: { custom_id: 'button-1' } }, new DiscordCache());
    expect(component).toMatchObject({ type: 'interactionCreate', interaction: { kind: 'component', customId: 'button-1' } });

    expect(translateDispatch('INTERACTION_CREATE', { ...base, type: 1 }, new DiscordCache())).toBeNull();
  });

  it('returns null for invalid payloads', () => {
    expect(translateDispatch('MESSAGE_CREATE', { id: 'not-a-snowflake' }, new DiscordCache())).toBeNull();
  });

  it('passes unknown events through', () => {
    const payload = { user_id: '300' };
    expect(translateDispatch('TYPING_START', payload, new DiscordCache())).toEqual({
      type: 'other',
      name: 'TYPING_START',
      payload,
    });
  });
});
