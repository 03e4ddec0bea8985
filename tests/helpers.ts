import type { Message } from '../src/core/message.js';
import type { Channel, Guild, GuildMember, Role } from '../src/core/platform.js';

export const T0 = 1_700_000_000_000;
export const BOT_ID = '1000';
export const CHANNEL_ID = '200';
export const GUILD_ID = '10';

export function makeMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: '500',
    channelId: CHANNEL_ID,
    kind: 0,
    content: '',
    tts: false,
    pinned: false,
    timestamp: T0,
    editedTimestamp: null,
    author: { id: '300', username: 'alice', bot: false },
    mentionEveryone: false,
    mentions: [],
    mentionRoles: [],
    attachments: [],
    embeds: [],
    ...overrides,
  };
}

export function makeMember(id: string, roleIds: string[] = []): GuildMember {
  return { user: { id, username: `user-${id}`, bot: false }, roleIds };
}

/** Guild `10` owned by user `11`, with a single text channel `200`. */
export function makeGuild(params: { everyone: bigint; roles?: Role[]; members?: GuildMember[] }): Guild {
  const roles: Role[] = [{ id: GUILD_ID, permissions: params.everyone, position: 0 }, ...(params.roles ?? [])];
  return {
    id: GUILD_ID,
    ownerId: '11',
    roles: new Map(roles.map((role): [string, Role] => [role.id, role])),
    channels: new Map<string, Channel>([
      [CHANNEL_ID, { type: 'guild', id: CHANNEL_ID, guildId: GUILD_ID, name: 'general', permissionOverwrites: [] }],
    ]),
    members: new Map((params.members ?? []).map((member): [string, GuildMember] => [member.user.id, member])),
  };
}
