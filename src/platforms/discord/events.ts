import { z } from 'zod';

import { logger } from '../../middleware/logger.js';
import type { Message, MessageUpdate, User } from '../../core/message.js';
import type {
  Channel,
  FrameworkEvent,
  GuildMember,
  Interaction,
  InteractionOption,
  PermissionOverwrite,
  Role,
} from '../../core/platform.js';
import type { DiscordCache } from './cache.js';

const Snowflake = z.string().regex(/^\d+$/);
const PermissionBits = z.string().regex(/^\d+$/).transform((value) => BigInt(value));

const DiscordUserSchema = z.object({
  id: Snowflake,
  username: z.string().default(''),
  bot: z.boolean().optional(),
});

const DiscordAttachmentSchema = z.object({
  id: Snowflake,
  filename: z.string(),
  url: z.string(),
  size: z.number().int().nonnegative(),
  content_type: z.string().optional(),
});

const DiscordEmbedSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  url: z.string().optional(),
  color: z.number().int().optional(),
  fields: z.array(z.object({
    name: z.string(),
    value: z.string(),
    inline: z.boolean().optional(),
  })).optional(),
  footer: z.object({ text: z.string() }).optional(),
});

export const DiscordMessageSchema = z.object({
  id: Snowflake,
  channel_id: Snowflake,
  guild_id: Snowflake.optional(),
  type: z.number().int().default(0),
  content: z.string().default(''),
  tts: z.boolean().default(false),
  pinned: z.boolean().default(false),
  timestamp: z.string(),
  edited_timestamp: z.string().nullable().optional(),
  author: DiscordUserSchema,
  mention_everyone: z.boolean().default(false),
  mentions: z.array(DiscordUserSchema).default([]),
  mention_roles: z.array(Snowflake).default([]),
  attachments: z.array(DiscordAttachmentSchema).default([]),
  embeds: z.array(DiscordEmbedSchema).default([]),
});

const DiscordMessageUpdateSchema = z.object({
  id: Snowflake,
  channel_id: Snowflake,
  guild_id: Snowflake.optional(),
  type: z.number().int().optional(),
  content: z.string().optional(),
  tts: z.boolean().optional(),
  pinned: z.boolean().optional(),
  timestamp: z.string().optional(),
  edited_timestamp: z.string().nullable().optional(),
  author: DiscordUserSchema.optional(),
  mention_everyone: z.boolean().optional(),
  mentions: z.array(DiscordUserSchema).optional(),
  mention_roles: z.array(Snowflake).optional(),
  attachments: z.array(DiscordAttachmentSchema).optional(),
  embeds: z.array(DiscordEmbedSchema).optional(),
});

const DiscordMessageDeleteSchema = z.object({
  id: Snowflake,
  channel_id: Snowflake,
  guild_id: Snowflake.optional(),
});

const DiscordReadySchema = z.object({
  user: DiscordUserSchema,
  application: z.object({ id: Snowflake }).optional(),
  guilds: z.array(z.object({ id: Snowflake })).default([]),
});

const DiscordRoleSchema = z.object({
  id: Snowflake,
  permissions: PermissionBits,
  position: z.number().int().default(0),
});

const DiscordOverwriteSchema = z.object({
  id: Snowflake,
  type: z.union([z.literal(0), z.literal(1)]),
  allow: PermissionBits,
  deny: PermissionBits,
});

const DiscordChannelSchema = z.object({
  id: Snowflake,
  type: z.number().int(),
  guild_id: Snowflake.optional(),
  name: z.string().nullable().optional(),
  permission_overwrites: z.array(DiscordOverwriteSchema).default([]),
  recipients: z.array(DiscordUserSchema).default([]),
});

export const DiscordMemberSchema = z.object({
  user: DiscordUserSchema,
  roles: z.array(Snowflake).default([]),
});

const DiscordGuildCreateSchema = z.object({
  id: Snowflake,
  owner_id: Snowflake,
  roles: z.array(DiscordRoleSchema).default([]),
  channels: z.array(DiscordChannelSchema).default([]),
  members: z.array(DiscordMemberSchema).default([]),
});

const DiscordUnavailableGuildSchema = z.object({
  id: Snowflake,
  unavailable: z.literal(true),
});

const DiscordGuildUpdateSchema = z.object({
  id: Snowflake,
  owner_id: Snowflake,
  roles: z.array(DiscordRoleSchema).optional(),
});

const DiscordGuildRoleSchema = z.object({
  guild_id: Snowflake,
  role: DiscordRoleSchema,
});

const DiscordGuildRoleDeleteSchema = z.object({
  guild_id: Snowflake,
  role_id: Snowflake,
});

const DiscordGuildMemberAddSchema = DiscordMemberSchema.extend({ guild_id: Snowflake });

const DiscordGuildMemberRemoveSchema = z.object({
  guild_id: Snowflake,
  user: DiscordUserSchema,
});

interface RawInteractionOption {
  name: string;
  type: number;
  value?: string | number | boolean;
  options?: RawInteractionOption[];
}

const DiscordInteractionOptionSchema: z.ZodType<RawInteractionOption> = z.lazy(() => z.object({
  name: z.string(),
  type: z.number().int(),
  value: z.union([z.string(), z.number(), z.boolean()]).optional(),
  options: z.array(DiscordInteractionOptionSchema).optional(),
}));

const DiscordInteractionSchema = z.object({
  id: Snowflake,
  type: z.number().int(),
  token: z.string(),
  application_id: Snowflake,
  channel_id: Snowflake,
  guild_id: Snowflake.optional(),
  member: z.object({ user: DiscordUserSchema }).optional(),
  user: DiscordUserSchema.optional(),
  data: z.object({
    name: z.string().optional(),
    options: z.array(DiscordInteractionOptionSchema).optional(),
    custom_id: z.string().optional(),
  }).optional(),
});

type DiscordUser = z.infer<typeof DiscordUserSchema>;
type DiscordMessage = z.infer<typeof DiscordMessageSchema>;
type DiscordChannel = z.infer<typeof DiscordChannelSchema>;
type DiscordMember = z.infer<typeof DiscordMemberSchema>;

const PRIVATE_CHANNEL_TYPES = new Set([1, 3]);
const INTERACTION_APPLICATION_COMMAND = 2;
const INTERACTION_MESSAGE_COMPONENT = 3;

function parseDiscordTimestamp(ts: string): number {
  const parsed = Date.parse(ts);
  if (Number.isNaN(parsed)) return Date.now();
  return parsed;
}

function toUser(user: DiscordUser): User {
  return { id: user.id, username: user.username, bot: user.bot ?? false };
}

export function toMessage(raw: DiscordMessage): Message {
  return {
    id: raw.id,
    channelId: raw.channel_id,
    guildId: raw.guild_id,
    kind: raw.type,
    content: raw.content,
    tts: raw.tts,
    pinned: raw.pinned,
    timestamp: parseDiscordTimestamp(raw.timestamp),
    editedTimestamp: raw.edited_timestamp ? parseDiscordTimestamp(raw.edited_timestamp) : null,
    author: toUser(raw.author),
    mentionEveryone: raw.mention_everyone,
    mentions: raw.mentions.map(toUser),
    mentionRoles: raw.mention_roles,
    attachments: raw.attachments.map((attachment) => ({
      id: attachment.id,
      filename: attachment.filename,
      url: attachment.url,
      size: attachment.size,
      contentType: attachment.content_type,
    })),
    embeds: raw.embeds,
  };
}

function toMessageUpdate(raw: z.infer<typeof DiscordMessageUpdateSchema>): MessageUpdate {
  return {
    id: raw.id,
    channelId: raw.channel_id,
    guildId: raw.guild_id,
    kind: raw.type,
    content: raw.content,
    tts: raw.tts,
    pinned: raw.pinned,
    timestamp: raw.timestamp ? parseDiscordTimestamp(raw.timestamp) : undefined,
    editedTimestamp: raw.edited_timestamp ? parseDiscordTimestamp(raw.edited_timestamp) : undefined,
    author: raw.author ? toUser(raw.author) : undefined,
    mentionEveryone: raw.mention_everyone,
    mentions: raw.mentions?.map(toUser),
    mentionRoles: raw.mention_roles,
    attachments: raw.attachments?.map((attachment) => ({
      id: attachment.id,
      filename: attachment.filename,
      url: attachment.url,
      size: attachment.size,
      contentType: attachment.content_type,
    })),
    embeds: raw.embeds,
  };
}

export function toGuildMember(raw: DiscordMember): GuildMember {
  return { user: toUser(raw.user), roleIds: raw.roles };
}

function toChannel(raw: DiscordChannel, guildId: string | undefined): Channel {
  const owningGuild = raw.guild_id ?? guildId;
  if (PRIVATE_CHANNEL_TYPES.has(raw.type) || !owningGuild) {
    return { type: 'private', id: raw.id, recipientIds: raw.recipients.map((user) => user.id) };
  }

  return {
    type: 'guild',
    id: raw.id,
    guildId: owningGuild,
    name: raw.name ?? '',
    permissionOverwrites: raw.permission_overwrites.map((overwrite): PermissionOverwrite => ({
      id: overwrite.id,
      type: overwrite.type === 0 ? 'role' : 'member',
      allow: overwrite.allow,
      deny: overwrite.deny,
    })),
  };
}

function toInteractionOption(raw: RawInteractionOption): InteractionOption {
  return {
    name: raw.name,
    type: raw.type,
    value: raw.value,
    options: raw.options?.map(toInteractionOption),
  };
}

function toInteraction(raw: z.infer<typeof DiscordInteractionSchema>): Interaction | null {
  const rawUser = raw.member?.user ?? raw.user;
  if (!rawUser) return null;

  const base = {
    id: raw.id,
    token: raw.token,
    applicationId: raw.application_id,
    channelId: raw.channel_id,
    guildId: raw.guild_id,
    user: toUser(rawUser),
  };

  if (raw.type === INTERACTION_APPLICATION_COMMAND && raw.data?.name) {
    return {
      kind: 'applicationCommand',
      ...base,
      commandName: raw.data.name,
      options: (raw.data.options ?? []).map(toInteractionOption),
    };
  }

  if (raw.type === INTERACTION_MESSAGE_COMPONENT && raw.data?.custom_id) {
    return { kind: 'component', ...base, customId: raw.data.custom_id };
  }

  return null;
}

function parsePayload<T extends z.ZodTypeAny>(schema: T, name: string, payload: unknown): z.infer<T> | null {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    logger.warn({ event: name, issues: parsed.error.issues }, 'Invalid Discord gateway payload');
    return null;
  }
  return parsed.data;
}

/**
 * Translate a raw gateway dispatch (`t` + `d`) into a framework event,
 * updating the guild cache on the way.
 *
 * @returns null when the payload is invalid or the interaction type is unsupported
 */
export function translateDispatch(name: string, payload: unknown, cache: DiscordCache): FrameworkEvent | null {
  switch (name) {
    case 'READY': {
      const ready = parsePayload(DiscordReadySchema, name, payload);
      if (!ready) return null;
      return {
        type: 'ready',
        ready: {
          user: toUser(ready.user),
          applicationId: ready.application?.id,
          guildIds: ready.guilds.map((guild) => guild.id),
        },
      };
    }

    case 'MESSAGE_CREATE': {
      const message = parsePayload(DiscordMessageSchema, name, payload);
      return message ? { type: 'messageCreate', message: toMessage(message) } : null;
    }

    case 'MESSAGE_UPDATE': {
      const update = parsePayload(DiscordMessageUpdateSchema, name, payload);
      return update ? { type: 'messageUpdate', update: toMessageUpdate(update) } : null;
    }

    case 'MESSAGE_DELETE': {
      const deleted = parsePayload(DiscordMessageDeleteSchema, name, payload);
      if (!deleted) return null;
      return { type: 'messageDelete', channelId: deleted.channel_id, messageId: deleted.id, guildId: deleted.guild_id };
    }

    case 'INTERACTION_CREATE': {
      const raw = parsePayload(DiscordInteractionSchema, name, payload);
      const interaction = raw ? toInteraction(raw) : null;
      return interaction ? { type: 'interactionCreate', interaction } : null;
    }

    case 'GUILD_CREATE': {
      // Outage placeholder: nothing to cache until the full guild arrives
      if (DiscordUnavailableGuildSchema.safeParse(payload).success) {
        return { type: 'other', name, payload };
      }
      const guild = parsePayload(DiscordGuildCreateSchema, name, payload);
      if (!guild) return null;
      cache.upsertGuild({
        id: guild.id,
        ownerId: guild.owner_id,
        roles: new Map(guild.roles.map((role): [string, Role] => [role.id, role])),
        channels: new Map(guild.channels.map((channel): [string, Channel] => [channel.id, toChannel(channel, guild.id)])),
        members: new Map(guild.members.map((member): [string, GuildMember] => [member.user.id, toGuildMember(member)])),
      });
      return { type: 'other', name, payload };
    }

    case 'GUILD_UPDATE': {
      const guild = parsePayload(DiscordGuildUpdateSchema, name, payload);
      if (!guild) return null;
      cache.updateGuild(guild.id, { ownerId: guild.owner_id, roles: guild.roles });
      return { type: 'other', name, payload };
    }

    case 'GUILD_ROLE_CREATE':
    case 'GUILD_ROLE_UPDATE': {
      const update = parsePayload(DiscordGuildRoleSchema, name, payload);
      if (!update) return null;
      cache.upsertRole(update.guild_id, update.role);
      return { type: 'other', name, payload };
    }

    case 'GUILD_ROLE_DELETE': {
      const removed = parsePayload(DiscordGuildRoleDeleteSchema, name, payload);
      if (!removed) return null;
      cache.removeRole(removed.guild_id, removed.role_id);
      return { type: 'other', name, payload };
    }

    case 'GUILD_DELETE': {
      const guild = parsePayload(z.object({ id: Snowflake }), name, payload);
      if (!guild) return null;
      cache.removeGuild(guild.id);
      return { type: 'other', name, payload };
    }

    case 'GUILD_MEMBER_ADD':
    case 'GUILD_MEMBER_UPDATE': {
      const member = parsePayload(DiscordGuildMemberAddSchema, name, payload);
      if (!member) return null;
      cache.upsertMember(member.guild_id, toGuildMember(member));
      return { type: 'other', name, payload };
    }

    case 'GUILD_MEMBER_REMOVE': {
      const removed = parsePayload(DiscordGuildMemberRemoveSchema, name, payload);
      if (!removed) return null;
      cache.removeMember(removed.guild_id, removed.user.id);
      return { type: 'other', name, payload };
    }

    case 'CHANNEL_CREATE':
    case 'CHANNEL_UPDATE': {
      const channel = parsePayload(DiscordChannelSchema, name, payload);
      if (!channel) return null;
      if (channel.guild_id) cache.upsertChannel(channel.guild_id, toChannel(channel, channel.guild_id));
      return { type: 'other', name, payload };
    }

    case 'CHANNEL_DELETE': {
      const channel = parsePayload(DiscordChannelSchema, name, payload);
      if (!channel) return null;
      if (channel.guild_id) cache.removeChannel(channel.guild_id, channel.id);
      return { type: 'other', name, payload };
    }

    default:
      return { type: 'other', name, payload };
  }
}
