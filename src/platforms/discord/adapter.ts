import type { Message } from '../../core/message.js';
import type {
  AllowedMentions,
  Guild,
  GuildChannel,
  GuildMember,
  Interaction,
  OutgoingFile,
  OutgoingMessage,
  PlatformClient,
} from '../../core/platform.js';

import type { AppConfig } from '../../utils/env.js';
import type { DiscordCache } from './cache.js';
import { DiscordMemberSchema, DiscordMessageSchema, toGuildMember, toMessage } from './events.js';
import { computeChannelPermissions } from './permissions.js';

const DISCORD_API_BASE = 'https://discord.com/api/v10';
const EPHEMERAL_FLAG = 1 << 6;
const CHANNEL_MESSAGE_WITH_SOURCE = 4;

export class DiscordApiError extends Error {
  constructor(
    readonly route: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Discord API ${route} failed (${status}): ${body}`);
    this.name = 'DiscordApiError';
  }
}

async function discordApiRequest(
  token: string | null,
  path: string,
  init: RequestInit,
): Promise<unknown> {
  const response = await fetch(`${DISCORD_API_BASE}${path}`, {
    ...init,
    headers: {
      ...(token ? { authorization: `Bot ${token}` } : {}),
      ...(init.headers ?? {}),
    },
  });

  if (!response.ok) {
    const text = await response.text();
    throw new DiscordApiError(path, response.status, text);
  }

  if (response.status === 204) {
    return {};
  }

  return await response.json();
}

function toAllowedMentionsPayload(allowed: AllowedMentions): Record<string, unknown> {
  return {
    ...(allowed.parse ? { parse: allowed.parse } : {}),
    ...(allowed.users ? { users: allowed.users } : {}),
    ...(allowed.roles ? { roles: allowed.roles } : {}),
    ...(allowed.repliedUser !== undefined ? { replied_user: allowed.repliedUser } : {}),
  };
}

export function buildMessagePayload(message: OutgoingMessage): Record<string, unknown> {
  const files = message.files ?? [];
  const payload: Record<string, unknown> = {};

  if (message.content !== undefined) payload.content = message.content;
  if (message.embeds !== undefined) payload.embeds = message.embeds;
  if (message.allowedMentions) payload.allowed_mentions = toAllowedMentionsPayload(message.allowedMentions);
  if (message.ephemeral) payload.flags = EPHEMERAL_FLAG;

  if (message.keepAttachments !== undefined || files.length > 0) {
    payload.attachments = [
      ...(message.keepAttachments ?? []).map((attachment) => ({ id: attachment.id })),
      ...files.map((file, index) => ({ id: index, filename: file.name })),
    ];
  }

  return payload;
}

/**
 * JSON body, or multipart with the files in `files[n]` parts next to
 * `payload_json` when there is anything to upload.
 */
export function encodeRequestBody(
  payload: Record<string, unknown>,
  files: OutgoingFile[],
): { body: string | FormData; headers: Record<string, string> } {
  if (files.length === 0) {
    return {
      body: JSON.stringify(payload),
      headers: { 'content-type': 'application/json; charset=utf-8' },
    };
  }

  const form = new FormData();
  form.set('payload_json', JSON.stringify(payload));
  files.forEach((file, index) => {
    form.set(
      `files[${index}]`,
      new Blob([new Uint8Array(file.data)], { type: file.contentType ?? 'application/octet-stream' }),
      file.name,
    );
  });
  return { body: form, headers: {} };
}

export interface DiscordPlatformParams {
  token: string;
  cache: DiscordCache;
}

/**
 * REST-backed platform client. Guild state comes from the gateway-fed cache.
 */
export function createDiscordPlatform(params: DiscordPlatformParams): PlatformClient {
  const { token, cache } = params;

  const requestMessage = async (path: string, method: string, message: OutgoingMessage, auth: boolean): Promise<Message> => {
    const { body, headers } = encodeRequestBody(buildMessagePayload(message), message.files ?? []);
    const raw = await discordApiRequest(auth ? token : null, path, { method, body, headers });
    return toMessage(DiscordMessageSchema.parse(raw));
  };

  return {
    getGuild(guildId: string): Guild | undefined {
      return cache.getGuild(guildId);
    },

    async fetchMember(guildId: string, userId: string): Promise<GuildMember> {
      const raw = await discordApiRequest(token, `/guilds/${guildId}/members/${userId}`, { method: 'GET' });
      const member = toGuildMember(DiscordMemberSchema.parse(raw));
      cache.upsertMember(guildId, member);
      return member;
    },

    async computePermissions(guild: Guild, channel: GuildChannel, member: GuildMember): Promise<bigint> {
      return computeChannelPermissions(guild, channel, member);
    },

    async sendMessage(channelId: string, message: OutgoingMessage): Promise<Message> {
      return requestMessage(`/channels/${channelId}/messages`, 'POST', message, true);
    },

    async editMessage(channelId: string, messageId: string, message: OutgoingMessage): Promise<Message> {
      return requestMessage(`/channels/${channelId}/messages/${messageId}`, 'PATCH', message, true);
    },

    async deleteMessage(channelId: string, messageId: string): Promise<void> {
      await discordApiRequest(token, `/channels/${channelId}/messages/${messageId}`, { method: 'DELETE' });
    },

    async broadcastTyping(channelId: string): Promise<void> {
      await discordApiRequest(token, `/channels/${channelId}/typing`, { method: 'POST' });
    },

    async createInteractionResponse(interaction: Interaction, message: OutgoingMessage): Promise<void> {
      const { body, headers } = encodeRequestBody(
        { type: CHANNEL_MESSAGE_WITH_SOURCE, data: buildMessagePayload(message) },
        message.files ?? [],
      );
      // Interaction tokens authenticate the callback; no bot token
      await discordApiRequest(null, `/interactions/${interaction.id}/${interaction.token}/callback`, {
        method: 'POST',
        headers,
        body,
      });
    },

    async createFollowupMessage(interaction: Interaction, message: OutgoingMessage): Promise<Message> {
      return requestMessage(`/webhooks/${interaction.applicationId}/${interaction.token}`, 'POST', message, false);
    },
  };
}

/**
 * REST platform from `DISCORD_BOT_TOKEN`, plus the configured application id
 * to hand to the framework before the first ready event.
 */
export function discordPlatformFromConfig(
  config: Pick<AppConfig, 'DISCORD_BOT_TOKEN' | 'DISCORD_APPLICATION_ID'>,
  cache: DiscordCache,
): { platform: PlatformClient; applicationId?: string } {
  if (!config.DISCORD_BOT_TOKEN) {
    throw new Error('DISCORD_BOT_TOKEN is required for the Discord REST platform');
  }
  return {
    platform: createDiscordPlatform({ token: config.DISCORD_BOT_TOKEN, cache }),
    applicationId: config.DISCORD_APPLICATION_ID,
  };
}

// ── Demo platform (local dev + tests) ───────────────────────────────

export interface DiscordDemoOutboxEntry {
  type: 'send' | 'edit' | 'delete' | 'typing' | 'interactionResponse' | 'followup';
  channelId: string;
  payload: unknown;
}

export interface DiscordDemoPlatformParams {
  cache: DiscordCache;
  /** Members returned by `fetchMember` for users missing from the cache, keyed by `guildId:userId`. */
  remoteMembers?: Map<string, GuildMember>;
  /** Author of every message the demo platform "sends". */
  botUser?: { id: string; username: string };
  /** Clock for sent/edited message timestamps. */
  now?: () => number;
}

/**
 * In-memory platform that records every outgoing call in `outbox` and
 * fabricates the messages the API would return.
 */
export function createDiscordDemoPlatform(
  outbox: DiscordDemoOutboxEntry[],
  params: DiscordDemoPlatformParams,
): PlatformClient {
  const botUser = { ...(params.botUser ?? { id: '1000', username: 'demo-bot' }), bot: true };
  const now = params.now ?? Date.now;
  const sent = new Map<string, Message>();
  let nextId = 1;

  const fabricate = (id: string, channelId: string, message: OutgoingMessage): Message => ({
    id,
    channelId,
    kind: 0,
    content: message.content ?? '',
    tts: false,
    pinned: false,
    timestamp: now(),
    editedTimestamp: null,
    author: botUser,
    mentionEveryone: false,
    mentions: [],
    mentionRoles: [],
    attachments: (message.files ?? []).map((file, index) => ({
      id: `demo-attachment-${index}`,
      filename: file.name,
      url: `https://cdn.invalid/${file.name}`,
      size: file.data.length,
      contentType: file.contentType,
    })),
    embeds: message.embeds ?? [],
  });

  return {
    getGuild(guildId: string): Guild | undefined {
      return params.cache.getGuild(guildId);
    },

    async fetchMember(guildId: string, userId: string): Promise<GuildMember> {
      const member = params.remoteMembers?.get(`${guildId}:${userId}`);
      if (!member) {
        throw new DiscordApiError(`/guilds/${guildId}/members/${userId}`, 404, 'Unknown Member');
      }
      return member;
    },

    async computePermissions(guild: Guild, channel: GuildChannel, member: GuildMember): Promise<bigint> {
      return computeChannelPermissions(guild, channel, member);
    },

    async sendMessage(channelId: string, message: OutgoingMessage): Promise<Message> {
      const created = fabricate(`demo-${nextId++}`, channelId, message);
      sent.set(created.id, created);
      outbox.push({ type: 'send', channelId, payload: { ...message, messageId: created.id } });
      return created;
    },

    async editMessage(channelId: string, messageId: string, message: OutgoingMessage): Promise<Message> {
      const previous = sent.get(messageId);
      if (!previous) {
        throw new DiscordApiError(`/channels/${channelId}/messages/${messageId}`, 404, 'Unknown Message');
      }
      const edited: Message = {
        ...fabricate(messageId, channelId, message),
        timestamp: previous.timestamp,
        editedTimestamp: now(),
      };
      sent.set(messageId, edited);
      outbox.push({ type: 'edit', channelId, payload: { ...message, messageId } });
      return edited;
    },

    async deleteMessage(channelId: string, messageId: string): Promise<void> {
      if (!sent.delete(messageId)) {
        throw new DiscordApiError(`/channels/${channelId}/messages/${messageId}`, 404, 'Unknown Message');
      }
      outbox.push({ type: 'delete', channelId, payload: { messageId } });
    },

    async broadcastTyping(channelId: string): Promise<void> {
      outbox.push({ type: 'typing', channelId, payload: null });
    },

    async createInteractionResponse(interaction: Interaction, message: OutgoingMessage): Promise<void> {
      outbox.push({ type: 'interactionResponse', channelId: interaction.channelId, payload: { ...message, interactionId: interaction.id } });
    },

    async createFollowupMessage(interaction: Interaction, message: OutgoingMessage): Promise<Message> {
      const created = fabricate(`demo-${nextId++}`, interaction.channelId, message);
      sent.set(created.id, created);
      outbox.push({ type: 'followup', channelId: interaction.channelId, payload: { ...message, messageId: created.id } });
      return created;
    },
  };
}
