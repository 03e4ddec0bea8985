import type { Attachment, Embed, Message, MessageUpdate, User } from './message.js';

/**
 * Platform surface consumed by the dispatch core.
 *
 * The gateway connection and HTTP plumbing live behind this interface.
 * Implementations: `createDiscordPlatform` (REST) and
 * `createDiscordDemoPlatform` (in-memory outbox).
 */

export interface Role {
  id: string;
  /** Permission bitset granted by the role. */
  permissions: bigint;
  position: number;
}

export interface GuildMember {
  user: User;
  roleIds: string[];
}

export interface PermissionOverwrite {
  /** Role id or user id. */
  id: string;
  type: 'role' | 'member';
  allow: bigint;
  deny: bigint;
}

export interface GuildChannel {
  type: 'guild';
  id: string;
  guildId: string;
  name: string;
  permissionOverwrites: PermissionOverwrite[];
}

export interface PrivateChannel {
  type: 'private';
  id: string;
  recipientIds: string[];
}

export type Channel = GuildChannel | PrivateChannel;

export interface Guild {
  id: string;
  ownerId: string;
  roles: Map<string, Role>;
  channels: Map<string, Channel>;
  members: Map<string, GuildMember>;
}

export interface AllowedMentions {
  parse?: Array<'users' | 'roles' | 'everyone'>;
  users?: string[];
  roles?: string[];
  repliedUser?: boolean;
}

export interface OutgoingFile {
  name: string;
  data: Uint8Array;
  contentType?: string;
}

export interface OutgoingMessage {
  content?: string;
  embeds?: Embed[];
  /** Files to upload with the message. */
  files?: OutgoingFile[];
  /** Existing attachments to keep when editing; `[]` removes them all. */
  keepAttachments?: Attachment[];
  allowedMentions?: AllowedMentions;
  ephemeral?: boolean;
}

export interface ReadyPayload {
  user: User;
  applicationId?: string;
  guildIds: string[];
}

export interface InteractionOption {
  name: string;
  /** 1 = subcommand, 2 = subcommand group, anything else carries a value. */
  type: number;
  value?: string | number | boolean;
  options?: InteractionOption[];
}

export interface ApplicationCommandInteraction {
  kind: 'applicationCommand';
  id: string;
  token: string;
  applicationId: string;
  channelId: string;
  guildId?: string;
  user: User;
  commandName: string;
  options: InteractionOption[];
}

export interface ComponentInteraction {
  kind: 'component';
  id: string;
  token: string;
  applicationId: string;
  channelId: string;
  guildId?: string;
  user: User;
  customId: string;
}

export type Interaction = ApplicationCommandInteraction | ComponentInteraction;

export type FrameworkEvent =
  | { type: 'ready'; ready: ReadyPayload }
  | { type: 'messageCreate'; message: Message }
  | { type: 'messageUpdate'; update: MessageUpdate }
  | { type: 'messageDelete'; channelId: string; messageId: string; guildId?: string }
  | { type: 'interactionCreate'; interaction: Interaction }
  | { type: 'other'; name: string; payload: unknown };

export interface PlatformClient {
  /** Cached guild, undefined when not (yet) received from the gateway. */
  getGuild(guildId: string): Guild | undefined;

  fetchMember(guildId: string, userId: string): Promise<GuildMember>;

  /** Effective permissions of `member` in `channel`; rejects when they cannot be computed. */
  computePermissions(guild: Guild, channel: GuildChannel, member: GuildMember): Promise<bigint>;

  sendMessage(channelId: string, message: OutgoingMessage): Promise<Message>;

  editMessage(channelId: string, messageId: string, message: OutgoingMessage): Promise<Message>;

  deleteMessage(channelId: string, messageId: string): Promise<void>;

  broadcastTyping(channelId: string): Promise<void>;

  createInteractionResponse(interaction: Interaction, message: OutgoingMessage): Promise<void>;

  createFollowupMessage(interaction: Interaction, message: OutgoingMessage): Promise<Message>;
}
