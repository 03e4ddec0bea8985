/**
 * Permission gate: owners-only and required-permission checks run before
 * a matched command.
 *
 * Every lookup failure denies the invocation. Nothing here throws.
 */

import { logger } from '../middleware/logger.js';
import { contextAuthor, contextChannelId, contextGuildId, type Context } from './context.js';
import type { GuildMember } from './platform.js';

/** Permission bits (Discord values). */
export const Permissions = {
  CREATE_INSTANT_INVITE: 1n << 0n,
  KICK_MEMBERS: 1n << 1n,
  BAN_MEMBERS: 1n << 2n,
  ADMINISTRATOR: 1n << 3n,
  MANAGE_CHANNELS: 1n << 4n,
  MANAGE_GUILD: 1n << 5n,
  ADD_REACTIONS: 1n << 6n,
  VIEW_AUDIT_LOG: 1n << 7n,
  VIEW_CHANNEL: 1n << 10n,
  SEND_MESSAGES: 1n << 11n,
  MANAGE_MESSAGES: 1n << 13n,
  EMBED_LINKS: 1n << 14n,
  ATTACH_FILES: 1n << 15n,
  READ_MESSAGE_HISTORY: 1n << 16n,
  MENTION_EVERYONE: 1n << 17n,
  MANAGE_NICKNAMES: 1n << 27n,
  MANAGE_ROLES: 1n << 28n,
  MANAGE_WEBHOOKS: 1n << 29n,
  MODERATE_MEMBERS: 1n << 40n,
} as const;

/** All permission bits set. */
export const ALL_PERMISSIONS = (1n << 64n) - 1n;

export function hasPermissions(granted: bigint, required: bigint): boolean {
  return (granted & required) === required;
}

/**
 * Check that the invoking member has `required` in the invocation channel.
 * Direct messages have no permissions and always pass.
 */
export async function checkPermissions<U>(ctx: Context<U>, required: bigint): Promise<boolean> {
  if (required === 0n) return true;

  const guildId = contextGuildId(ctx);
  if (!guildId) return true;

  const guild = ctx.platform.getGuild(guildId);
  if (!guild) return false;

  const channelId = contextChannelId(ctx);
  const channel = guild.channels.get(channelId);
  if (!channel) {
    logger.warn({ guildId, channelId }, 'Invocation channel not in guild cache, denying invocation');
    return false;
  }
  if (channel.type !== 'guild') {
    logger.warn({ guildId, channelId, channelType: channel.type }, 'Guild invocation from a non-guild channel, denying invocation');
    return false;
  }

  const author = contextAuthor(ctx);
  let member: GuildMember | undefined = guild.members.get(author.id);
  if (!member) {
    try {
      member = await ctx.platform.fetchMember(guildId, author.id);
    } catch (err) {
      logger.warn({ err, guildId, userId: author.id }, 'Member lookup failed, denying invocation');
      return false;
    }
  }

  try {
    const granted = await ctx.platform.computePermissions(guild, channel, member);
    return hasPermissions(granted, required);
  } catch (err) {
    logger.warn({ err, guildId, channelId, userId: author.id }, 'Permission computation failed, denying invocation');
    return false;
  }
}

export async function checkRequiredPermissionsAndOwnersOnly<U>(
  ctx: Context<U>,
  requiredPermissions: bigint,
  ownersOnly: boolean,
): Promise<boolean> {
  if (ownersOnly && !ctx.framework.options.owners.has(contextAuthor(ctx).id)) {
    return false;
  }

  return checkPermissions(ctx, requiredPermissions);
}
