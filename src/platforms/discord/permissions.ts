import { ALL_PERMISSIONS, Permissions } from '../../core/permissions.js';
import type { Guild, GuildChannel, GuildMember } from '../../core/platform.js';

/**
 * Guild-level permissions: @everyone plus every role of the member.
 * Guild owners and administrators get everything.
 */
export function computeBasePermissions(guild: Guild, member: GuildMember): bigint {
  if (guild.ownerId === member.user.id) return ALL_PERMISSIONS;

  const everyone = guild.roles.get(guild.id);
  if (!everyone) {
    throw new Error(`Guild ${guild.id} has no @everyone role in cache`);
  }

  let permissions = everyone.permissions;
  for (const roleId of member.roleIds) {
    const role = guild.roles.get(roleId);
    if (role) permissions |= role.permissions;
  }

  if ((permissions & Permissions.ADMINISTRATOR) !== 0n) return ALL_PERMISSIONS;
  return permissions;
}

/**
 * Apply channel overwrites on top of the base permissions, in platform
 * order: @everyone, then all member roles together, then the member.
 */
export function computeChannelPermissions(guild: Guild, channel: GuildChannel, member: GuildMember): bigint {
  if (channel.guildId !== guild.id) {
    throw new Error(`Channel ${channel.id} does not belong to guild ${guild.id}`);
  }

  let permissions = computeBasePermissions(guild, member);
  if (permissions === ALL_PERMISSIONS) return permissions;

  const everyoneOverwrite = channel.permissionOverwrites.find(
    (overwrite) => overwrite.type === 'role' && overwrite.id === guild.id,
  );
  if (everyoneOverwrite) {
    permissions &= ~everyoneOverwrite.deny;
    permissions |= everyoneOverwrite.allow;
  }

  let roleAllow = 0n;
  let roleDeny = 0n;
  for (const overwrite of channel.permissionOverwrites) {
    if (overwrite.type === 'role' && member.roleIds.includes(overwrite.id)) {
      roleAllow |= overwrite.allow;
      roleDeny |= overwrite.deny;
    }
  }
  permissions &= ~roleDeny;
  permissions |= roleAllow;

  const memberOverwrite = channel.permissionOverwrites.find(
    (overwrite) => overwrite.type === 'member' && overwrite.id === member.user.id,
  );
  if (memberOverwrite) {
    permissions &= ~memberOverwrite.deny;
    permissions |= memberOverwrite.allow;
  }

  return permissions & ALL_PERMISSIONS;
}
