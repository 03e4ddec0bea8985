import type { Channel, Guild, GuildMember, Role } from '../../core/platform.js';

/**
 * In-memory guild cache, filled from gateway events by `translateDispatch`.
 */
export class DiscordCache {
  private readonly guilds = new Map<string, Guild>();

  getGuild(guildId: string): Guild | undefined {
    return this.guilds.get(guildId);
  }

  get guildCount(): number {
    return this.guilds.size;
  }

  upsertGuild(guild: Guild): void {
    this.guilds.set(guild.id, guild);
  }

  removeGuild(guildId: string): void {
    this.guilds.delete(guildId);
  }

  /**
   * Apply a guild update. Channels and members are kept; roles are replaced
   * when the update carries them.
   *
   * @returns false when the guild isn't cached
   */
  updateGuild(guildId: string, update: { ownerId: string; roles?: Role[] }): boolean {
    const guild = this.guilds.get(guildId);
    if (!guild) return false;
    guild.ownerId = update.ownerId;
    if (update.roles) {
      guild.roles = new Map(update.roles.map((role): [string, Role] => [role.id, role]));
    }
    return true;
  }

  /** @returns false when the guild isn't cached */
  upsertRole(guildId: string, role: Role): boolean {
    const guild = this.guilds.get(guildId);
    if (!guild) return false;
    guild.roles.set(role.id, role);
    return true;
  }

  removeRole(guildId: string, roleId: string): void {
    const guild = this.guilds.get(guildId);
    if (!guild) return;
    guild.roles.delete(roleId);
    for (const member of guild.members.values()) {
      member.roleIds = member.roleIds.filter((id) => id !== roleId);
    }
  }

  /** @returns false when the guild isn't cached */
  upsertMember(guildId: string, member: GuildMember): boolean {
    const guild = this.guilds.get(guildId);
    if (!guild) return false;
    guild.members.set(member.user.id, member);
    return true;
  }

  removeMember(guildId: string, userId: string): void {
    this.guilds.get(guildId)?.members.delete(userId);
  }

  /** @returns false when the channel's guild isn't cached */
  upsertChannel(guildId: string, channel: Channel): boolean {
    const guild = this.guilds.get(guildId);
    if (!guild) return false;
    guild.channels.set(channel.id, channel);
    return true;
  }

  removeChannel(guildId: string, channelId: string): void {
    this.guilds.get(guildId)?.channels.delete(channelId);
  }
}
