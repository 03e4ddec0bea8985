import type { Command } from './commands.js';
import type { Framework } from './framework.js';
import type { Message, User } from './message.js';
import type { ApplicationCommandInteraction, PlatformClient } from './platform.js';

interface BaseContext<U> {
  platform: PlatformClient;
  framework: Framework<U>;
  /** Undefined when the context is built for a listener rather than a command. */
  command?: Command<U>;
  data: U;
}

/** Invocation through a text message with a prefix. */
export interface PrefixContext<U> extends BaseContext<U> {
  kind: 'prefix';
  msg: Message;
  /** True when dispatched because the trigger message was edited. */
  isEdit: boolean;
}

/** Invocation through a platform application command. */
export interface InteractionContext<U> extends BaseContext<U> {
  kind: 'interaction';
  interaction: ApplicationCommandInteraction;
  /** Set once the initial interaction response has been sent. */
  responded: boolean;
}

export type Context<U> = PrefixContext<U> | InteractionContext<U>;

export function contextAuthor<U>(ctx: Context<U>): User {
  return ctx.kind === 'prefix' ? ctx.msg.author : ctx.interaction.user;
}

export function contextChannelId<U>(ctx: Context<U>): string {
  return ctx.kind === 'prefix' ? ctx.msg.channelId : ctx.interaction.channelId;
}

export function contextGuildId<U>(ctx: Context<U>): string | undefined {
  return ctx.kind === 'prefix' ? ctx.msg.guildId : ctx.interaction.guildId;
}
