/**
 * Reply sending for command handlers.
 *
 * Prefix commands with edit tracking edit their previous response when
 * the trigger message is edited, and record new responses otherwise.
 * Application commands answer with the initial interaction response first
 * and follow-up messages after that.
 */

import type { Context, InteractionContext, PrefixContext } from './context.js';
import type { EditTracker } from './edit-tracker.js';
import type { Embed, Message } from './message.js';
import type { OutgoingFile } from './platform.js';

export interface CreateReply {
  content?: string;
  embed?: Embed;
  attachments?: OutgoingFile[];
  /** Only visible to the invoking user. Ignored for prefix commands. */
  ephemeral?: boolean;
}

function trackerFor<U>(ctx: PrefixContext<U>): EditTracker | undefined {
  if (ctx.command && !ctx.command.options.trackEdits) return undefined;
  return ctx.framework.options.editTracker;
}

async function sendPrefixReply<U>(ctx: PrefixContext<U>, reply: CreateReply): Promise<Message> {
  const attachments = reply.attachments ?? [];
  const existing = trackerFor(ctx)?.findResponse(ctx.msg.id)?.response;

  if (existing) {
    const edited = await ctx.platform.editMessage(existing.channelId, existing.id, {
      // Empty string clears content left over from the previous response
      content: reply.content ?? '',
      embeds: reply.embed ? [reply.embed] : [],
      keepAttachments: [],
      files: attachments,
    });

    // The trigger may have been deleted or purged while the edit was in flight
    const entry = trackerFor(ctx)?.findResponse(ctx.msg.id);
    if (entry) entry.response = edited;
    return edited;
  }

  const sent = await ctx.platform.sendMessage(ctx.msg.channelId, {
    content: reply.content,
    embeds: reply.embed ? [reply.embed] : undefined,
    files: attachments,
    allowedMentions: ctx.framework.options.allowedMentions,
  });

  trackerFor(ctx)?.record(ctx.msg, sent);
  return sent;
}

async function sendInteractionReply<U>(
  ctx: InteractionContext<U>,
  reply: CreateReply,
): Promise<Message | undefined> {
  const message = {
    content: reply.content,
    embeds: reply.embed ? [reply.embed] : undefined,
    files: reply.attachments ?? [],
    allowedMentions: ctx.framework.options.allowedMentions,
    ephemeral: reply.ephemeral ?? false,
  };

  if (!ctx.responded) {
    await ctx.platform.createInteractionResponse(ctx.interaction, message);
    ctx.responded = true;
    return undefined;
  }

  return ctx.platform.createFollowupMessage(ctx.interaction, message);
}

/**
 * @returns the sent or edited message; undefined for an initial interaction
 *   response, which the platform doesn't return
 */
export async function sendReply<U>(ctx: Context<U>, reply: CreateReply): Promise<Message | undefined> {
  return ctx.kind === 'prefix' ? sendPrefixReply(ctx, reply) : sendInteractionReply(ctx, reply);
}

export async function say<U>(ctx: Context<U>, text: string): Promise<Message | undefined> {
  return sendReply(ctx, { content: text });
}
