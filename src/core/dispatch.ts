import { logger } from '../middleware/logger.js';
import type { Command } from './commands.js';
import { findCommand } from './command-router.js';
import type { Context, PrefixContext } from './context.js';
import type { CommandErrorContext } from './errors.js';
import type { Framework } from './framework.js';
import type { Message } from './message.js';
import {
  effectiveBroadcastTyping,
  effectiveCheck,
  effectiveOwnersOnly,
  effectiveRequiredPermissions,
} from './options.js';
import { checkRequiredPermissionsAndOwnersOnly } from './permissions.js';
import type { PlatformClient } from './platform.js';
import { stripPrefix } from './prefix.js';
import { withTyping } from './typing.js';

/** A command check or action failed; the caller routes it to an error handler. */
export interface DispatchFailure<U> {
  error: unknown;
  context: CommandErrorContext<U>;
}

/**
 * Gate, check and run a resolved command.
 *
 * Denied invocations and checks resolving to false end quietly.
 */
export async function runCommand<U>(
  ctx: Context<U>,
  command: Command<U>,
  execute: () => Promise<void>,
): Promise<DispatchFailure<U> | null> {
  const options = ctx.framework.options;

  const authorized = await checkRequiredPermissionsAndOwnersOnly(
    ctx,
    effectiveRequiredPermissions(command, options),
    effectiveOwnersOnly(command, options),
  );
  if (!authorized) {
    logger.debug({ command: command.name, trigger: ctx.kind }, 'Command invocation not authorized');
    return null;
  }

  const check = effectiveCheck(command, options);
  if (check) {
    try {
      if (!(await check(ctx))) {
        logger.debug({ command: command.name, trigger: ctx.kind }, 'Command check declined invocation');
        return null;
      }
    } catch (error) {
      return { error, context: { whileChecking: true, command, ctx } };
    }
  }

  try {
    await execute();
  } catch (error) {
    return { error, context: { whileChecking: false, command, ctx } };
  }

  return null;
}

/**
 * Resolve and run the command in a message.
 *
 * Edited messages only re-run commands that track edits.
 */
export async function dispatchMessage<U>(
  framework: Framework<U>,
  platform: PlatformClient,
  msg: Message,
  isEdit: boolean,
): Promise<DispatchFailure<U> | null> {
  const options = framework.options;
  const data = await framework.getUserData();

  const rest = await stripPrefix({ msg, settings: options, botId: framework.botId, platform, data });
  if (rest === null) return null;

  const match = findCommand(options.commands, rest, options.caseInsensitiveCommands);
  if (!match) return null;

  const { command, args } = match;
  if (isEdit && !command.options.trackEdits) return null;

  const ctx: PrefixContext<U> = {
    kind: 'prefix',
    platform,
    framework,
    command,
    data,
    msg,
    isEdit,
  };

  logger.debug({ command: match.path.join(' '), messageId: msg.id, isEdit }, 'Dispatching prefix command');

  return runCommand(ctx, command, () => withTyping(
    platform,
    msg.channelId,
    effectiveBroadcastTyping(command, options),
    () => command.action(ctx, args),
  ));
}
