import { logger } from '../middleware/logger.js';
import type { Command } from './commands.js';
import { findCommandByPath } from './command-router.js';
import type { InteractionContext } from './context.js';
import { runCommand, type DispatchFailure } from './dispatch.js';
import type { Framework } from './framework.js';
import type { ApplicationCommandInteraction, InteractionOption, PlatformClient } from './platform.js';

const SUBCOMMAND = 1;
const SUBCOMMAND_GROUP = 2;

export interface ResolvedInteraction<U> {
  command: Command<U>;
  path: string[];
  /** Values of the innermost options, space separated, in the order they were sent. */
  args: string;
  options: InteractionOption[];
}

/**
 * Follow subcommand (group) options down to the invoked command.
 */
export function resolveInteractionCommand<U>(
  commands: readonly Command<U>[],
  interaction: ApplicationCommandInteraction,
): ResolvedInteraction<U> | null {
  const path = [interaction.commandName];
  let options = interaction.options;

  let nested = options[0];
  while (options.length === 1 && nested && (nested.type === SUBCOMMAND || nested.type === SUBCOMMAND_GROUP)) {
    path.push(nested.name);
    options = nested.options ?? [];
    nested = options[0];
  }

  const command = findCommandByPath(commands, path);
  if (!command) return null;

  const args = options
    .filter((option) => option.value !== undefined)
    .map((option) => String(option.value))
    .join(' ');

  return { command, path, args, options };
}

export async function dispatchInteraction<U>(
  framework: Framework<U>,
  platform: PlatformClient,
  interaction: ApplicationCommandInteraction,
): Promise<DispatchFailure<U> | null> {
  const resolved = resolveInteractionCommand(framework.options.commands, interaction);
  if (!resolved) {
    logger.warn({ commandName: interaction.commandName, interactionId: interaction.id }, 'Unknown application command');
    return null;
  }

  const data = await framework.getUserData();
  const { command, args } = resolved;
  const ctx: InteractionContext<U> = {
    kind: 'interaction',
    platform,
    framework,
    command,
    data,
    interaction,
    responded: false,
  };

  logger.debug({ command: resolved.path.join(' '), interactionId: interaction.id }, 'Dispatching application command');

  return runCommand(ctx, command, () => command.action(ctx, args));
}
