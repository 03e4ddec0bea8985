import type { Context } from './context.js';
import type { CommandErrorContext } from './errors.js';

export type CommandAction<U> = (ctx: Context<U>, args: string) => Promise<void>;

/** Admission check. Resolving to false silently skips the command; rejecting is a command error. */
export type CommandCheck<U> = (ctx: Context<U>) => Promise<boolean>;

export type CommandErrorHandler<U> = (error: unknown, ctx: CommandErrorContext<U>) => Promise<void>;

export type BroadcastTypingBehavior =
  | { kind: 'none' }
  /** Start broadcasting typing once the action has run for `delayMs` (0 = immediately). */
  | { kind: 'withDelay'; delayMs: number };

/**
 * Per-command settings. Optional fields left undefined fall back to the
 * framework-wide value when the command is dispatched.
 */
export interface CommandOptions<U> {
  /** Short description, shown inline in command listings. */
  inlineHelp?: string;
  multilineHelp?: string;
  hideInHelp?: boolean;
  requiredPermissions?: bigint;
  ownersOnly?: boolean;
  /** Re-run on edits of the trigger message and edit the previous response. */
  trackEdits: boolean;
  broadcastTyping?: BroadcastTypingBehavior;
  onError?: CommandErrorHandler<U>;
  check?: CommandCheck<U>;
}

export interface Command<U> {
  name: string;
  aliases: string[];
  action: CommandAction<U>;
  options: CommandOptions<U>;
  subcommands: Command<U>[];
  category?: string;
}

export interface CommandDefinition<U> {
  name: string;
  aliases?: string[];
  action: CommandAction<U>;
  options?: Partial<CommandOptions<U>>;
  subcommands?: Command<U>[];
  category?: string;
}

export function defineCommand<U>(definition: CommandDefinition<U>): Command<U> {
  if (/\s/.test(definition.name) || definition.name.length === 0) {
    throw new Error(`Invalid command name: "${definition.name}"`);
  }

  return {
    name: definition.name,
    aliases: definition.aliases ?? [],
    action: definition.action,
    options: {
      trackEdits: false,
      ...definition.options,
    },
    subcommands: definition.subcommands ?? [],
    category: definition.category,
  };
}
