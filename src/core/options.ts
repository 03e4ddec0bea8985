import { logger } from '../middleware/logger.js';
import type { AppConfig } from '../utils/env.js';
import type { BroadcastTypingBehavior, Command, CommandCheck } from './commands.js';
import { EditTracker } from './edit-tracker.js';
import { describeErrorContext, type ErrorContext } from './errors.js';
import type { Framework } from './framework.js';
import type { AllowedMentions, FrameworkEvent } from './platform.js';
import type { DynamicPrefix, Prefix } from './prefix.js';

export type FrameworkErrorHandler<U> = (error: unknown, ctx: ErrorContext<U>) => Promise<void>;

/** Called for every event after the framework has handled it. */
export type EventListener<U> = (event: FrameworkEvent, framework: Framework<U>, data: U) => Promise<void>;

/**
 * Framework-wide settings. The object stays mutable after the framework is
 * built; command fallbacks read it on every dispatch.
 */
export interface FrameworkOptions<U> {
  /** Top-level commands in registration order. */
  commands: Command<U>[];
  /** Main literal prefix, tried before `additionalPrefixes`. */
  prefix?: string;
  additionalPrefixes: Prefix[];
  dynamicPrefix?: DynamicPrefix<U>;
  /** Treat a leading bot mention like a prefix. */
  mentionAsPrefix: boolean;
  /** Admission check for commands that don't set their own. */
  commandCheck?: CommandCheck<U>;
  /** Set to enable edit tracking. */
  editTracker?: EditTracker;
  broadcastTyping: BroadcastTypingBehavior;
  executeSelfMessages: boolean;
  caseInsensitiveCommands: boolean;
  /** User ids allowed to run owners-only commands. */
  owners: Set<string>;
  /** Default for commands that don't set `requiredPermissions`. */
  requiredPermissions: bigint;
  /** Default for commands that don't set `ownersOnly`. */
  ownersOnly: boolean;
  allowedMentions?: AllowedMentions;
  onError: FrameworkErrorHandler<U>;
  listener: EventListener<U>;
}

/**
 * Log-only error handler. Users are never told about failures unless a
 * custom handler does it.
 */
export async function defaultErrorHandler<U>(error: unknown, ctx: ErrorContext<U>): Promise<void> {
  logger.error({ err: error, ...describeErrorContext(ctx) }, 'Unhandled framework error');
}

export function createFrameworkOptions<U>(overrides: Partial<FrameworkOptions<U>> = {}): FrameworkOptions<U> {
  return {
    commands: [],
    additionalPrefixes: [],
    mentionAsPrefix: true,
    broadcastTyping: { kind: 'none' },
    executeSelfMessages: false,
    caseInsensitiveCommands: true,
    owners: new Set(),
    requiredPermissions: 0n,
    ownersOnly: false,
    onError: defaultErrorHandler,
    listener: async () => {},
    ...overrides,
  };
}

/**
 * Framework defaults taken from the environment configuration.
 */
export function optionsFromConfig<U>(config: AppConfig): Partial<FrameworkOptions<U>> {
  return {
    prefix: config.COMMAND_PREFIX,
    mentionAsPrefix: config.MENTION_AS_PREFIX,
    caseInsensitiveCommands: config.CASE_INSENSITIVE_COMMANDS,
    executeSelfMessages: config.EXECUTE_SELF_MESSAGES,
    owners: new Set(config.OWNER_IDS),
    broadcastTyping: config.TYPING_DELAY_MS === undefined
      ? { kind: 'none' }
      : { kind: 'withDelay', delayMs: config.TYPING_DELAY_MS },
    editTracker: config.EDIT_TRACKING_MAX_AGE_SECONDS > 0
      ? EditTracker.forTimespan(config.EDIT_TRACKING_MAX_AGE_SECONDS * 1000)
      : undefined,
  };
}

// ── Effective settings (command value, else framework value) ───────

export function effectiveRequiredPermissions<U>(command: Command<U>, options: FrameworkOptions<U>): bigint {
  return command.options.requiredPermissions ?? options.requiredPermissions;
}

export function effectiveOwnersOnly<U>(command: Command<U>, options: FrameworkOptions<U>): boolean {
  return command.options.ownersOnly ?? options.ownersOnly;
}

export function effectiveBroadcastTyping<U>(command: Command<U>, options: FrameworkOptions<U>): BroadcastTypingBehavior {
  return command.options.broadcastTyping ?? options.broadcastTyping;
}

export function effectiveCheck<U>(command: Command<U>, options: FrameworkOptions<U>): CommandCheck<U> | undefined {
  return command.options.check ?? options.commandCheck;
}
