export { Framework, type FrameworkParams, type SetupCallback } from './core/framework.js';
export {
  createFrameworkOptions,
  defaultErrorHandler,
  effectiveBroadcastTyping,
  effectiveCheck,
  effectiveOwnersOnly,
  effectiveRequiredPermissions,
  optionsFromConfig,
  type EventListener,
  type FrameworkErrorHandler,
  type FrameworkOptions,
} from './core/options.js';
export {
  defineCommand,
  type BroadcastTypingBehavior,
  type Command,
  type CommandAction,
  type CommandCheck,
  type CommandDefinition,
  type CommandErrorHandler,
  type CommandOptions,
} from './core/commands.js';
export {
  contextAuthor,
  contextChannelId,
  contextGuildId,
  type Context,
  type InteractionContext,
  type PrefixContext,
} from './core/context.js';
export { describeErrorContext, type CommandErrorContext, type ErrorContext } from './core/errors.js';
export { EditTracker, startPurgeTask, PURGE_INTERVAL_MS, type PurgeTask, type TrackedExchange } from './core/edit-tracker.js';
export { findCommand, findCommandByPath, type CommandMatch } from './core/command-router.js';
export { literalPrefix, regexPrefix, stripPrefix, type DynamicPrefix, type Prefix } from './core/prefix.js';
export {
  ALL_PERMISSIONS,
  Permissions,
  checkPermissions,
  checkRequiredPermissionsAndOwnersOnly,
  hasPermissions,
} from './core/permissions.js';
export { say, sendReply, type CreateReply } from './core/reply.js';
export { OnceCell } from './core/once-cell.js';
export type * from './core/message.js';
export type * from './core/platform.js';

export { DiscordCache } from './platforms/discord/cache.js';
export { translateDispatch } from './platforms/discord/events.js';
export {
  DiscordApiError,
  createDiscordDemoPlatform,
  createDiscordPlatform,
  discordPlatformFromConfig,
  type DiscordDemoOutboxEntry,
} from './platforms/discord/adapter.js';
export { computeBasePermissions, computeChannelPermissions } from './platforms/discord/permissions.js';
export { parseConfig, type AppConfig } from './utils/env.js';
export { logger } from './middleware/logger.js';
