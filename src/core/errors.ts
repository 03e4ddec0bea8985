import type { Command } from './commands.js';
import type { Context } from './context.js';
import type { FrameworkEvent } from './platform.js';

/** Handed to error handlers alongside a command's error. */
export interface CommandErrorContext<U> {
  /** True when the error came from an admission check rather than the action. */
  whileChecking: boolean;
  command: Command<U>;
  ctx: Context<U>;
}

export type ErrorContext<U> =
  | { type: 'setup' }
  | { type: 'listener'; event: FrameworkEvent }
  | { type: 'command'; context: CommandErrorContext<U> };

/**
 * Flat description of an error context for structured logs.
 */
export function describeErrorContext<U>(errorContext: ErrorContext<U>): Record<string, unknown> {
  switch (errorContext.type) {
    case 'setup':
      return { origin: 'setup' };
    case 'listener':
      return { origin: 'listener', event: errorContext.event.type };
    case 'command': {
      const { command, ctx, whileChecking } = errorContext.context;
      return {
        origin: 'command',
        trigger: ctx.kind,
        command: command.name,
        phase: whileChecking ? 'check' : 'execute',
        ...(ctx.kind === 'prefix'
          ? { messageId: ctx.msg.id, channelId: ctx.msg.channelId, isEdit: ctx.isEdit }
          : { interactionId: ctx.interaction.id, channelId: ctx.interaction.channelId }),
      };
    }
  }
}
