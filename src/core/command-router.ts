import type { Command } from './commands.js';

export interface CommandMatch<U> {
  command: Command<U>;
  /** Text after the deepest matched command name, leading whitespace trimmed. */
  args: string;
  /** Names of the matched commands from the top level down. */
  path: string[];
}

/** Split off the first whitespace-delimited token. */
export function splitFirstWord(text: string): [string, string] {
  const trimmed = text.trimStart();
  const match = /\s/.exec(trimmed);
  if (!match) return [trimmed, ''];
  return [trimmed.slice(0, match.index), trimmed.slice(match.index).trimStart()];
}

export function commandMatchesName<U>(command: Command<U>, name: string, caseInsensitive: boolean): boolean {
  if (caseInsensitive) {
    const lowered = name.toLowerCase();
    return command.name.toLowerCase() === lowered
      || command.aliases.some((alias) => alias.toLowerCase() === lowered);
  }
  return command.name === name || command.aliases.includes(name);
}

/**
 * Resolve the command addressed by `text` (the message content after the
 * prefix). The first command in registration order whose name or alias
 * equals the first word wins; subcommands are followed as deep as the
 * following words keep matching.
 */
export function findCommand<U>(
  commands: readonly Command<U>[],
  text: string,
  caseInsensitive: boolean,
): CommandMatch<U> | null {
  const [name, rest] = splitFirstWord(text);
  if (!name) return null;

  const command = commands.find((candidate) => commandMatchesName(candidate, name, caseInsensitive));
  if (!command) return null;

  const sub = findCommand(command.subcommands, rest, caseInsensitive);
  if (sub) {
    return { command: sub.command, args: sub.args, path: [command.name, ...sub.path] };
  }

  return { command, args: rest, path: [command.name] };
}

/**
 * Resolve a command from an exact name path, eg: `['config', 'set']` for an
 * application command with a subcommand.
 */
export function findCommandByPath<U>(
  commands: readonly Command<U>[],
  path: readonly string[],
): Command<U> | null {
  let level = commands;
  let found: Command<U> | null = null;
  for (const name of path) {
    found = level.find((candidate) => candidate.name === name) ?? null;
    if (!found) return null;
    level = found.subcommands;
  }
  return found;
}
