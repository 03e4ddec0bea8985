/**
 * Prefix resolution: decide whether a message is addressed to the bot and
 * strip the trigger off its content.
 *
 * Rules are tried in order and the first match wins:
 * 1. Messages from the bot itself are ignored unless `executeSelfMessages`
 * 2. Main prefix, then additional prefixes in registration order
 * 3. A leading mention of the bot (`<@id>` / `<@!id>`), if `mentionAsPrefix`
 * 4. The dynamic prefix callback
 */

import type { FrameworkOptions } from './options.js';
import type { Message } from './message.js';
import type { PlatformClient } from './platform.js';

export type Prefix =
  /** Case-sensitive literal, stripped as-is. */
  | { kind: 'literal'; value: string }
  /** Pattern that must match at the start of the content; the whole match is stripped. */
  | { kind: 'regex'; pattern: RegExp };

/**
 * Dynamic prefix callback, eg: per-guild prefixes from application state.
 * Returns the content with the prefix stripped, or null when it doesn't apply.
 */
export type DynamicPrefix<U> = (params: {
  platform: PlatformClient;
  msg: Message;
  data: U;
}) => Promise<string | null>;

export type PrefixSettings<U> = Pick<
  FrameworkOptions<U>,
  'prefix' | 'additionalPrefixes' | 'mentionAsPrefix' | 'dynamicPrefix' | 'executeSelfMessages'
>;

export function literalPrefix(value: string): Prefix {
  if (value.length === 0) throw new Error('Literal prefix must not be empty');
  return { kind: 'literal', value };
}

export function regexPrefix(pattern: RegExp | string): Prefix {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  // g/y would make exec() stateful across messages
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  return { kind: 'regex', pattern: new RegExp(source, flags) };
}

const MENTION_REGEX = /^<@!?(\d+)>/;

export function stripMention(content: string, botId: string | null): string | null {
  if (!botId) return null;
  const match = MENTION_REGEX.exec(content);
  if (!match || match[1] !== botId) return null;
  return content.slice(match[0].length);
}

export function stripStaticPrefix(content: string, prefix: Prefix): string | null {
  if (prefix.kind === 'literal') {
    return content.startsWith(prefix.value) ? content.slice(prefix.value.length) : null;
  }

  const match = prefix.pattern.exec(content);
  if (!match || match.index !== 0) return null;
  return content.slice(match[0].length);
}

/**
 * @returns the content after the trigger (leading whitespace trimmed), or null
 *   when the message is not a command invocation
 */
export async function stripPrefix<U>(params: {
  msg: Message;
  settings: PrefixSettings<U>;
  botId: string | null;
  platform: PlatformClient;
  data: U;
}): Promise<string | null> {
  const { msg, settings, botId } = params;

  if (!settings.executeSelfMessages && botId !== null && msg.author.id === botId) {
    return null;
  }

  const staticPrefixes: Prefix[] = settings.prefix
    ? [literalPrefix(settings.prefix), ...settings.additionalPrefixes]
    : settings.additionalPrefixes;

  for (const prefix of staticPrefixes) {
    const rest = stripStaticPrefix(msg.content, prefix);
    if (rest !== null) return rest.trimStart();
  }

  if (settings.mentionAsPrefix) {
    const rest = stripMention(msg.content, botId);
    if (rest !== null) return rest.trimStart();
  }

  if (settings.dynamicPrefix) {
    const rest = await settings.dynamicPrefix({ platform: params.platform, msg, data: params.data });
    if (rest !== null) return rest.trimStart();
  }

  return null;
}
