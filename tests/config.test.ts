import { describe, it, expect } from 'vitest';

import { createFrameworkOptions, optionsFromConfig } from '../src/core/options.js';
import { resolveLogLevel } from '../src/middleware/logger.js';
import { parseConfig, type AppConfig } from '../src/utils/env.js';

function parsed(env: Record<string, string>): AppConfig {
  const result = parseConfig(env);
  if (!result.ok) throw new Error(result.issues.join('\n'));
  return result.config;
}

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parsed({})).toEqual({
      COMMAND_PREFIX: '!',
      MENTION_AS_PREFIX: true,
      CASE_INSENSITIVE_COMMANDS: true,
      EXECUTE_SELF_MESSAGES: false,
      OWNER_IDS: [],
      EDIT_TRACKING_MAX_AGE_SECONDS: 3600,
      LOG_LEVEL: 'info',
    });
  });

  it('parses flags and owner lists', () => {
    const config = parsed({
      MENTION_AS_PREFIX: '0',
      EXECUTE_SELF_MESSAGES: 'true',
      OWNER_IDS: ' 123, 456 ,123,',
      TYPING_DELAY_MS: '1500',
    });

    expect(config.MENTION_AS_PREFIX).toBe(false);
    expect(config.EXECUTE_SELF_MESSAGES).toBe(true);
    expect(config.OWNER_IDS).toEqual(['123', '456']);
    expect(config.TYPING_DELAY_MS).toBe(1500);
  });

  it('reports invalid values', () => {
    expect(parseConfig({ MENTION_AS_PREFIX: 'yes' }).ok).toBe(false);
    expect(parseConfig({ EDIT_TRACKING_MAX_AGE_SECONDS: '-1' }).ok).toBe(false);
    expect(parseConfig({ OWNER_IDS: '123,alice' })).toEqual({
      ok: false,
      issues: ['OWNER_IDS: not a user id: alice'],
    });
  });
});

describe('optionsFromConfig', () => {
  it('maps configuration onto framework options', () => {
    const options = createFrameworkOptions(optionsFromConfig(parsed({
      COMMAND_PREFIX: '?',
      OWNER_IDS: '123',
      EDIT_TRACKING_MAX_AGE_SECONDS: '60',
      TYPING_DELAY_MS: '0',
    })));

    expect(options.prefix).toBe('?');
    expect(options.owners).toEqual(new Set(['123']));
    expect(options.editTracker?.maxDurationMs).toBe(60_000);
    expect(options.broadcastTyping).toEqual({ kind: 'withDelay', delayMs: 0 });
  });

  it('turns edit tracking off at a zero max age', () => {
    const options = createFrameworkOptions(optionsFromConfig(parsed({ EDIT_TRACKING_MAX_AGE_SECONDS: '0' })));

    expect(options.editTracker).toBeUndefined();
    expect(options.broadcastTyping).toEqual({ kind: 'none' });
  });
});

describe('resolveLogLevel', () => {
  it('reads a valid LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'debug' })).toBe('debug');
  });

  it('falls back to info instead of exiting', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'warning' })).toBe('info');
    expect(resolveLogLevel({})).toBe('info');
  });
});

describe('library entry point', () => {
  it('does not validate the process environment on import', async () => {
    const entry = await import('../src/index.js');

    expect('config' in entry).toBe(false);
    expect(entry.parseConfig({ OWNER_IDS: 'alice' }).ok).toBe(false);
  });
});

describe('bot config', () => {
  it('validates the process environment on import', async () => {
    const { config } = await import('../src/utils/config.js');

    expect(config.LOG_LEVEL).toBe('silent');
  });
});
