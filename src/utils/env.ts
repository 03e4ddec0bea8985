import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') => z
  .enum(['true', 'false', '1', '0'])
  .default(fallback)
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  // Prefix commands
  COMMAND_PREFIX: z.string().min(1).default('!'),
  MENTION_AS_PREFIX: booleanFlag('true'),
  CASE_INSENSITIVE_COMMANDS: booleanFlag('true'),
  EXECUTE_SELF_MESSAGES: booleanFlag('false'),

  // Comma-separated user ids, eg: "1234,5678"
  OWNER_IDS: z.string().default(''),

  // Edit tracking, 0 disables it entirely
  EDIT_TRACKING_MAX_AGE_SECONDS: z.coerce.number().int().min(0).default(3600),

  // Typing indicator delay; unset means commands never broadcast typing
  TYPING_DELAY_MS: z.coerce.number().int().min(0).optional(),

  // Discord REST adapter (optional; the core runs against any PlatformClient)
  DISCORD_BOT_TOKEN: z.string().optional(),
  DISCORD_APPLICATION_ID: z.string().regex(/^\d+$/, 'DISCORD_APPLICATION_ID must be a snowflake').optional(),

  // Infrastructure
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type AppConfig = Omit<z.infer<typeof envSchema>, 'OWNER_IDS'> & {
  OWNER_IDS: string[];
};

export type ConfigParseResult =
  | { ok: true; config: AppConfig }
  | { ok: false; issues: string[] };

export function parseConfig(env: NodeJS.ProcessEnv): ConfigParseResult {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  const ownerIds = Array.from(new Set(
    parsed.data.OWNER_IDS
      .split(',')
      .map((id) => id.trim())
      .filter(Boolean),
  ));

  const invalidOwners = ownerIds.filter((id) => !/^\d+$/.test(id));
  if (invalidOwners.length > 0) {
    return { ok: false, issues: [`OWNER_IDS: not a user id: ${invalidOwners.join(', ')}`] };
  }

  return {
    ok: true,
    config: {
      ...parsed.data,
      OWNER_IDS: ownerIds,
    },
  };
}
