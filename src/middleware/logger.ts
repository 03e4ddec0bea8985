import pino from 'pino';
import { envSchema } from '../utils/env.js';

type LogLevel = ReturnType<typeof envSchema.shape.LOG_LEVEL.parse>;

/** Level from `LOG_LEVEL`; anything unrecognized falls back to info. */
export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const parsed = envSchema.shape.LOG_LEVEL.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}

export const logger = pino({
  level: resolveLogLevel(process.env),
  base: { service: 'chatframe' },
});
