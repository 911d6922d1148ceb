import { pino } from 'pino';
import type { Logger } from 'pino';
import { LogLevelSchema } from '../config.js';
import type { LogLevel } from '../config.js';

export type { Logger };

/** A level pino accepts; anything else falls back to `info`. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

/**
 * Process-wide logger. Fastify builds its own pino instance for request logs
 * (see `buildApp`); everything outside the request cycle logs through here.
 * Entry points set the validated `config.logLevel` once the config is loaded.
 */
export const logger: Logger = pino({
  name: 'shell-link',
  level: resolveLogLevel(process.env.LOG_LEVEL),
});

export function childLogger(scope: string): Logger {
  return logger.child({ scope });
}
