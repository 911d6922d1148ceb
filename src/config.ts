import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { PostalTolerance } from './types.js';

const intFrom = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  BAD_DOMAINS_PATH: z.string().trim().min(1).default('data/bad_domains.csv'),
  CONCURRENCY: intFrom(8, 1, 256),
  POSTAL_TOLERANCE: z.enum(['either', 'one-side', 'none']).default('either'),
  PORT: intFrom(3000, 1, 65535),
  ORIGINS: z.string().default(''),
  LOG_LEVEL: LogLevelSchema.default('info'),
  DEBUG_API: z.string().optional(),
  RATE_LIMIT_MAX: intFrom(120, 1, 1_000_000),
  RATE_LIMIT_WINDOW_MS: intFrom(60_000, 1, 86_400_000),
  MAX_BATCH: intFrom(500, 1, 100_000),
});

export type AppConfig = {
  badDomainsPath: string;
  concurrency: number;
  postalTolerance: PostalTolerance;
  port: number;
  origins: string[];
  logLevel: LogLevel;
  debugApi: boolean;
  rateLimit: { max: number; windowMs: number };
  maxBatch: number;
};

/**
 * Read runtime settings from an environment map (normally `process.env`,
 * already populated by `dotenv/config` at the entry point).
 *
 * Empty strings count as unset so a blank line in `.env` keeps the default.
 *
 * @throws ConfigurationError when a value is present but invalid.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== '') present[k] = v;
  }
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    badDomainsPath: e.BAD_DOMAINS_PATH,
    concurrency: e.CONCURRENCY,
    postalTolerance: e.POSTAL_TOLERANCE,
    port: e.PORT,
    origins: e.ORIGINS.split(',').map((s) => s.trim()).filter(Boolean),
    logLevel: e.LOG_LEVEL,
    debugApi: Boolean(e.DEBUG_API && e.DEBUG_API !== '0'),
    rateLimit: { max: e.RATE_LIMIT_MAX, windowMs: e.RATE_LIMIT_WINDOW_MS },
    maxBatch: e.MAX_BATCH,
  };
}
