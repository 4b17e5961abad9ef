import 'dotenv/config';
import { z } from 'zod';
import { SEARCH_LIMITS, SESSION_DEFAULTS } from './search/constants';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  API_KEY: z.string().optional(),
  RATE_LIMIT_MAX: z.coerce.number().default(100),
  RATE_LIMIT_WINDOW: z.coerce.number().default(60_000),
  CORS_ORIGINS: z.string().optional(),
  SEARCH_TS_CONFIG: z
    .string()
    .regex(/^[a-z_]+$/, 'SEARCH_TS_CONFIG must be a text search configuration name')
    .default('simple'),
  PAGE_SIZE: z.coerce.number().int().positive().max(SEARCH_LIMITS.max).default(SEARCH_LIMITS.default),
  SEARCH_PAGE_SIZE: z.coerce.number().int().positive().max(SEARCH_LIMITS.max).optional(),
  LATEST_COUNT: z.coerce.number().int().positive().max(SEARCH_LIMITS.max).optional(),
  SESSION_MAX_ENTRIES: z.coerce.number().int().positive().default(SESSION_DEFAULTS.maxEntries),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(SESSION_DEFAULTS.ttlMs),
  ARCHIVE_AFTER_DAYS: z.coerce.number().int().positive().default(30),
  DEBUG_SEARCH: z
    .string()
    .optional()
    .transform((v) => v === '1' || v === 'true')
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('❌ Invalid environment configuration', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const corsOrigins =
  parsed.data.CORS_ORIGINS?.split(',').map((o) => o.trim()).filter(Boolean) ?? [];

export const config = {
  ...parsed.data,
  searchPageSize: parsed.data.SEARCH_PAGE_SIZE ?? parsed.data.PAGE_SIZE,
  latestCount: parsed.data.LATEST_COUNT ?? parsed.data.PAGE_SIZE,
  corsOrigins
};
