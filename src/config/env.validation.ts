import { z } from 'zod';

const mongoUrlRegex = /^mongodb(\+srv)?:\/\/.+/i;

export const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  // ---------- Mongo ----------
  MONGO_URL: z
    .string()
    .regex(
      mongoUrlRegex,
      'MONGO_URL must start with mongodb:// or mongodb+srv://',
    ),
  MONGO_DB: z.string().default('signal_alerts'),

  // ---------- Redis ----------
  REDIS_URL: z.string().default('redis://127.0.0.1:6379/0'),
  REDIS_TTL_DAYS: z.coerce.number().positive().default(7),
  REDIS_NAMESPACE: z.string().default('alerts'),

  // ---------- Market data ----------
  MARKET_BASE: z.string().url().default('https://query1.finance.yahoo.com'),
  MARKET_TIMEOUT_MS: z.coerce.number().positive().default(10000),
  MARKET_RETRY: z.coerce.number().int().min(0).max(5).default(3),
  MARKET_RETRY_BACKOFF_MS: z.coerce.number().positive().default(500),
  MARKET_TZ: z
    .string()
    .refine(isTimeZone, 'MARKET_TZ must be an IANA time zone')
    .default('America/New_York'),

  // ---------- Refresh ----------
  HISTORY_LOOKBACK_DAYS: z.coerce.number().int().min(120).default(730),
  REFRESH_RATE_LIMIT_MS: z.coerce.number().int().min(0).default(500),
  ENABLE_REFRESH_CRON: z.enum(['true', 'false']).default('true'),
  CRON_REFRESH: z.string().default('0 30 17 * * 1-5'),
});

export type Env = z.infer<typeof envSchema>;

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const lines = parsed.error.issues.map(
      (i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`,
    );
    throw new Error(`❌ Invalid environment variables:\n${lines.join('\n')}`);
  }
  return parsed.data;
}
