import { z } from 'zod';
import pino, { type LevelWithSilent } from 'pino';
import 'dotenv/config';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

// ─── Environment Schema ───────────────────────────────────────────────
const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  DB_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // JWT
  JWT_SECRET: z.string().min(32),
  JWT_EXPIRY: z
    .string()
    .regex(/^\d+[smhd]$/, 'Must look like "45m", "8h" or "1d"')
    .default('8h'),

  // Requisition codes
  REQUISITION_CODE_TIMEZONE: z
    .string()
    .default('UTC')
    .refine(isTimeZone, { message: 'Must be an IANA time zone, e.g. "UTC" or "America/Bogota"' }),
  REQUISITION_CODE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),

  // History / reporting
  HISTORY_DEFAULT_LIMIT: z.coerce.number().int().positive().default(100),
  HISTORY_MAX_LIMIT: z.coerce.number().int().positive().default(500),

  // Demo seed
  SEED_DEFAULT_PASSWORD: z.string().min(4).default('change-me'),

  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  APP_URL: z.string().url().default('http://localhost:5173'),
  CORS_ORIGINS: z.string().default(''),
  PORT: z.coerce.number().default(3010),
});

// ─── Parse & Validate ─────────────────────────────────────────────────
function loadConfig() {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment configuration');
  }
  if (parsed.data.HISTORY_DEFAULT_LIMIT > parsed.data.HISTORY_MAX_LIMIT) {
    throw new Error('HISTORY_DEFAULT_LIMIT must not exceed HISTORY_MAX_LIMIT');
  }
  return parsed.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof envSchema>;

/** Origins allowed by CORS: APP_URL plus any comma-separated extras. */
export const corsOrigins: string[] = [
  config.APP_URL,
  ...config.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
];

const EXPIRY_UNIT_SECONDS = { s: 1, m: 60, h: 3600, d: 86400 } as const;

function isExpiryUnit(unit: string): unit is keyof typeof EXPIRY_UNIT_SECONDS {
  return unit in EXPIRY_UNIT_SECONDS;
}

/** Convert a duration such as "8h" into seconds. */
export function durationToSeconds(duration: string): number {
  const unit = duration.slice(-1);
  const amount = Number.parseInt(duration.slice(0, -1), 10);
  if (!isExpiryUnit(unit) || !Number.isFinite(amount)) {
    throw new Error(`Invalid duration "${duration}"`);
  }
  return amount * EXPIRY_UNIT_SECONDS[unit];
}

/** Access token lifetime in seconds, from JWT_EXPIRY. */
export const jwtExpirySeconds = durationToSeconds(config.JWT_EXPIRY);

// ─── Structured Logger Factory ───────────────────────────────────────
function logLevel(): LevelWithSilent {
  switch (config.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    case 'development':
      return 'debug';
  }
}

export function createLogger(name: string) {
  return pino({
    name,
    level: logLevel(),
    ...(config.NODE_ENV === 'development' && {
      transport: { target: 'pino/file', options: { destination: 1 } },
      formatters: { level: (label: string) => ({ level: label }) },
    }),
  });
}

export type Logger = ReturnType<typeof createLogger>;
