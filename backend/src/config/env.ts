/**
 * Environment Configuration
 * =========================
 *
 * Single typed view over process.env. Parsed once at import time;
 * an invalid value fails startup instead of surfacing mid-cycle.
 */

import 'dotenv/config';
import { z } from 'zod';

const bool = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),
  WS_ENABLED: bool(true),

  // ═══════════════════════════════════════════════════════════════
  // STORAGE
  // ═══════════════════════════════════════════════════════════════
  MONGO_URL: z.string().default('mongodb://localhost:27017'),
  DB_NAME: z.string().default('live_match_alerts'),

  // ═══════════════════════════════════════════════════════════════
  // UPSTREAM (API-Football)
  // ═══════════════════════════════════════════════════════════════
  FOOTBALL_API_URL: z.string().url().default('https://v3.football.api-sports.io'),
  FOOTBALL_API_KEY: z.string().default(''),
  FOOTBALL_API_MAX_CONCURRENT: z.coerce.number().int().min(1).default(5),
  FOOTBALL_API_MIN_TIME_MS: z.coerce.number().int().min(0).default(100),
  FOOTBALL_API_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  // ═══════════════════════════════════════════════════════════════
  // ALERT ENGINE
  // ═══════════════════════════════════════════════════════════════
  ALERT_ENGINE_ENABLED: bool(true),
  ALERT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  ALERT_ERROR_BACKOFF_MS: z.coerce.number().int().positive().default(30_000),

  // ═══════════════════════════════════════════════════════════════
  // DISPATCH
  // ═══════════════════════════════════════════════════════════════
  SMS_ENABLED: bool(false),
  TWILIO_ACCOUNT_SID: z.string().default(''),
  TWILIO_AUTH_TOKEN: z.string().default(''),
  TWILIO_FROM_NUMBER: z.string().default(''),

  // ═══════════════════════════════════════════════════════════════
  // PATTERNS
  // ═══════════════════════════════════════════════════════════════
  PATTERN_BUFFER_SIZE: z.coerce.number().int().min(4).default(50),
  PATTERN_RETENTION_MS: z.coerce.number().int().positive().default(2 * 60 * 60 * 1000),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }
  return Object.freeze(result.data);
}

export const env: Env = parseEnv(process.env);
