// server/src/config/env.ts
import 'dotenv/config';
import { z } from 'zod';

const booleanish = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === 'boolean' ? v : ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase())));

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  JWT_EXPIRES_IN_MINUTES: z.coerce.number().int().positive().default(30),
  PORT: z.coerce.number().int().positive().default(8000),
  APP_NAME: z.string().default('piecework-backend'),
  APP_VERSION: z.string().default('0.1.0'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  QUOTA_CHECK_ENABLED: booleanish.default(false),
  // Timestamps are bucketed into business days at this offset (UTC+8 by default)
  BUSINESS_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(480),
});

export interface AppConfig {
  databaseUrl: string;
  jwtSecret: string;
  jwtExpiresInMinutes: number;
  port: number;
  appName: string;
  appVersion: string;
  maxUploadBytes: number;
  quotaCheckEnabled: boolean;
  businessUtcOffsetMinutes: number;
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  if (cached) return cached;

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const env = parsed.data;
  cached = {
    databaseUrl: env.DATABASE_URL,
    jwtSecret: env.JWT_SECRET,
    jwtExpiresInMinutes: env.JWT_EXPIRES_IN_MINUTES,
    port: env.PORT,
    appName: env.APP_NAME,
    appVersion: env.APP_VERSION,
    maxUploadBytes: Math.floor(env.MAX_UPLOAD_MB * 1024 * 1024),
    quotaCheckEnabled: env.QUOTA_CHECK_ENABLED,
    businessUtcOffsetMinutes: env.BUSINESS_UTC_OFFSET_MINUTES,
  };
  return cached;
}

/** Drops the cached config so the next call re-reads process.env. */
export function resetConfig() {
  cached = undefined;
}
