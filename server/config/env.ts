// =============================================================
// File: server/config/env.ts
// Description: Loads .env and validates process.env once at
//              start-up. Everything else reads config from `env`.
// =============================================================

import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_API_PORT, DEFAULT_DB_PORT } from '../../shared/constants';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

// Blank lines in .env (`KEY=`) count as unset
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);
const optionalString = z.preprocess(blankAsUnset, z.string().optional());
const optionalUrl = z.preprocess(blankAsUnset, z.string().url().optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().positive().default(DEFAULT_API_PORT),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // ── Database ──
  DB_CLIENT: z.enum(['pg', 'better-sqlite3']).default('pg'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(DEFAULT_DB_PORT),
  DB_NAME: z.string().default('stationery_backoffice'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  /** SQLite database file, or `:memory:` */
  DB_FILENAME: z.string().default('./data/stationery.sqlite'),

  // ── Auth ──
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required').default('dev-secret-change-in-production'),
  /** Token lifetime in seconds */
  JWT_EXPIRES_IN: z.coerce.number().int().positive().default(86400),

  // ── Business rules ──
  /** IANA zone used for calendar dates (due dates, daily summaries) */
  BUSINESS_TIMEZONE: z.string().default('Africa/Dar_es_Salaam'),
  CURRENCY_CODE: z.string().default('TZS'),
  DEBT_DUE_DAYS: z.coerce.number().int().nonnegative().default(7),
  DEFAULT_COUNTRY_CODE: z.string().regex(/^\d+$/, 'DEFAULT_COUNTRY_CODE must be digits').default('255'),

  // ── Messaging ──
  AFRICASTALKING_USERNAME: optionalString,
  AFRICASTALKING_API_KEY: optionalString,
  AFRICASTALKING_SENDER_ID: optionalString,
  AFRICASTALKING_BASE_URL: z.string().url().default('https://api.africastalking.com'),
  WHATSAPP_API_URL: optionalUrl,
  WHATSAPP_API_TOKEN: optionalString,
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return parsed.data;
}

export const env = loadEnv();

export const isProduction = env.NODE_ENV === 'production';
export const isTest = env.NODE_ENV === 'test';
