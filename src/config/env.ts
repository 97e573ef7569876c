/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';

// Load .env file
dotenv.config();

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

// z.coerce.boolean() treats "false" as true
const booleanFlag = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value !== 'string') return value;
    const normalized = value.trim().toLowerCase();
    if (normalized === '') return undefined;
    return normalized === 'true' || normalized === '1';
  }, z.boolean().default(defaultValue));

export const envSchema = z.object({
  // ===== Server Configuration =====
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  PUBLIC_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  ENABLE_CORS: booleanFlag(true),
  ADMIN_API_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),

  // ===== Storage Configuration =====
  MEDIA_ROOT: z.string().min(1).default('./media'),
  VOICE_DIR: z.string().regex(/^[A-Za-z0-9_-]+$/, 'VOICE_DIR must be a single directory name').default('voice'),
  DATA_DIR: z.string().min(1).default('./data'),
  CSV_LOCK_TIMEOUT: z.coerce.number().int().positive().default(5000),

  // ===== Conversion Configuration =====
  DEFAULT_LANGUAGE: z.string().regex(/^[a-z]{2,3}(-[A-Za-z]{2,4})?$/).default('en'),
  TEXT_MAX_LENGTH: z.coerce.number().int().positive().default(700),

  // ===== TTS Providers =====
  TTS_PROVIDER: z.enum(['google', 'openai', 'coqui']).default('google'),
  TTS_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  TTS_VOICE: z.string().default('alloy'),
  TTS_SPEED: z.coerce.number().min(0.25).max(4).default(1.0),

  // OpenAI (only registered when a key is present)
  OPENAI_API_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  OPENAI_TTS_MODEL: z.string().default('tts-1'),

  // Coqui TTS server
  TTS_COQUI_ENABLED: booleanFlag(false),
  TTS_COQUI_URL: z.string().url().default('http://localhost:5002'),
  TTS_COQUI_VOICE: z.string().default('thorsten')
});

export type Env = z.infer<typeof envSchema>;

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Environment validation failed:');
  parsed.error.issues.forEach((issue) => {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
  });
  process.exit(1);
}

export const env = parsed.data;

export const publicBaseUrl = (env.PUBLIC_BASE_URL ?? `http://localhost:${env.PORT}`).replace(/\/$/, '');
