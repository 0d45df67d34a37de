/**
 * Environment Configuration
 *
 * Validates and exports typed environment variables using Zod.
 * Fails fast on startup if required variables are missing or invalid.
 *
 * Usage:
 *   import { getEnv } from '../config/env';
 *   const { BET_COST } = getEnv(); // number, guaranteed to be valid
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Schema Definition
// ─────────────────────────────────────────────────────────────────────────────

/** Treats `FOO=` in a .env file the same as an unset variable. */
function blankAsUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const optionalUrl = z.preprocess(blankAsUndefined, z.string().url().optional());
const optionalString = z.preprocess(blankAsUndefined, z.string().min(1).optional());

const booleanFlag = z
  .enum(['true', 'false', 'TRUE', 'FALSE', '1', '0'])
  .default('true')
  .transform((val) => val.toLowerCase() === 'true' || val === '1');

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
  PUBLIC_WEBHOOK_BASE_URL: optionalUrl,

  // Twilio (required)
  TWILIO_ACCOUNT_SID: z.string().min(1, 'TWILIO_ACCOUNT_SID is required'),
  TWILIO_AUTH_TOKEN: z.string().min(1, 'TWILIO_AUTH_TOKEN is required'),
  TWILIO_PHONE_NUMBER: z.string().min(1, 'TWILIO_PHONE_NUMBER is required'),
  TWILIO_WEBHOOK_SECRET: z.string().min(1, 'TWILIO_WEBHOOK_SECRET is required'),

  // Sports data gateway (required)
  DATA_GATEWAY_BASE_URL: z.string().url('DATA_GATEWAY_BASE_URL must be a URL'),
  DATA_GATEWAY_TOKEN: z.string().min(1, 'DATA_GATEWAY_TOKEN is required'),
  DATA_GATEWAY_TIMEOUT_MS: z.coerce.number().int().min(500).default(5000),

  // Supabase account store (optional)
  SUPABASE_URL: optionalUrl,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,

  // Redis conversation store / locks / outbound queue (optional)
  REDIS_URL: optionalString,
  OUTBOUND_QUEUE_CONCURRENCY: z.coerce.number().int().positive().default(5),

  // Betting
  BET_COST: z.coerce.number().int().positive().default(10),
  STARTING_BALANCE: z.coerce.number().int().min(0).default(500),
  SEED_BET_COST: z.coerce.number().int().positive().default(10),
  SEED_PLACEHOLDER_BETS: booleanFlag,
  RECENT_BETS_LIMIT: z.coerce.number().int().positive().default(5),

  // Conversation
  CONVERSATION_TTL_SECONDS: z.coerce.number().int().min(60).default(60 * 60),
  CONVERSATION_LOCK_TTL_MS: z.coerce.number().int().min(1000).default(15_000),
  CONVERSATION_LOCK_WAIT_MS: z.coerce.number().int().min(100).default(10_000),
  INBOUND_DEDUPE_TTL_SECONDS: z.coerce.number().int().min(60).default(60 * 60 * 24),
  INBOUND_PROCESSING_TTL_SECONDS: z.coerce.number().int().min(10).default(60),
});

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/**
 * Get the validated environment configuration.
 * Parses on first call and caches the result.
 * Throws if validation fails.
 */
export function getEnv(): Env {
  if (_env) {
    return _env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`❌ Environment validation failed:\n${errors}`);
  }

  _env = result.data;
  return _env;
}

/**
 * Validate the environment once at process start.
 * Exits the process when a required value is missing.
 */
export function assertEnvOnStartup(): Env {
  try {
    return getEnv();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
