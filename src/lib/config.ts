/**
 * Relay configuration: environment (optionally from .env) validated with zod,
 * then overridden by CLI flags. The resulting object is passed explicitly to
 * everything that needs it.
 */
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { BackoffPolicy } from './forwarder';

const boolFromEnv = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())));

const optionalUrl = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .pipe(z.string().url().optional());

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);
// setTimeout fires immediately above 2^31 - 1 ms.
const MAX_TIMER_MS = 2_147_483_647;
const timeoutMs = positiveInt.max(MAX_TIMER_MS);

const EnvSchema = z.object({
  RELAY_HOST: z.string().trim().min(1).default('0.0.0.0'),
  RELAY_PORT: z.coerce.number().int().min(0).max(65535).default(5050),
  CAPTURES_ROOT: z.string({ required_error: 'CAPTURES_ROOT is required' }).trim().min(1, 'CAPTURES_ROOT is required'),

  PROMPTS_URL: z.string({ required_error: 'PROMPTS_URL is required' }).trim().url(),
  PROMPTS_TIMEOUT_MS: timeoutMs.default(20_000),
  PROMPTS_MAX_ATTEMPTS: positiveInt.default(3),

  DETECTION_URL: z.string({ required_error: 'DETECTION_URL is required' }).trim().url(),
  DETECTION_TIMEOUT_MS: timeoutMs.default(45_000),
  DETECTION_MAX_ATTEMPTS: positiveInt.default(7),

  BACKOFF_STRATEGY: z.enum(['fixed', 'exponential']).default('exponential'),
  BACKOFF_BASE_MS: nonNegativeInt.max(MAX_TIMER_MS).default(500),
  BACKOFF_MAX_MS: nonNegativeInt.max(MAX_TIMER_MS).default(6_000),

  ANNOTATE_IN_SERVICE: boolFromEnv.default(false),

  INGEST_URL: optionalUrl.optional(),
  INGEST_TIMEOUT_MS: timeoutMs.default(8_000),
  INGEST_MAX_ATTEMPTS: positiveInt.default(3),

  DASHBOARD_REFRESH_URL: optionalUrl.optional(),
  DASHBOARD_REFRESH_TIMEOUT_MS: timeoutMs.default(3_000),
  DASHBOARD_REFRESH_MAX_ATTEMPTS: positiveInt.default(1),

  PUBLISH_ONLY_WITH_DETECTIONS: boolFromEnv.default(false),
  MAX_CONCURRENT_EVENTS: positiveInt.default(4),
  HISTORY_SIZE: positiveInt.default(200),
  DEBUG: boolFromEnv.default(false),
});

export type EnvOverrides = Partial<Record<keyof z.infer<typeof EnvSchema>, string | number | boolean>>;

export type HopConfig = {
  url: string;
  timeoutMs: number;
  maxAttempts: number;
};

export type RelayConfig = {
  host: string;
  port: number;
  capturesRoot: string;
  prompts: HopConfig;
  detection: HopConfig;
  backoff: BackoffPolicy;
  annotateInService: boolean;
  ingest?: HopConfig;
  dashboardRefresh?: HopConfig;
  publishOnlyWithDetections: boolean;
  maxConcurrentEvents: number;
  historySize: number;
  debug: boolean;
};

function pick(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Build the relay config. `overrides` use the same keys as the environment and
 * win over it (CLI flags are mapped onto them).
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: EnvOverrides = {}
): RelayConfig {
  const parsed = EnvSchema.safeParse({ ...pick(env), ...overrides });
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  if (e.BACKOFF_MAX_MS < e.BACKOFF_BASE_MS) {
    throw new ConfigError([`BACKOFF_MAX_MS (${e.BACKOFF_MAX_MS}) must be >= BACKOFF_BASE_MS (${e.BACKOFF_BASE_MS})`]);
  }

  return {
    host: e.RELAY_HOST,
    port: e.RELAY_PORT,
    capturesRoot: e.CAPTURES_ROOT,
    prompts: { url: e.PROMPTS_URL, timeoutMs: e.PROMPTS_TIMEOUT_MS, maxAttempts: e.PROMPTS_MAX_ATTEMPTS },
    detection: { url: e.DETECTION_URL, timeoutMs: e.DETECTION_TIMEOUT_MS, maxAttempts: e.DETECTION_MAX_ATTEMPTS },
    backoff: { strategy: e.BACKOFF_STRATEGY, baseDelayMs: e.BACKOFF_BASE_MS, maxDelayMs: e.BACKOFF_MAX_MS },
    annotateInService: e.ANNOTATE_IN_SERVICE,
    ingest: e.INGEST_URL
      ? { url: e.INGEST_URL, timeoutMs: e.INGEST_TIMEOUT_MS, maxAttempts: e.INGEST_MAX_ATTEMPTS }
      : undefined,
    dashboardRefresh: e.DASHBOARD_REFRESH_URL
      ? {
          url: e.DASHBOARD_REFRESH_URL,
          timeoutMs: e.DASHBOARD_REFRESH_TIMEOUT_MS,
          maxAttempts: e.DASHBOARD_REFRESH_MAX_ATTEMPTS,
        }
      : undefined,
    publishOnlyWithDetections: e.PUBLISH_ONLY_WITH_DETECTIONS,
    maxConcurrentEvents: e.MAX_CONCURRENT_EVENTS,
    historySize: e.HISTORY_SIZE,
    debug: e.DEBUG,
  };
}

/** Load `.env` (if present) into process.env, then build the config. */
export function loadConfigFromEnvironment(overrides: EnvOverrides = {}): RelayConfig {
  dotenv.config();
  return loadConfig(process.env, overrides);
}
