/**
 * Client Options
 *
 * Merges explicit config with TRACEBATCH_* environment variables, applies
 * defaults and validates the result. Fails fast with ConfigError.
 */

import { z } from 'zod';
import type { ClientConfig, Credentials, FailureHandler, RedactionConfig, ServiceConfig } from './types';
import type { Transport } from './transport';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './transport';
import { ConfigError } from './errors';
import { DEFAULT_BATCH_SIZE, DEFAULT_FLUSH_INTERVAL_MS, DEFAULT_MAX_CONCURRENT_SENDS } from './queue';

export const DEFAULT_ENDPOINT = 'https://cloud.langfuse.com';
const DEFAULT_API_KEY_HEADER = 'Authorization';

/** Largest delay setTimeout/setInterval honour; larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

// ─────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────

const envFlag = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  TRACEBATCH_PUBLIC_KEY: z.string().optional(),
  TRACEBATCH_SECRET_KEY: z.string().optional(),
  TRACEBATCH_API_KEY: z.string().optional(),
  TRACEBATCH_HOST: z.string().url().optional(),
  TRACEBATCH_BATCH_SIZE: z.coerce.number().int().min(1).optional(),
  TRACEBATCH_FLUSH_INTERVAL_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).optional(),
  TRACEBATCH_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).optional(),
  TRACEBATCH_DISABLED: envFlag.optional(),
  TRACEBATCH_DEBUG: envFlag.optional(),
});

const settingsSchema = z.object({
  endpoint: z.string().url(),
  batchSize: z.number().int().min(1),
  flushIntervalMs: z.number().positive().max(MAX_TIMER_MS),
  requestTimeoutMs: z.number().positive().max(MAX_TIMER_MS),
  maxConcurrentSends: z.number().int().min(1),
});

export type EnvSettings = z.infer<typeof envSchema>;

// ─────────────────────────────────────────────────────────────
// Resolved shapes
// ─────────────────────────────────────────────────────────────

export interface ResolvedConfig {
  disabled: false;
  debug: boolean;
  credentials: Credentials;
  endpoint: string;
  batchSize: number;
  flushIntervalMs: number;
  requestTimeoutMs: number;
  maxConcurrentSends: number;
  service?: ServiceConfig;
  redaction?: RedactionConfig;
  onError?: FailureHandler;
  fetch?: typeof fetch;
  transport?: Transport;
}

export interface DisabledConfig {
  disabled: true;
  debug: boolean;
}

// ─────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────

/**
 * Parse the TRACEBATCH_* variables out of an environment. Empty values
 * count as unset.
 */
export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('TRACEBATCH_') && value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError('INVALID_CONFIG', `Invalid environment: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Merge config over environment and validate.
 * @throws ConfigError for missing credentials or out-of-range settings
 */
export function resolveConfig(
  config: ClientConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig | DisabledConfig {
  const fromEnv = readEnv(env);
  const debug = config.debug ?? fromEnv.TRACEBATCH_DEBUG ?? false;

  if (config.disabled ?? fromEnv.TRACEBATCH_DISABLED ?? false) {
    return { disabled: true, debug };
  }

  const credentials = resolveCredentials({
    publicKey: config.publicKey ?? fromEnv.TRACEBATCH_PUBLIC_KEY,
    secretKey: config.secretKey ?? fromEnv.TRACEBATCH_SECRET_KEY,
    apiKey: config.apiKey ?? fromEnv.TRACEBATCH_API_KEY,
    apiKeyHeader: config.apiKeyHeader,
  });

  const settings = settingsSchema.safeParse({
    endpoint: config.endpoint ?? fromEnv.TRACEBATCH_HOST ?? DEFAULT_ENDPOINT,
    batchSize: config.batchSize ?? fromEnv.TRACEBATCH_BATCH_SIZE ?? DEFAULT_BATCH_SIZE,
    flushIntervalMs: config.flushIntervalMs ?? fromEnv.TRACEBATCH_FLUSH_INTERVAL_MS ?? DEFAULT_FLUSH_INTERVAL_MS,
    requestTimeoutMs: config.requestTimeoutMs ?? fromEnv.TRACEBATCH_REQUEST_TIMEOUT_MS ?? DEFAULT_REQUEST_TIMEOUT_MS,
    maxConcurrentSends: config.maxConcurrentSends ?? DEFAULT_MAX_CONCURRENT_SENDS,
  });
  if (!settings.success) {
    throw new ConfigError('INVALID_CONFIG', `Invalid config: ${formatIssues(settings.error)}`);
  }

  return {
    disabled: false,
    debug,
    credentials,
    ...settings.data,
    endpoint: settings.data.endpoint.replace(/\/+$/, ''),
    service: config.service,
    redaction: config.redaction,
    onError: config.onError,
    fetch: config.fetch,
    transport: config.transport,
  };
}

interface CredentialInput {
  publicKey?: string;
  secretKey?: string;
  apiKey?: string;
  apiKeyHeader?: string;
}

/**
 * A public/secret pair wins over an API key.
 */
export function resolveCredentials(input: CredentialInput): Credentials {
  const { publicKey, secretKey, apiKey } = input;

  if (publicKey && secretKey) {
    return { type: 'basic', publicKey, secretKey };
  }
  if (apiKey) {
    return { type: 'apiKey', apiKey, header: input.apiKeyHeader ?? DEFAULT_API_KEY_HEADER };
  }
  if (publicKey) {
    throw new ConfigError('MISSING_SECRET_KEY', 'Missing secret key. Set secretKey or TRACEBATCH_SECRET_KEY.');
  }
  if (secretKey) {
    throw new ConfigError('MISSING_PUBLIC_KEY', 'Missing public key. Set publicKey or TRACEBATCH_PUBLIC_KEY.');
  }
  throw new ConfigError(
    'MISSING_CREDENTIALS',
    'No credentials. Set publicKey + secretKey, apiKey, or the TRACEBATCH_* env vars.'
  );
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
