import { readFileSync } from 'fs';
import { z } from 'zod';
import {
  DEFAULT_MAX_IN_FLIGHT,
  DEFAULT_TIMEOUT_MS,
  invalidArgument,
  type EndpointConfig,
  type HttpTransport,
  type Logger,
} from '@libs/dispatch-http-core';
import { DEFAULT_MAX_HOSTS } from '@libs/hostlist';

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_POWER_POLL_INTERVAL_MS = 2_000;
export const DEFAULT_POWER_POLL_MAX_ATTEMPTS = 150;

export interface OchamiConfig {
  baseUrl: string;
  accessToken: string;
  /** PEM-encoded root certificate for the OCHAMI services. */
  rootCertificate?: string;
  insecureTls?: boolean;
  /** `http:`, `https:`, `socks4:` or `socks5:` proxy URL. */
  proxyUrl?: string;
  timeoutMs?: number;
  maxInFlight?: number;
  /** Hosts per bulk request (power, boot parameters). */
  batchSize?: number;
  powerPollIntervalMs?: number;
  powerPollMaxAttempts?: number;
  maxHosts?: number;
  logger?: Logger;
  /** Replaces the default undici transport, mostly for tests. */
  transport?: HttpTransport;
}

const settingsSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL'),
  accessToken: z.string().trim().min(1, 'must not be empty'),
  rootCertificate: z.string().min(1).optional(),
  insecureTls: z.boolean().default(false),
  proxyUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  maxInFlight: z.number().int().positive().default(DEFAULT_MAX_IN_FLIGHT),
  batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
  powerPollIntervalMs: z.number().int().nonnegative().default(DEFAULT_POWER_POLL_INTERVAL_MS),
  powerPollMaxAttempts: z.number().int().positive().default(DEFAULT_POWER_POLL_MAX_ATTEMPTS),
  maxHosts: z.number().int().positive().default(DEFAULT_MAX_HOSTS),
});

export type OchamiSettings = Readonly<z.output<typeof settingsSchema>> & {
  readonly endpoint: EndpointConfig;
};

/**
 * Validates an OCHAMI configuration and freezes it. The access token is kept
 * out of every error message.
 */
export function resolveOchamiSettings(config: OchamiConfig): OchamiSettings {
  const { logger: _logger, transport: _transport, ...plain } = config;
  const parsed = settingsSchema.safeParse(plain);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw invalidArgument(`Invalid OCHAMI configuration: ${field} ${issue?.message ?? 'is invalid'}`);
  }

  const settings = parsed.data;
  const endpoint: EndpointConfig = Object.freeze({
    baseUrl: settings.baseUrl.replace(/\/+$/, ''),
    accessToken: settings.accessToken,
    tls: Object.freeze({ rootCertificate: settings.rootCertificate, verify: !settings.insecureTls }),
    proxyUrl: settings.proxyUrl,
    timeoutMs: settings.timeoutMs,
  });

  return Object.freeze({ ...settings, endpoint });
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseOptionalBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function readRootCertificate(path: string): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (error) {
    throw invalidArgument(`Unable to read root certificate from ${path}`, { cause: error });
  }
}

/**
 * Builds an OCHAMI configuration from the environment. Explicit overrides win
 * over environment values, which win over defaults.
 */
export function ochamiConfigFromEnv(
  overrides: Partial<OchamiConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): OchamiConfig {
  const baseUrl = overrides.baseUrl ?? env.OCHAMI_BASE_URL;
  if (!baseUrl) {
    throw invalidArgument('OCHAMI_BASE_URL environment variable is required');
  }
  const accessToken = overrides.accessToken ?? env.ACCESS_TOKEN;
  if (!accessToken) {
    throw invalidArgument('ACCESS_TOKEN environment variable is required');
  }

  const rootCertPath = env.OCHAMI_ROOT_CERT;

  return {
    baseUrl,
    accessToken,
    rootCertificate: overrides.rootCertificate ?? (rootCertPath ? readRootCertificate(rootCertPath) : undefined),
    insecureTls: overrides.insecureTls ?? parseOptionalBoolean(env.OCHAMI_INSECURE_TLS),
    proxyUrl: overrides.proxyUrl ?? (env.SOCKS5 || env.OCHAMI_PROXY || undefined),
    timeoutMs: overrides.timeoutMs ?? parseOptionalNumber(env.OCHAMI_TIMEOUT_MS),
    maxInFlight: overrides.maxInFlight ?? parseOptionalNumber(env.OCHAMI_MAX_IN_FLIGHT),
    batchSize: overrides.batchSize ?? parseOptionalNumber(env.OCHAMI_BATCH_SIZE),
    powerPollIntervalMs: overrides.powerPollIntervalMs ?? parseOptionalNumber(env.OCHAMI_POWER_POLL_INTERVAL_MS),
    powerPollMaxAttempts: overrides.powerPollMaxAttempts ?? parseOptionalNumber(env.OCHAMI_POWER_POLL_MAX_ATTEMPTS),
    maxHosts: overrides.maxHosts,
    logger: overrides.logger,
    transport: overrides.transport,
  };
}
