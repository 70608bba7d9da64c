import { z } from 'zod';
import { isValidTimeZone } from './dates.js';
import type { LogLevel } from './logger.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

// An empty variable (e.g. `TICKTICK_BASE_URL=` in .env) falls back to the default
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (v === '' ? undefined : v), schema);

const EnvSchema = z.object({
  TICKTICK_CLIENT_ID: optionalSecret,
  TICKTICK_CLIENT_SECRET: optionalSecret,
  TICKTICK_ACCESS_TOKEN: optionalSecret,
  TICKTICK_REFRESH_TOKEN: optionalSecret,
  TICKTICK_BASE_URL: blankAsUnset(z.string().url().default('https://api.ticktick.com/open/v1')),
  TICKTICK_TOKEN_URL: blankAsUnset(z.string().url().default('https://ticktick.com/oauth/token')),
  TICKTICK_RATE_LIMIT_DELAY: blankAsUnset(z.coerce.number().nonnegative().default(0.2)),
  TICKTICK_MAX_RETRIES: blankAsUnset(z.coerce.number().int().min(0).max(10).default(3)),
  TICKTICK_REQUEST_TIMEOUT_MS: blankAsUnset(z.coerce.number().int().positive().default(30_000)),
  TICKTICK_TIMEZONE: blankAsUnset(
    z.string().default('UTC').refine(isValidTimeZone, { message: 'Unknown IANA time zone' }),
  ),
  LOG_LEVEL: blankAsUnset(z.enum(['debug', 'info', 'warn', 'error']).default('info')),
});

export interface Credentials {
  clientId: string;
  clientSecret: string;
  accessToken: string;
  refreshToken: string;
}

export interface GatewayConfig {
  credentials: Partial<Credentials>;
  baseUrl: string;
  tokenUrl: string;
  requestDelayMs: number;
  maxRetries: number;
  requestTimeoutMs: number;
  timeZone: string;
  logLevel: LogLevel;
}

const CREDENTIAL_VARS = [
  ['clientId', 'TICKTICK_CLIENT_ID'],
  ['clientSecret', 'TICKTICK_CLIENT_SECRET'],
  ['accessToken', 'TICKTICK_ACCESS_TOKEN'],
  ['refreshToken', 'TICKTICK_REFRESH_TOKEN'],
] as const;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const e = parsed.data;
  return {
    credentials: {
      clientId: e.TICKTICK_CLIENT_ID,
      clientSecret: e.TICKTICK_CLIENT_SECRET,
      accessToken: e.TICKTICK_ACCESS_TOKEN,
      refreshToken: e.TICKTICK_REFRESH_TOKEN,
    },
    baseUrl: e.TICKTICK_BASE_URL.replace(/\/+$/, ''),
    tokenUrl: e.TICKTICK_TOKEN_URL,
    requestDelayMs: Math.round(e.TICKTICK_RATE_LIMIT_DELAY * 1000),
    maxRetries: e.TICKTICK_MAX_RETRIES,
    requestTimeoutMs: e.TICKTICK_REQUEST_TIMEOUT_MS,
    timeZone: e.TICKTICK_TIMEZONE,
    logLevel: e.LOG_LEVEL,
  };
}

export function missingCredentials(config: GatewayConfig): string[] {
  return CREDENTIAL_VARS.filter(([key]) => !config.credentials[key]).map(([, name]) => name);
}

export function requireCredentials(config: GatewayConfig): Credentials {
  const { clientId, clientSecret, accessToken, refreshToken } = config.credentials;
  if (!clientId || !clientSecret || !accessToken || !refreshToken) {
    throw new ConfigError(`Missing required environment variables: ${missingCredentials(config).join(', ')}`);
  }
  return { clientId, clientSecret, accessToken, refreshToken };
}

export interface HealthStatus {
  status: 'ready' | 'unconfigured';
  credentials: 'configured' | 'missing';
  missing: string[];
}

/** Reports whether a usable token configuration is present. Makes no remote call. */
export function getHealthStatus(config: GatewayConfig): HealthStatus {
  const missing = missingCredentials(config);
  return missing.length === 0
    ? { status: 'ready', credentials: 'configured', missing }
    : { status: 'unconfigured', credentials: 'missing', missing };
}
