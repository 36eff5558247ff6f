/**
 * Environment variable handling with validation
 * SMTP credentials are never logged or exposed
 */

import { validateEnv } from '@/validation/ajv_instance';
import { isValidTimeZone } from './time';

export interface EnvConfig {
  emailTo: string;
  smtpHost: string;
  smtpPort: number;
  smtpUser: string;
  smtpPassword: string;
  outputDir: string;
  port: number;
  timeZone: string;
  fetchTimeoutMs: number;
  requestSpacingMs: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
}

export const ENV_DEFAULTS = {
  emailTo: 'reports@example.com',
  smtpHost: 'smtp.gmail.com',
  smtpPort: 587,
  outputDir: 'output',
  port: 5000,
  timeZone: 'America/Chicago',
  fetchTimeoutMs: 15_000,
  requestSpacingMs: 250,
} as const;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function getIntegerEnvVar(name: string, fallback: number): number {
  const raw = getEnvVar(name);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Environment variable ${name} must be an integer`, [`got "${raw}"`]);
  }
  return parsed;
}

function pickLogLevel(raw: string | undefined): EnvConfig['logLevel'] {
  switch (raw) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return raw;
    default:
      return 'info';
  }
}

function pickNodeEnv(raw: string | undefined): EnvConfig['nodeEnv'] {
  switch (raw) {
    case 'production':
    case 'test':
      return raw;
    default:
      return 'development';
  }
}

export function loadEnvConfig(): EnvConfig {
  const candidate: EnvConfig = {
    emailTo: getEnvVar('EMAIL_TO') ?? ENV_DEFAULTS.emailTo,
    smtpHost: getEnvVar('SMTP_SERVER') ?? ENV_DEFAULTS.smtpHost,
    smtpPort: getIntegerEnvVar('SMTP_PORT', ENV_DEFAULTS.smtpPort),
    smtpUser: getEnvVar('SMTP_USER') ?? '',
    smtpPassword: getEnvVar('SMTP_PASSWORD') ?? '',
    outputDir: getEnvVar('OUTPUT_DIR') ?? ENV_DEFAULTS.outputDir,
    port: getIntegerEnvVar('PORT', ENV_DEFAULTS.port),
    timeZone: getEnvVar('REPORT_TIMEZONE') ?? ENV_DEFAULTS.timeZone,
    fetchTimeoutMs: getIntegerEnvVar('FETCH_TIMEOUT_MS', ENV_DEFAULTS.fetchTimeoutMs),
    requestSpacingMs: getIntegerEnvVar('REQUEST_SPACING_MS', ENV_DEFAULTS.requestSpacingMs),
    logLevel: pickLogLevel(getEnvVar('LOG_LEVEL')),
    nodeEnv: pickNodeEnv(process.env.NODE_ENV),
  };

  const result = validateEnv(candidate);
  if (!result.valid) {
    throw new ConfigError('Invalid environment configuration', result.errors);
  }

  if (!isValidTimeZone(result.data.timeZone)) {
    throw new ConfigError('Invalid environment configuration', [
      `REPORT_TIMEZONE "${result.data.timeZone}" is not a known IANA timezone`,
    ]);
  }

  return result.data;
}

export function hasSmtpCredentials(config: EnvConfig): boolean {
  return config.smtpUser.length > 0 && config.smtpPassword.length > 0;
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
