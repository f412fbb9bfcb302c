import type { LogLevel } from '../types/index.js';

export interface Config {
  // Server
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';

  // HomGar account
  homgarEmail: string;
  homgarPassword: string;
  homgarAreaCode: string;
  homgarBaseUrl: string;
  sessionFile?: string;

  // Authentication of callers of this service
  apiTokens: string[];

  // Cache
  deviceCacheTtlMs: number;

  // Transport
  requestTimeoutMs: number;
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;

  // Logging
  logLevel: LogLevel;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function getEnvString(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOptionalString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

function getEnvStringArray(key: string, defaultValue: string[] = []): string[] {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

function getEnvNodeEnv(): 'development' | 'production' | 'test' {
  const value = process.env['NODE_ENV'] ?? 'development';
  if (value !== 'development' && value !== 'production' && value !== 'test') {
    throw new ConfigurationError(`Invalid NODE_ENV: ${value}. Must be 'development', 'production', or 'test'`);
  }
  return value;
}

function getEnvLogLevel(): LogLevel {
  const value = process.env['LOG_LEVEL'] ?? 'info';
  if (value !== 'debug' && value !== 'info' && value !== 'warn' && value !== 'error') {
    throw new ConfigurationError(`Invalid LOG_LEVEL: ${value}. Must be 'debug', 'info', 'warn', or 'error'`);
  }
  return value;
}

export function loadConfig(): Config {
  return {
    port: getEnvNumber('PORT', 3000),
    host: getEnvString('HOST', '0.0.0.0'),
    nodeEnv: getEnvNodeEnv(),

    homgarEmail: getEnvString('HOMGAR_EMAIL'),
    homgarPassword: getEnvString('HOMGAR_PASSWORD'),
    homgarAreaCode: getEnvString('HOMGAR_AREA_CODE', '31'),
    homgarBaseUrl: getEnvString('HOMGAR_BASE_URL', 'https://region3.homgarus.com'),
    sessionFile: getEnvOptionalString('HOMGAR_SESSION_FILE'),

    apiTokens: getEnvStringArray('API_TOKENS'),

    deviceCacheTtlMs: getEnvNumber('DEVICE_CACHE_TTL_MS', 300000), // 5 minutes

    requestTimeoutMs: getEnvNumber('REQUEST_TIMEOUT_MS', 10000),
    maxRetries: getEnvNumber('MAX_RETRIES', 3),
    initialBackoffMs: getEnvNumber('INITIAL_BACKOFF_MS', 1000),
    maxBackoffMs: getEnvNumber('MAX_BACKOFF_MS', 10000),

    logLevel: getEnvLogLevel(),
  };
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
