/**
 * Configuration management for the Drive reader
 * All configuration is loaded from environment variables
 */

import type { LogLevel } from './types/index.js';
import type { RetryConfig } from './utils/retry.js';

/**
 * Read-only Drive scope requested during authorization
 */
export const DRIVE_READONLY_SCOPE = 'https://www.googleapis.com/auth/drive.readonly';

/**
 * Maximum page size accepted by the Drive files.list endpoint
 */
export const DRIVE_PAGE_SIZE = 100;

/**
 * Upper bound for any tool's maxResults argument
 */
export const MAX_RESULTS_LIMIT = 100;

/**
 * Largest look-back window accepted by list_recent_files (10 years)
 */
export const MAX_LOOKBACK_HOURS = 87600;

/**
 * Retry policy for rate-limited Drive calls
 * Only "too many requests" responses are retried
 */
export const RATE_LIMIT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
};

/**
 * Time allowed for the interactive consent flow
 */
export const AUTHORIZATION_TIMEOUT_MS = 2 * 60 * 1000;

/**
 * Application configuration loaded from environment
 */
export interface Config {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;

  // Persisted state
  credentialPath: string;
  clientSecretsPath: string;

  // Remote calls
  requestTimeoutMs: number;
  maxPagesPerCall: number;
  maxContentBytes: number;
  maxTextBytes: number;
  maxConcurrentCalls: number;

  // Credential lifecycle
  tokenExpirySkewMs: number;
}

const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
const NODE_ENVS: ReadonlyArray<Config['nodeEnv']> = ['development', 'production', 'test'];

/**
 * Parses an integer environment variable, falling back to a default when unset
 * Throws if the value is present but not an integer >= min
 */
function readInt(name: string, defaultValue: number, min: number = 1): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

function readNodeEnv(): Config['nodeEnv'] {
  const raw = process.env.NODE_ENV || 'development';
  return NODE_ENVS.find((env) => env === raw) ?? 'development';
}

/**
 * Loads configuration from environment variables
 * Throws if a value is malformed
 */
export function loadConfig(): Config {
  return {
    nodeEnv: readNodeEnv(),
    logLevel: readLogLevel(),
    credentialPath: process.env.DRIVE_CREDENTIAL_PATH || './token.json',
    clientSecretsPath: process.env.DRIVE_CLIENT_SECRETS_PATH || './client_secrets.json',
    requestTimeoutMs: readInt('DRIVE_REQUEST_TIMEOUT_MS', 30000),
    maxPagesPerCall: readInt('DRIVE_MAX_PAGES', 10),
    maxContentBytes: readInt('DRIVE_MAX_CONTENT_BYTES', 10 * 1024 * 1024),
    maxTextBytes: readInt('DRIVE_MAX_TEXT_BYTES', 200000),
    maxConcurrentCalls: readInt('DRIVE_MAX_CONCURRENT_CALLS', 8),
    tokenExpirySkewMs: readInt('DRIVE_TOKEN_EXPIRY_SKEW_MS', 60000, 0),
  };
}

/**
 * Singleton config instance
 */
let configInstance: Config | null = null;

/**
 * Gets the application configuration
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Resets the config instance (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
