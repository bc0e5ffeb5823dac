/**
 * Environment configuration
 *
 * Reads the optional overrides used by the CLI and examples:
 *   - MISIS_BASE_URL: portal base URL (default: https://lk.misis.ru)
 *   - MISIS_TIMEOUT_MS: per-request timeout (default: 30000)
 *   - MISIS_MAX_RETRIES: attempts per request (default: 3)
 *   - MISIS_BACKOFF_MS: backoff unit between attempts (default: 1000)
 *   - LOG_LEVEL: silent | error | warn | info | debug (unset: each entry point picks its own)
 *   - MISIS_LOGIN / MISIS_PASSWORD: credentials when not given as flags
 */

import dotenv from 'dotenv';
import { ValidationError } from './errors.js';
import { isLogLevel, type LogLevel } from './utils/logger.js';

export interface AppConfig {
  baseUrl: string;
  timeout: number;
  maxRetries: number;
  backoffBaseMs: number;
  /** Undefined when LOG_LEVEL is not set */
  logLevel?: LogLevel;
  login?: string;
  password?: string;
}

export type Env = Record<string, string | undefined>;

/**
 * Load environment variables from .env and .env.local
 */
export function loadEnv(): void {
  dotenv.config();
  dotenv.config({ path: '.env.local' });
}

const parseInteger = (name: string, value: string | undefined, defaultValue: number, min: number): number => {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ValidationError([{ field: name, message: `must be an integer, received: ${value}` }]);
  }
  if (parsed < min) {
    throw new ValidationError([{ field: name, message: `must be >= ${min}, received: ${parsed}` }]);
  }

  return parsed;
};

const parseBaseUrl = (value: string | undefined): string => {
  const raw = value?.trim() || 'https://lk.misis.ru';
  if (!/^https?:\/\//i.test(raw)) {
    throw new ValidationError([{ field: 'MISIS_BASE_URL', message: `must start with http:// or https://, received: ${raw}` }]);
  }
  return raw.replace(/\/+$/, '');
};

const parseLogLevel = (value: string | undefined): LogLevel | undefined => {
  const level = value?.trim().toLowerCase();
  if (!level) return undefined;
  if (!isLogLevel(level)) {
    throw new ValidationError([{ field: 'LOG_LEVEL', message: `unknown level: ${value}` }]);
  }
  return level;
};

/**
 * Build the configuration from an environment map (default: process.env).
 *
 * @throws ValidationError naming the variable that holds a bad value
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    baseUrl: parseBaseUrl(env.MISIS_BASE_URL),
    timeout: parseInteger('MISIS_TIMEOUT_MS', env.MISIS_TIMEOUT_MS, 30000, 1),
    maxRetries: parseInteger('MISIS_MAX_RETRIES', env.MISIS_MAX_RETRIES, 3, 1),
    backoffBaseMs: parseInteger('MISIS_BACKOFF_MS', env.MISIS_BACKOFF_MS, 1000, 0),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    login: env.MISIS_LOGIN || undefined,
    password: env.MISIS_PASSWORD || undefined
  };
}
