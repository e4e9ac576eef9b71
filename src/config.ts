/**
 * Environment-driven settings for the standard middleware stack.
 */

import { LOG_LEVELS, type LogLevel } from './providers/ILogProvider.js';

export interface AppConfig {
  logLevel: LogLevel;
  logToConsole: boolean;
  requestTimeoutMs: number;
  rateLimit: {
    limit: number;
    windowSeconds: number;
  };
}

type Env = Record<string, string | undefined>;

const ENV_PREFIX = 'CTXCHAIN_';

export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  return Object.freeze({
    logLevel: readLogLevel(env, 'LOG_LEVEL', 'info'),
    logToConsole: readBoolean(env, 'LOG_CONSOLE', false),
    requestTimeoutMs: readPositiveInt(env, 'REQUEST_TIMEOUT_MS', 30_000),
    rateLimit: Object.freeze({
      limit: readPositiveInt(env, 'RATE_LIMIT', 120),
      windowSeconds: readPositiveInt(env, 'RATE_LIMIT_WINDOW_SECONDS', 60),
    }),
  });
}

function raw(env: Env, name: string): string | undefined {
  const value = env[ENV_PREFIX + name]?.trim();
  return value ? value : undefined;
}

function invalid(name: string, value: string, expected: string): Error {
  return new Error(`Invalid ${ENV_PREFIX}${name}="${value}": expected ${expected}`);
}

function readLogLevel(env: Env, name: string, fallback: LogLevel): LogLevel {
  const value = raw(env, name);
  if (value === undefined) return fallback;

  const level = LOG_LEVELS.find((candidate) => candidate === value.toLowerCase());
  if (!level) throw invalid(name, value, LOG_LEVELS.join(' | '));
  return level;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = raw(env, name);
  if (value === undefined) return fallback;

  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw invalid(name, value, 'true | false | 1 | 0');
  }
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const value = raw(env, name);
  if (value === undefined) return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw invalid(name, value, 'a positive integer');
  }
  return parsed;
}
