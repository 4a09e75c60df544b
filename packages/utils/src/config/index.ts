/**
 * Configuration loading from environment variables
 *
 * Values are read when these functions are called, never at import time, so
 * a process (or a test) can change its environment before building a client.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_WINDMILL_ENDPOINT = 'https://www.windmillai.com';

export interface WindmillConfig {
  apiKey?: string;
  endpoint: string;
}

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LoggingConfig {
  level: LogLevelName;
  console: boolean;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

// Empty strings count as unset, matching shells that export `VAR=`
const optionalEnvString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

function readEnv(env: Env, name: string): string | undefined {
  return optionalEnvString.parse(env[name]);
}

/**
 * Resolve client credentials and endpoint.
 *
 * Priority per field: explicit override, then environment, then default. The
 * environment is only read for fields without an override. An `apiKey` key
 * present in `overrides` is explicit even when undefined, so a resolved
 * "no key" can be handed on without the environment being read again.
 */
export function getWindmillConfig(
  overrides: Partial<WindmillConfig> = {},
  env: Env = process.env
): WindmillConfig {
  return {
    apiKey: Object.hasOwn(overrides, 'apiKey')
      ? overrides.apiKey
      : readEnv(env, 'WINDMILLAI_API_KEY'),
    endpoint:
      overrides.endpoint ?? readEnv(env, 'WINDMILLAI_ENDPOINT') ?? DEFAULT_WINDMILL_ENDPOINT,
  };
}

/**
 * Logger configuration plus the `LOG_LEVEL` value that was ignored, if any
 */
export interface ResolvedLoggingConfig extends LoggingConfig {
  rejectedLevel?: string;
}

/**
 * Load logger configuration without failing.
 *
 * Levels match case-insensitively; an unknown level falls back to `info` and
 * is reported in `rejectedLevel`.
 */
export function resolveLoggingConfig(env: Env = process.env): ResolvedLoggingConfig {
  const consoleEnabled = readEnv(env, 'LOG_CONSOLE') !== 'false';
  const rawLevel = readEnv(env, 'LOG_LEVEL');
  if (rawLevel === undefined) {
    return { level: 'info', console: consoleEnabled };
  }

  const normalized = rawLevel.trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  return level
    ? { level, console: consoleEnabled }
    : { level: 'info', console: consoleEnabled, rejectedLevel: rawLevel };
}

/**
 * Load logger configuration, rejecting an unknown `LOG_LEVEL`
 */
export function getLoggingConfig(env: Env = process.env): LoggingConfig {
  const { rejectedLevel, ...config } = resolveLoggingConfig(env);
  if (rejectedLevel !== undefined) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL '${rejectedLevel}': expected one of ${LOG_LEVELS.join(', ')}`,
      'LOG_LEVEL'
    );
  }
  return config;
}
