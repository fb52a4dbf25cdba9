/**
 * Runtime configuration.
 *
 * Read from environment variables:
 *
 *   PORT             HTTP port (default 5000)
 *   GRAPH_MAX_STEPS  step ceiling per run (default 100)
 *   LOG_LEVEL        debug | info | warn | error (default info)
 */

import { TypedError, createTypedError } from './domain/errors';
import { DEFAULT_MAX_STEPS } from './engine/executor';
import { LogLevel, parseLogLevel } from './logger';

export interface AppConfig {
  port: number;
  maxSteps: number;
  logLevel: LogLevel;
}

/** Raw values before parsing; undefined means "use the default". */
export interface RawConfig {
  PORT?: string;
  GRAPH_MAX_STEPS?: string;
  LOG_LEVEL?: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: TypedError[];
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 5000,
  maxSteps: DEFAULT_MAX_STEPS,
  logLevel: LogLevel.Info,
};

const MAX_PORT = 65535;

/** Configuration error wrapper. */
export class ConfigError extends Error {
  constructor(public errors: TypedError[]) {
    super(errors.map((e) => e.message).join('; '));
    this.name = 'ConfigError';
  }
}

function parsePositiveInt(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const parsed = parseInt(trimmed, 10);
  return parsed >= 1 ? parsed : undefined;
}

function invalidValue(variable: string, value: string, expected: string): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID_VALUE',
    message: `${variable} must be ${expected}, got "${value}"`,
    retryable: false,
    details: { variable, value },
  });
}

/** Check raw values without throwing. */
export function validateConfig(raw: RawConfig): ConfigValidationResult {
  const errors: TypedError[] = [];

  if (raw.PORT !== undefined) {
    const port = parsePositiveInt(raw.PORT);
    if (port === undefined || port > MAX_PORT) {
      errors.push(invalidValue('PORT', raw.PORT, `an integer between 1 and ${MAX_PORT}`));
    }
  }

  if (raw.GRAPH_MAX_STEPS !== undefined && parsePositiveInt(raw.GRAPH_MAX_STEPS) === undefined) {
    errors.push(invalidValue('GRAPH_MAX_STEPS', raw.GRAPH_MAX_STEPS, 'a positive integer'));
  }

  if (raw.LOG_LEVEL !== undefined && parseLogLevel(raw.LOG_LEVEL) === undefined) {
    errors.push(invalidValue('LOG_LEVEL', raw.LOG_LEVEL, `one of ${Object.values(LogLevel).join(', ')}`));
  }

  return { valid: errors.length === 0, errors };
}

/** Load configuration, throwing ConfigError if any value is invalid. */
export function loadConfig(env: RawConfig = process.env): AppConfig {
  const result = validateConfig(env);
  if (!result.valid) {
    throw new ConfigError(result.errors);
  }

  return {
    port: env.PORT !== undefined ? parsePositiveInt(env.PORT) ?? DEFAULT_CONFIG.port : DEFAULT_CONFIG.port,
    maxSteps: env.GRAPH_MAX_STEPS !== undefined
      ? parsePositiveInt(env.GRAPH_MAX_STEPS) ?? DEFAULT_CONFIG.maxSteps
      : DEFAULT_CONFIG.maxSteps,
    logLevel: env.LOG_LEVEL !== undefined ? parseLogLevel(env.LOG_LEVEL) ?? DEFAULT_CONFIG.logLevel : DEFAULT_CONFIG.logLevel,
  };
}
