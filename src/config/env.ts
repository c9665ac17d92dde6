/**
 * Environment variable overrides for settings.
 *
 * Override precedence: explicit settings > env > defaults
 *
 * @packageDocumentation
 */

import { DEFAULT_SETTINGS } from './defaults.js';
import type { PartialProjectFileSettings, ProjectFileSettings } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Gets the default environment from Node.js process.env.
 */
function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/** Number of spaces per indentation level. */
export const ENV_INDENT = 'PROJECT_FILE_INDENT';
/** Enables debug logging. */
export const ENV_DEBUG = 'PROJECT_FILE_DEBUG';
/** Makes `getClangAnalyzer()` report the stored flag. */
export const ENV_REPORT_CLANG_ANALYZER = 'PROJECT_FILE_REPORT_CLANG_ANALYZER';

/**
 * Coerces a string value to a non-negative integer.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced integer.
 * @throws EnvCoercionError if the value is not a non-negative integer.
 */
function coerceToCount(value: string, envVar: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new EnvCoercionError(envVar, value, 'non-negative integer');
  }
  return Number(trimmed);
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Reads settings overrides from environment variables.
 *
 * Unset and empty variables are skipped.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Partial settings holding only the overridden values.
 * @throws EnvCoercionError if a variable holds a malformed value.
 *
 * @example
 * ```typescript
 * const overrides = readEnvOverrides({ PROJECT_FILE_INDENT: '4' });
 * console.log(overrides.indentBy); // "    "
 * ```
 */
export function readEnvOverrides(env: EnvRecord = getDefaultEnv()): PartialProjectFileSettings {
  const overrides: { -readonly [K in keyof ProjectFileSettings]?: ProjectFileSettings[K] } = {};

  const indent = env[ENV_INDENT];
  if (indent !== undefined && indent !== '') {
    overrides.indentBy = ' '.repeat(coerceToCount(indent, ENV_INDENT));
  }

  const debug = env[ENV_DEBUG];
  if (debug !== undefined && debug !== '') {
    overrides.debug = coerceToBoolean(debug, ENV_DEBUG);
  }

  const reportClangAnalyzer = env[ENV_REPORT_CLANG_ANALYZER];
  if (reportClangAnalyzer !== undefined && reportClangAnalyzer !== '') {
    overrides.reportClangAnalyzer = coerceToBoolean(reportClangAnalyzer, ENV_REPORT_CLANG_ANALYZER);
  }

  return overrides;
}

/**
 * Resolves effective settings.
 *
 * @param explicit - Settings given by the caller.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Complete settings.
 * @throws EnvCoercionError if an environment variable holds a malformed value.
 */
export function resolveSettings(
  explicit: PartialProjectFileSettings = {},
  env: EnvRecord = getDefaultEnv()
): ProjectFileSettings {
  const fromEnv = readEnvOverrides(env);
  return {
    indentBy: explicit.indentBy ?? fromEnv.indentBy ?? DEFAULT_SETTINGS.indentBy,
    debug: explicit.debug ?? fromEnv.debug ?? DEFAULT_SETTINGS.debug,
    reportClangAnalyzer:
      explicit.reportClangAnalyzer ??
      fromEnv.reportClangAnalyzer ??
      DEFAULT_SETTINGS.reportClangAnalyzer,
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return {
    [ENV_INDENT]: {
      description: 'Number of spaces per indentation level in written project files (0 = one line)',
      type: 'number',
    },
    [ENV_DEBUG]: {
      description: 'Write debug-level log entries to stderr',
      type: 'boolean',
    },
    [ENV_REPORT_CLANG_ANALYZER]: {
      description: 'Report the stored clang static analyzer flag instead of false',
      type: 'boolean',
    },
  };
}
