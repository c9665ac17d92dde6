/**
 * Settings for the project file store, with environment variable overrides.
 *
 * Override precedence: explicit settings > env > defaults
 *
 * @packageDocumentation
 */

export type { PartialProjectFileSettings, ProjectFileSettings } from './types.js';
export { DEFAULT_SETTINGS } from './defaults.js';
export {
  ENV_DEBUG,
  ENV_INDENT,
  ENV_REPORT_CLANG_ANALYZER,
  EnvCoercionError,
  getEnvVarDocumentation,
  readEnvOverrides,
  resolveSettings,
} from './env.js';
export type { EnvRecord } from './env.js';
