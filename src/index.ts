/**
 * Analysis project files
 *
 * Stores the settings of a static-analysis run (include paths, defines,
 * checked and excluded paths, libraries, platform, suppressions, addons,
 * tools and tags) as an XML document and reads them back.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './project/index.js';
export {
  DEFAULT_SETTINGS,
  EnvCoercionError,
  getEnvVarDocumentation,
  readEnvOverrides,
  resolveSettings,
} from './config/index.js';
export type { EnvRecord, PartialProjectFileSettings, ProjectFileSettings } from './config/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
