/**
 * Default settings for the project file store.
 *
 * @packageDocumentation
 */

import type { ProjectFileSettings } from './types.js';

/**
 * Default settings: two-space indentation, no debug output, and the clang
 * static analyzer reported as disabled.
 */
export const DEFAULT_SETTINGS: ProjectFileSettings = {
  indentBy: '  ',
  debug: false,
  reportClangAnalyzer: false,
};
