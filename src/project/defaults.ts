/**
 * Default values for the project file model.
 *
 * @packageDocumentation
 */

import { NO_LINE } from './types.js';
import type { MutableProjectConfigData, ProjectConfigData, Suppression } from './types.js';

/**
 * Settings of a freshly constructed project.
 */
export const DEFAULT_PROJECT_CONFIG: ProjectConfigData = {
  rootPath: '',
  buildDir: '',
  importProject: '',
  analyzeAllVsConfigs: true,
  includeDirs: [],
  defines: [],
  undefines: [],
  checkPaths: [],
  excludedPaths: [],
  libraries: [],
  platform: '',
  suppressions: [],
  addons: [],
  clangAnalyzer: false,
  clangTidy: false,
  tags: [],
};

/**
 * Creates a project model holding only defaults, with fresh list instances.
 *
 * @returns A mutable default project model.
 */
export function createDefaultProjectConfig(): MutableProjectConfigData {
  return {
    ...DEFAULT_PROJECT_CONFIG,
    includeDirs: [],
    defines: [],
    undefines: [],
    checkPaths: [],
    excludedPaths: [],
    libraries: [],
    suppressions: [],
    addons: [],
    tags: [],
  };
}

/**
 * Creates a suppression, filling unspecified filters with their empty values.
 *
 * @param errorId - Identifier of the suppressed check.
 * @param filters - Optional file, line and symbol filters.
 * @returns The suppression record.
 *
 * @example
 * ```typescript
 * const suppression = createSuppression('nullPointer', { fileName: 'src/a.c', lineNumber: 12 });
 * ```
 */
export function createSuppression(
  errorId: string,
  filters?: Partial<Omit<Suppression, 'errorId'>>
): Suppression {
  return {
    errorId,
    fileName: filters?.fileName ?? '',
    lineNumber: filters?.lineNumber ?? NO_LINE,
    symbolName: filters?.symbolName ?? '',
  };
}
