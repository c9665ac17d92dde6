/**
 * Types for the analysis project file model.
 *
 * @packageDocumentation
 */

/**
 * Line number sentinel for a suppression that is not bound to a line.
 */
export const NO_LINE = -1;

/**
 * Largest line number a suppression can carry (signed 32-bit range).
 */
export const MAX_LINE_NUMBER = 2147483647;

/**
 * Whether a value is a line number that can be stored in a document.
 *
 * @param lineNumber - Candidate line number.
 * @returns True for integers from 1 to {@link MAX_LINE_NUMBER}.
 */
export function isValidLineNumber(lineNumber: number): boolean {
  return Number.isInteger(lineNumber) && lineNumber > 0 && lineNumber <= MAX_LINE_NUMBER;
}

/**
 * A rule suppressing one diagnostic, optionally scoped by file, line and symbol.
 */
export interface Suppression {
  /** Identifier of the suppressed check. May be empty. */
  readonly errorId: string;
  /** File filter, empty when the suppression applies to every file. */
  readonly fileName: string;
  /** Line filter, {@link NO_LINE} when unset. */
  readonly lineNumber: number;
  /** Symbol filter, empty when unset. */
  readonly symbolName: string;
}

/**
 * Names of the list-valued settings of a project.
 */
export type ProjectListField =
  | 'includeDirs'
  | 'defines'
  | 'undefines'
  | 'checkPaths'
  | 'excludedPaths'
  | 'libraries'
  | 'addons'
  | 'tags';

/**
 * Raw stored settings of an analysis project.
 *
 * Path-valued lists hold exactly what was parsed or set; normalization
 * happens in the accessors of {@link ProjectFile}.
 */
export interface ProjectConfigData {
  /** Directory that relative paths are interpreted against, when set. */
  readonly rootPath: string;
  /** Working directory for the analyzer's intermediate results. */
  readonly buildDir: string;
  /** External build description (IDE project, solution or compile database). */
  readonly importProject: string;
  /** Whether every configuration of an imported IDE project is analyzed. */
  readonly analyzeAllVsConfigs: boolean;
  /** Include search directories. */
  readonly includeDirs: readonly string[];
  /** Preprocessor defines. */
  readonly defines: readonly string[];
  /** Preprocessor undefines. */
  readonly undefines: readonly string[];
  /** Paths to analyze. */
  readonly checkPaths: readonly string[];
  /** Paths excluded from analysis. */
  readonly excludedPaths: readonly string[];
  /** Library configurations to load. */
  readonly libraries: readonly string[];
  /** Platform keyword, or path of a platform description ending in `.xml`. */
  readonly platform: string;
  /** Suppression rules in document order. */
  readonly suppressions: readonly Suppression[];
  /** Enabled addons. */
  readonly addons: readonly string[];
  /** Whether the clang static analyzer runs. */
  readonly clangAnalyzer: boolean;
  /** Whether clang-tidy runs. */
  readonly clangTidy: boolean;
  /** Free-form warning tags. */
  readonly tags: readonly string[];
}

/**
 * Mutable counterpart of {@link ProjectConfigData}, used while a document is read.
 */
export type MutableProjectConfigData = {
  -readonly [K in keyof ProjectConfigData]: ProjectConfigData[K] extends readonly (infer T)[]
    ? T[]
    : ProjectConfigData[K];
};
