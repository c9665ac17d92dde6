/**
 * Settings types for the project file store.
 *
 * @packageDocumentation
 */

/**
 * Settings that shape how project files are written and reported.
 */
export interface ProjectFileSettings {
  /** Indentation unit of written documents. An empty string writes a single line. */
  readonly indentBy: string;
  /** Whether debug-level log entries are written. */
  readonly debug: boolean;
  /**
   * Whether `getClangAnalyzer()` reports the stored clang static analyzer flag.
   * When false the accessor reports false; the flag is still stored and written.
   */
  readonly reportClangAnalyzer: boolean;
}

/**
 * Partial settings for merging with defaults.
 */
export type PartialProjectFileSettings = Partial<ProjectFileSettings>;
