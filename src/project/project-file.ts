/**
 * Stateful project file used by the analyzer front ends.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { resolveSettings } from '../config/index.js';
import type { EnvRecord, PartialProjectFileSettings, ProjectFileSettings } from '../config/index.js';
import { Logger } from '../utils/logger.js';
import { createDefaultProjectConfig } from './defaults.js';
import { ProjectFileError } from './errors.js';
import { toForwardSlashesAll } from './paths.js';
import { readProjectDocument, saveProjectFile } from './persistence.js';
import { parseProjectDocument } from './reader.js';
import type { ProjectConfigData, Suppression } from './types.js';
import { toolNames } from './writer.js';

/**
 * Options for constructing a {@link ProjectFile}.
 */
export interface ProjectFileOptions {
  /** Backing document path. */
  filename?: string;
  /** Settings overriding the environment and the defaults. */
  settings?: PartialProjectFileSettings;
  /** Environment to read setting overrides from (defaults to process.env). */
  env?: EnvRecord;
  /** Logger receiving read and write events. */
  logger?: Logger;
}

/**
 * Settings of one analysis project and the document they are stored in.
 *
 * Accessors for include directories, check paths and excluded paths return
 * forward-slash paths; the stored values and the written document keep the
 * form passed to the setters.
 *
 * @example
 * ```typescript
 * const project = new ProjectFile();
 * project.setCheckPaths(['src']);
 * project.setClangTidy(true);
 * project.save('app.cppcheck');
 *
 * const reopened = ProjectFile.open('app.cppcheck');
 * console.log(reopened.getClangTidy()); // true
 * ```
 */
export class ProjectFile {
  private filename: string;
  private data: ProjectConfigData;
  private readonly settings: ProjectFileSettings;
  private readonly logger: Logger;

  /**
   * Creates an empty project holding only defaults.
   *
   * @param options - Construction options.
   * @throws EnvCoercionError if an environment override is malformed.
   */
  constructor(options: ProjectFileOptions = {}) {
    this.filename = options.filename ?? '';
    this.settings = resolveSettings(options.settings, options.env);
    this.logger =
      options.logger ?? new Logger({ component: 'ProjectFile', debugMode: this.settings.debug });
    this.data = createDefaultProjectConfig();
  }

  /**
   * Creates a project and loads it from a document.
   *
   * @param filename - Path of the document.
   * @param options - Construction options.
   * @returns The loaded project.
   * @throws ProjectFileError if the document cannot be loaded.
   */
  static open(filename: string, options: ProjectFileOptions = {}): ProjectFile {
    const project = new ProjectFile({ ...options, filename });
    project.load();
    return project;
  }

  /**
   * Resets every setting to its default. The filename is kept.
   */
  clear(): void {
    this.data = createDefaultProjectConfig();
  }

  /**
   * Loads settings from a document, replacing every current setting.
   *
   * When the document cannot be opened the current settings are kept. When it
   * is opened but cannot be parsed, or is not a project file, the settings are
   * left cleared.
   *
   * @param filename - Document to read; when omitted or empty the current filename is used
   *   and otherwise it becomes the current filename.
   * @throws ProjectFileError with `open_error`, `parse_error` or `schema_error`.
   */
  load(filename?: string): void {
    if (filename !== undefined && filename !== '') {
      this.filename = filename;
    }
    const xml = readProjectDocument(this.filename);
    this.clear();
    this.data = parseProjectDocument(xml, { logger: this.logger });
    this.logger.debug('project_read', {
      filename: this.filename,
      suppressions: this.data.suppressions.length,
    });
  }

  /**
   * Loads settings from a document, reporting failure instead of throwing.
   *
   * @param filename - Document to read; see {@link ProjectFile.load}.
   * @returns True when the document was loaded.
   */
  read(filename?: string): boolean {
    try {
      this.load(filename);
      return true;
    } catch (error) {
      if (error instanceof ProjectFileError) {
        this.logger.warn('project_read_failed', {
          filename: this.filename,
          errorType: error.errorType,
          message: error.message,
          details: error.details,
        });
        return false;
      }
      throw error;
    }
  }

  /**
   * Writes the settings to a document in canonical form.
   *
   * @param filename - Document to write; when omitted or empty the current filename is used
   *   and otherwise it becomes the current filename.
   * @throws ProjectFileError with `write_error`.
   */
  save(filename?: string): void {
    if (filename !== undefined && filename !== '') {
      this.filename = filename;
    }
    saveProjectFile(this.filename, this.data, { indentBy: this.settings.indentBy });
    this.logger.debug('project_written', { filename: this.filename });
  }

  /**
   * Writes the settings to a document, reporting failure instead of throwing.
   *
   * @param filename - Document to write; see {@link ProjectFile.save}.
   * @returns True when the document was written.
   */
  write(filename?: string): boolean {
    try {
      this.save(filename);
      return true;
    } catch (error) {
      if (error instanceof ProjectFileError) {
        this.logger.warn('project_write_failed', {
          filename: this.filename,
          errorType: error.errorType,
          message: error.message,
          details: error.details,
        });
        return false;
      }
      throw error;
    }
  }

  /**
   * Snapshot of the stored settings, paths as stored.
   */
  toData(): ProjectConfigData {
    return { ...this.data };
  }

  getFilename(): string {
    return this.filename;
  }

  setFilename(filename: string): void {
    this.filename = filename;
  }

  getRootPath(): string {
    return this.data.rootPath;
  }

  setRootPath(rootPath: string): void {
    this.data = { ...this.data, rootPath };
  }

  getBuildDir(): string {
    return this.data.buildDir;
  }

  setBuildDir(buildDir: string): void {
    this.data = { ...this.data, buildDir };
  }

  getImportProject(): string {
    return this.data.importProject;
  }

  setImportProject(importProject: string): void {
    this.data = { ...this.data, importProject };
  }

  getAnalyzeAllVsConfigs(): boolean {
    return this.data.analyzeAllVsConfigs;
  }

  setAnalyzeAllVsConfigs(analyzeAllVsConfigs: boolean): void {
    this.data = { ...this.data, analyzeAllVsConfigs };
  }

  /** Include directories with forward slashes. */
  getIncludeDirs(): string[] {
    return toForwardSlashesAll(this.data.includeDirs);
  }

  setIncludeDirs(includeDirs: readonly string[]): void {
    this.data = { ...this.data, includeDirs: [...includeDirs] };
  }

  getDefines(): string[] {
    return [...this.data.defines];
  }

  setDefines(defines: readonly string[]): void {
    this.data = { ...this.data, defines: [...defines] };
  }

  getUndefines(): string[] {
    return [...this.data.undefines];
  }

  setUndefines(undefines: readonly string[]): void {
    this.data = { ...this.data, undefines: [...undefines] };
  }

  /** Paths to analyze with forward slashes. */
  getCheckPaths(): string[] {
    return toForwardSlashesAll(this.data.checkPaths);
  }

  setCheckPaths(checkPaths: readonly string[]): void {
    this.data = { ...this.data, checkPaths: [...checkPaths] };
  }

  /** Excluded paths with forward slashes. */
  getExcludedPaths(): string[] {
    return toForwardSlashesAll(this.data.excludedPaths);
  }

  setExcludedPaths(excludedPaths: readonly string[]): void {
    this.data = { ...this.data, excludedPaths: [...excludedPaths] };
  }

  getLibraries(): string[] {
    return [...this.data.libraries];
  }

  setLibraries(libraries: readonly string[]): void {
    this.data = { ...this.data, libraries: [...libraries] };
  }

  /**
   * Platform keyword (such as `unix64`), or the path of a platform
   * description when it ends with `.xml`.
   */
  getPlatform(): string {
    return this.data.platform;
  }

  setPlatform(platform: string): void {
    this.data = { ...this.data, platform };
  }

  getSuppressions(): Suppression[] {
    return this.data.suppressions.map((suppression) => ({ ...suppression }));
  }

  setSuppressions(suppressions: readonly Suppression[]): void {
    this.data = {
      ...this.data,
      suppressions: suppressions.map((suppression) => ({ ...suppression })),
    };
  }

  getAddons(): string[] {
    return [...this.data.addons];
  }

  setAddons(addons: readonly string[]): void {
    this.data = { ...this.data, addons: [...addons] };
  }

  /**
   * Addons followed by the identifiers of the enabled tools.
   */
  getAddonsAndTools(): string[] {
    return [...this.data.addons, ...toolNames(this.data)];
  }

  /**
   * Whether the clang static analyzer is reported as enabled.
   *
   * Reports false unless the `reportClangAnalyzer` setting is on. The stored
   * flag is written out either way.
   */
  getClangAnalyzer(): boolean {
    return this.settings.reportClangAnalyzer && this.data.clangAnalyzer;
  }

  setClangAnalyzer(clangAnalyzer: boolean): void {
    this.data = { ...this.data, clangAnalyzer };
  }

  getClangTidy(): boolean {
    return this.data.clangTidy;
  }

  setClangTidy(clangTidy: boolean): void {
    this.data = { ...this.data, clangTidy };
  }

  getTags(): string[] {
    return [...this.data.tags];
  }

  setTags(tags: readonly string[]): void {
    this.data = { ...this.data, tags: [...tags] };
  }

  /**
   * Directory that relative paths in the project are interpreted against:
   * the root path resolved against the document's directory when a root path
   * is set, otherwise the document's directory. Nothing is checked on disk.
   */
  getBaseDirectory(): string {
    const documentDirectory =
      this.filename === '' ? process.cwd() : path.dirname(path.resolve(this.filename));
    return this.data.rootPath === ''
      ? documentDirectory
      : path.resolve(documentDirectory, this.data.rootPath);
  }
}
